import { DIRECTIONS, offset } from './direction';
import type { Direction, Tile, Vec2 } from './types';

function tileAt(tiles: Tile[][], position: Vec2): Tile | undefined {
  return tiles[position.y]?.[position.x];
}

/**
 * Breadth-first distance from the goal across 4-adjacent path tiles.
 * The goal itself is 0; cells off the network, or cut off from the goal, are null.
 */
export function computePathDistances(tiles: Tile[][], goal: Vec2): (number | null)[][] {
  const distances: (number | null)[][] = tiles.map((row) => row.map(() => null));
  if (!tileAt(tiles, goal)) {
    return distances;
  }

  distances[goal.y][goal.x] = 0;
  const queue: Vec2[] = [goal];

  for (let head = 0; head < queue.length; head += 1) {
    const current = queue[head];
    const depth = distances[current.y][current.x] ?? 0;

    for (const direction of DIRECTIONS) {
      const next = offset(current, direction);
      const tile = tileAt(tiles, next);
      if (!tile || tile.ground !== 'path' || distances[next.y][next.x] !== null) {
        continue;
      }

      distances[next.y][next.x] = depth + 1;
      queue.push(next);
    }
  }

  return distances;
}

/**
 * Direction an enemy standing on each cell steps toward the goal, baked once per level.
 */
export function computeNextSteps(tiles: Tile[][], goal: Vec2): (Direction | null)[][] {
  const distances = computePathDistances(tiles, goal);

  return distances.map((row, y) =>
    row.map((distance, x) => {
      if (distance === null || distance === 0) {
        return null;
      }

      for (const direction of DIRECTIONS) {
        const next = offset({ x, y }, direction);
        if (distances[next.y]?.[next.x] === distance - 1) {
          return direction;
        }
      }

      return null;
    }),
  );
}

import { DIRECTIONS, offset } from '../core/direction';
import { computePathDistances } from '../core/pathNetwork';
import type { ParsedLevel } from '../core/types';

export interface LevelLint {
  warnings: string[];
}

export interface LevelSummary {
  id: string;
  width: number;
  height: number;
  enemies: number;
  towers: number;
  spawnEvents: number;
  maxTowers: number | null;
}

export function summarizeLevel(level: ParsedLevel): LevelSummary {
  return {
    id: level.id,
    width: level.width,
    height: level.height,
    enemies: level.enemySpawns.length,
    towers: level.towers.length,
    spawnEvents: level.spawnEvents.length,
    maxTowers: level.maxTowers,
  };
}

/**
 * Problems that still load but make for a broken level: enemies that can never move,
 * spawns with no route, a goal nothing can reach.
 */
export function lintLevel(level: ParsedLevel): LevelLint {
  const warnings: string[] = [];
  const distances = computePathDistances(level.tiles, level.goal);

  for (const enemy of level.enemySpawns) {
    if (level.tiles[enemy.y][enemy.x].ground !== 'path') {
      warnings.push(`Enemy at (${enemy.x}, ${enemy.y}) is not on a path tile and will never move.`);
    } else if (distances[enemy.y][enemy.x] === null) {
      warnings.push(`Enemy at (${enemy.x}, ${enemy.y}) has no path to the goal.`);
    }
  }

  for (const event of level.spawnEvents) {
    if (distances[event.y][event.x] === null) {
      warnings.push(`Spawn at (${event.x}, ${event.y}) on turn ${event.turn} has no path to the goal.`);
    }
  }

  const goalFed = DIRECTIONS.some((direction) => {
    const next = offset(level.goal, direction);
    return level.tiles[next.y]?.[next.x]?.ground === 'path';
  });
  if (!goalFed) {
    warnings.push('No path tile touches the goal: enemies can never reach it.');
  }

  if (level.maxTowers === 0 && level.towers.length === 0) {
    warnings.push('@max_towers is 0 and no towers are placed: enemies cannot be stopped.');
  }

  return { warnings };
}

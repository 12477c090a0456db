import { offset } from '../core/direction';
import type { Direction, Vec2 } from '../core/types';

export function predictEnemyNextTile(enemy: Vec2, nextSteps: (Direction | null)[][]): Vec2 | null {
  const direction = nextSteps[enemy.y]?.[enemy.x] ?? null;
  return direction ? offset(enemy, direction) : null;
}

export function collectEnemyPathTargets(enemies: Vec2[], nextSteps: (Direction | null)[][]): Vec2[] {
  const targets: Vec2[] = [];
  const seen = new Set<string>();

  for (const enemy of enemies) {
    const next = predictEnemyNextTile(enemy, nextSteps);
    if (!next) {
      continue;
    }

    const key = `${next.x},${next.y}`;
    if (!seen.has(key)) {
      seen.add(key);
      targets.push(next);
    }
  }

  return targets;
}


import { offset } from './direction';
import type { GridWorld } from './gridWorld';
import { blocksLineOfFire } from './tile';
import type { ShotResult, Tower } from './types';

export const TOWER_DAMAGE = 1;

/**
 * Walks the tower's ray one cell at a time and damages the first enemy on it.
 * Rocks, goals, players, towers and the grid edge end the ray without effect.
 */
export function resolveShot(world: GridWorld, tower: Tower): ShotResult {
  let cell = offset(tower, tower.facing);

  while (world.contains(cell)) {
    const enemy = world.enemyAt(cell);
    if (enemy) {
      const damaged = world.applyDamage(enemy.id, TOWER_DAMAGE);
      return {
        kind: 'hit',
        towerId: tower.id,
        enemyId: enemy.id,
        x: cell.x,
        y: cell.y,
        killed: damaged.hitPoints === 0,
      };
    }

    const tile = world.tileAt(cell);
    if (blocksLineOfFire(tile)) {
      return { kind: 'blocked', towerId: tower.id, x: cell.x, y: cell.y, content: tile.content };
    }

    cell = offset(cell, tower.facing);
  }

  return { kind: 'miss', towerId: tower.id };
}

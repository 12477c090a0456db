import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { parseLevelText } from '../../src/core/levelParser';
import { simulate, stateSnapshot } from '../../src/core/simulation';
import type { PlayerIntent } from '../../src/core/types';

function loadFixture(name: string): string {
  const currentDir = dirname(fileURLToPath(import.meta.url));
  return readFileSync(resolve(currentDir, '..', 'fixtures', name), 'utf8');
}

const SIEGE_INPUTS: PlayerIntent[] = [
  { kind: 'move', direction: 'left' },
  { kind: 'place-tower', direction: 'right' },
  { kind: 'skip' },
  { kind: 'skip' },
  { kind: 'skip' },
  { kind: 'skip' },
];

describe('golden deterministic level simulations', () => {
  it('siege sequence ends with the first enemy on the goal', () => {
    const siege = parseLevelText('siege', loadFixture('siege.txt'));

    const result = simulate(siege, SIEGE_INPUTS);

    expect(result.steps[0].outcome).toEqual({
      status: 'rejected',
      reason: 'OutOfBounds',
      message: 'Cell -1,1 is outside the 6x4 grid.',
    });
    expect(result.steps.map((step) => step.snapshot.turn)).toEqual([0, 1, 2, 3, 4, 4]);
    expect(result.steps.map((step) => step.snapshot.world.enemies.map((enemy) => enemy.hitPoints))).toEqual([
      [5],
      [4],
      [3, 5],
      [2, 5],
      [2, 4],
      [2, 4],
    ]);
    expect(stateSnapshot(result.final)).toEqual({
      levelId: 'siege',
      turn: 4,
      phase: 'game-over',
      player: { x: 0, y: 1 },
      enemies: [
        { id: 0, x: 2, y: 3, hitPoints: 2 },
        { id: 1, x: 3, y: 1, hitPoints: 4 },
      ],
      towers: [{ id: 0, x: 1, y: 1, facing: 'right' }],
      remainingTowers: null,
      pendingSpawns: 0,
    });
  });

  it('replays identically from the same inputs', () => {
    const siege = parseLevelText('siege', loadFixture('siege.txt'));

    const first = simulate(siege, SIEGE_INPUTS).steps.map((step) => stateSnapshot(step.snapshot));
    const second = simulate(siege, SIEGE_INPUTS).steps.map((step) => stateSnapshot(step.snapshot));

    expect(first).toEqual(second);
  });

  it('starts from the level as written', () => {
    const siege = parseLevelText('siege', loadFixture('siege.txt'));

    const result = simulate(siege, []);

    expect(result.final).toBe(result.initial);
    expect(stateSnapshot(result.initial)).toMatchObject({ turn: 0, phase: 'awaiting-player-input', pendingSpawns: 1 });
  });
});

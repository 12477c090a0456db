import { describe, expect, it } from 'vitest';
import { LevelParseError } from '../../src/core/errors';
import { blocksLineOfFire, decodeTile, encodeTile, isWalkableBy } from '../../src/core/tile';
import { captureError } from '../helpers/levels';

describe('tile model', () => {
  it('decodes ground then content', () => {
    expect(decodeTile('O-')).toEqual({ ground: 'grass', content: 'empty' });
    expect(decodeTile('xr')).toEqual({ ground: 'water', content: 'rock' });
    expect(decodeTile('|e')).toEqual({ ground: 'path', content: 'enemy' });
    expect(decodeTile('Og')).toEqual({ ground: 'grass', content: 'goal' });
  });

  it('encodes back to the same two characters', () => {
    for (const code of ['O-', 'x-', '|-', 'Op', '|e', 'Ot', 'Or', 'Og']) {
      expect(encodeTile(decodeTile(code))).toBe(code);
    }
  });

  it('rejects unknown ground and content codes', () => {
    expect(captureError(LevelParseError, () => decodeTile('Q-', { levelId: 'l', row: 2, column: 3 }))).toMatchObject({
      code: 'InvalidGroundCode',
      location: { row: 2, column: 3 },
    });
    expect(captureError(LevelParseError, () => decodeTile('O?'))).toMatchObject({ code: 'InvalidContentCode' });
    expect(() => decodeTile('O?')).toThrow(/invalid content code '\?'/);
  });

  it('rejects codes that are not two characters', () => {
    expect(captureError(LevelParseError, () => decodeTile('O'))).toMatchObject({ code: 'TruncatedTileCode' });
  });

  it('lets the player walk on empty grass and path only', () => {
    expect(isWalkableBy({ ground: 'grass', content: 'empty' }, 'player')).toBe(true);
    expect(isWalkableBy({ ground: 'path', content: 'empty' }, 'player')).toBe(true);
    expect(isWalkableBy({ ground: 'water', content: 'empty' }, 'player')).toBe(false);
    expect(isWalkableBy({ ground: 'grass', content: 'rock' }, 'player')).toBe(false);
  });

  it('lets enemies walk on empty path only', () => {
    expect(isWalkableBy({ ground: 'path', content: 'empty' }, 'enemy')).toBe(true);
    expect(isWalkableBy({ ground: 'grass', content: 'empty' }, 'enemy')).toBe(false);
    expect(isWalkableBy({ ground: 'path', content: 'tower' }, 'enemy')).toBe(false);
    expect(isWalkableBy({ ground: 'path', content: 'enemy' }, 'enemy')).toBe(false);
  });

  it('blocks shots on occupants but never on ground', () => {
    expect(blocksLineOfFire({ ground: 'grass', content: 'rock' })).toBe(true);
    expect(blocksLineOfFire({ ground: 'grass', content: 'goal' })).toBe(true);
    expect(blocksLineOfFire({ ground: 'grass', content: 'tower' })).toBe(true);
    expect(blocksLineOfFire({ ground: 'water', content: 'empty' })).toBe(false);
    expect(blocksLineOfFire({ ground: 'path', content: 'empty' })).toBe(false);
    expect(blocksLineOfFire({ ground: 'path', content: 'enemy' })).toBe(false);
  });
});

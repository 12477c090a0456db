import { LevelParseError } from './errors';
import type { ActorKind, ContentKind, GroundKind, Tile } from './types';

const GROUND_BY_CODE: Record<string, GroundKind> = {
  O: 'grass',
  x: 'water',
  '|': 'path',
};

const CONTENT_BY_CODE: Record<string, ContentKind> = {
  '-': 'empty',
  p: 'player',
  e: 'enemy',
  t: 'tower',
  r: 'rock',
  g: 'goal',
};

const GROUND_CODES: Record<GroundKind, string> = {
  grass: 'O',
  water: 'x',
  path: '|',
};

const CONTENT_CODES: Record<ContentKind, string> = {
  empty: '-',
  player: 'p',
  enemy: 'e',
  tower: 't',
  rock: 'r',
  goal: 'g',
};

export interface TileCodeContext {
  levelId: string;
  row: number;
  column: number;
}

export function decodeTile(code: string, context: TileCodeContext = { levelId: '?', row: 0, column: 0 }): Tile {
  const { levelId, row, column } = context;
  if (code.length !== 2) {
    throw new LevelParseError('TruncatedTileCode', levelId, `tile code '${code}' is not two characters at ${column},${row}.`, {
      row,
      column,
    });
  }

  const ground = Object.hasOwn(GROUND_BY_CODE, code[0]) ? GROUND_BY_CODE[code[0]] : undefined;
  if (!ground) {
    throw new LevelParseError('InvalidGroundCode', levelId, `invalid ground code '${code[0]}' at ${column},${row}.`, {
      row,
      column,
    });
  }

  const content = Object.hasOwn(CONTENT_BY_CODE, code[1]) ? CONTENT_BY_CODE[code[1]] : undefined;
  if (!content) {
    throw new LevelParseError('InvalidContentCode', levelId, `invalid content code '${code[1]}' at ${column},${row}.`, {
      row,
      column,
    });
  }

  return { ground, content };
}

export function encodeTile(tile: Tile): string {
  return `${GROUND_CODES[tile.ground]}${CONTENT_CODES[tile.content]}`;
}

export function isWalkableBy(tile: Tile, actor: ActorKind): boolean {
  if (tile.content !== 'empty') {
    return false;
  }

  switch (actor) {
    case 'player':
      return tile.ground === 'grass' || tile.ground === 'path';
    case 'enemy':
      return tile.ground === 'path';
  }
}

export function blocksLineOfFire(tile: Tile): boolean {
  switch (tile.content) {
    case 'rock':
    case 'goal':
    case 'player':
    case 'tower':
      return true;
    case 'empty':
    case 'enemy':
      return false;
  }
}

export function cloneTiles(tiles: Tile[][]): Tile[][] {
  return tiles.map((row) => row.map((tile) => ({ ...tile })));
}

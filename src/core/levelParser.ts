import { isDirection } from './direction';
import { LevelParseError } from './errors';
import { cloneTiles, decodeTile, encodeTile } from './tile';
import type { AuthoredTower, Direction, ParsedLevel, SpawnEvent, Tile, Vec2 } from './types';

const DEFAULT_TOWER_FACING: Direction = 'right';
const NON_NEGATIVE_INT_RE = /^\d+$/;

interface SourceLine {
  text: string;
  lineNumber: number;
}

function cloneVec(position: Vec2): Vec2 {
  return { x: position.x, y: position.y };
}

function splitSource(raw: string): { rows: SourceLine[]; directives: SourceLine[] } {
  const normalized = raw.replace(/\r/g, '');
  const lines = normalized.split('\n');

  if (lines[lines.length - 1] === '') {
    lines.pop();
  }

  const rows: SourceLine[] = [];
  const directives: SourceLine[] = [];

  lines.forEach((text, index) => {
    const lineNumber = index + 1;
    if (text.trim() === '' || text.startsWith('~')) {
      return;
    }

    if (text.startsWith('@')) {
      directives.push({ text, lineNumber });
      return;
    }

    rows.push({ text, lineNumber });
  });

  return { rows, directives };
}

function decodeRows(id: string, rows: SourceLine[]): Tile[][] {
  const width = Math.floor(rows[0].text.length / 2);
  const tiles: Tile[][] = [];

  rows.forEach(({ text }, y) => {
    if (text.length % 2 !== 0) {
      throw new LevelParseError('TruncatedTileCode', id, `row ${y} has an odd length of ${text.length}.`, { row: y });
    }

    const rowWidth = text.length / 2;
    if (rowWidth !== width) {
      throw new LevelParseError(
        'IrregularGridShape',
        id,
        `row ${y} is ragged. Expected ${width} tiles, got ${rowWidth}.`,
        { row: y },
      );
    }

    const row: Tile[] = [];
    for (let x = 0; x < rowWidth; x += 1) {
      row.push(decodeTile(text.slice(x * 2, x * 2 + 2), { levelId: id, row: y, column: x }));
    }
    tiles.push(row);
  });

  return tiles;
}

function parseCount(id: string, token: string | undefined, line: SourceLine): number {
  if (token === undefined || !NON_NEGATIVE_INT_RE.test(token)) {
    throw new LevelParseError(
      'InvalidDirective',
      id,
      `expected a non-negative integer, got '${token ?? ''}' on line ${line.lineNumber}.`,
    );
  }
  return Number.parseInt(token, 10);
}

function parseCell(id: string, tiles: Tile[][], xToken: string | undefined, yToken: string | undefined, line: SourceLine): Vec2 {
  const x = parseCount(id, xToken, line);
  const y = parseCount(id, yToken, line);
  if (y >= tiles.length || x >= tiles[0].length) {
    throw new LevelParseError('InvalidDirective', id, `cell ${x},${y} on line ${line.lineNumber} is outside the grid.`);
  }
  return { x, y };
}

interface DirectiveResult {
  maxTowers: number | null;
  spawnEvents: SpawnEvent[];
}

function applyDirectives(id: string, tiles: Tile[][], towers: AuthoredTower[], directives: SourceLine[]): DirectiveResult {
  let maxTowers: number | null = null;
  const spawnEvents: SpawnEvent[] = [];

  for (const line of directives) {
    const [name, ...args] = line.text.slice(1).trim().split(/\s+/);

    switch (name) {
      case 'max_towers': {
        if (args.length !== 1 || maxTowers !== null) {
          throw new LevelParseError('InvalidDirective', id, `bad @max_towers on line ${line.lineNumber}.`);
        }
        maxTowers = parseCount(id, args[0], line);
        break;
      }
      case 'facing': {
        if (args.length !== 3) {
          throw new LevelParseError('InvalidDirective', id, `@facing takes x y direction (line ${line.lineNumber}).`);
        }
        const cell = parseCell(id, tiles, args[0], args[1], line);
        const tower = towers.find((candidate) => candidate.x === cell.x && candidate.y === cell.y);
        if (!tower) {
          throw new LevelParseError('InvalidDirective', id, `no tower at ${cell.x},${cell.y} (line ${line.lineNumber}).`);
        }
        const facing = args[2];
        if (!isDirection(facing)) {
          throw new LevelParseError('InvalidDirective', id, `unknown direction '${facing}' on line ${line.lineNumber}.`);
        }
        tower.facing = facing;
        break;
      }
      case 'spawn': {
        if (args.length !== 3) {
          throw new LevelParseError('InvalidDirective', id, `@spawn takes x y turn (line ${line.lineNumber}).`);
        }
        const cell = parseCell(id, tiles, args[0], args[1], line);
        if (tiles[cell.y][cell.x].ground !== 'path') {
          throw new LevelParseError('InvalidDirective', id, `spawn cell ${cell.x},${cell.y} is not a path tile.`);
        }
        const occupant = tiles[cell.y][cell.x].content;
        if (occupant === 'goal' || occupant === 'rock') {
          throw new LevelParseError('InvalidDirective', id, `spawn cell ${cell.x},${cell.y} holds the ${occupant}.`);
        }
        spawnEvents.push({ ...cell, turn: parseCount(id, args[2], line) });
        break;
      }
      default:
        throw new LevelParseError('InvalidDirective', id, `unknown directive '@${name}' on line ${line.lineNumber}.`);
    }
  }

  return { maxTowers, spawnEvents };
}

export function parseLevelText(id: string, raw: string): ParsedLevel {
  const { rows, directives } = splitSource(raw);

  if (rows.length === 0) {
    throw new LevelParseError('EmptyLevel', id, 'contains no grid rows.');
  }

  const tiles = decodeRows(id, rows);
  const players: Vec2[] = [];
  const goals: Vec2[] = [];
  const enemySpawns: Vec2[] = [];
  const towers: AuthoredTower[] = [];

  tiles.forEach((row, y) => {
    row.forEach((tile, x) => {
      switch (tile.content) {
        case 'player':
          players.push({ x, y });
          break;
        case 'goal':
          goals.push({ x, y });
          break;
        case 'enemy':
          enemySpawns.push({ x, y });
          break;
        case 'tower':
          towers.push({ x, y, facing: DEFAULT_TOWER_FACING });
          break;
        case 'empty':
        case 'rock':
          break;
      }
    });
  });

  if (players.length === 0) {
    throw new LevelParseError('MissingPlayer', id, 'has no player tile.');
  }
  if (players.length > 1) {
    throw new LevelParseError('MultiplePlayers', id, `has ${players.length} player tiles.`);
  }
  if (goals.length === 0) {
    throw new LevelParseError('MissingGoal', id, 'has no goal tile.');
  }
  if (goals.length > 1) {
    throw new LevelParseError('MultipleGoals', id, `has ${goals.length} goal tiles.`);
  }

  const { maxTowers, spawnEvents } = applyDirectives(id, tiles, towers, directives);

  return {
    id,
    width: tiles[0].length,
    height: tiles.length,
    tiles,
    playerSpawn: players[0],
    goal: goals[0],
    enemySpawns,
    towers,
    maxTowers,
    spawnEvents,
  };
}

export function serializeTiles(tiles: Tile[][]): string {
  return tiles.map((row) => row.map(encodeTile).join('')).join('\n');
}

export function serializeParsedLevel(level: ParsedLevel): string {
  const lines = [serializeTiles(level.tiles)];

  if (level.maxTowers !== null) {
    lines.push(`@max_towers ${level.maxTowers}`);
  }
  for (const tower of level.towers) {
    if (tower.facing !== DEFAULT_TOWER_FACING) {
      lines.push(`@facing ${tower.x} ${tower.y} ${tower.facing}`);
    }
  }
  for (const event of level.spawnEvents) {
    lines.push(`@spawn ${event.x} ${event.y} ${event.turn}`);
  }

  return lines.join('\n');
}

export function cloneParsedLevel(level: ParsedLevel): ParsedLevel {
  return {
    id: level.id,
    width: level.width,
    height: level.height,
    tiles: cloneTiles(level.tiles),
    playerSpawn: cloneVec(level.playerSpawn),
    goal: cloneVec(level.goal),
    enemySpawns: level.enemySpawns.map(cloneVec),
    towers: level.towers.map((tower) => ({ ...tower })),
    maxTowers: level.maxTowers,
    spawnEvents: level.spawnEvents.map((event) => ({ ...event })),
  };
}

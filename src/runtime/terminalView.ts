import type { Direction, EngineState, EngineSnapshot, GroundKind, Tile, Vec2 } from '../core/types';
import { collectEnemyPathTargets } from './enemyPathHints';

export interface RenderOptions {
  showPathHints: boolean;
  showLegend: boolean;
  statusMessage?: string | null;
}

const GROUND_GLYPHS: Record<GroundKind, string> = {
  grass: '.',
  water: '~',
  path: '=',
};

const TOWER_GLYPHS: Record<Direction, string> = {
  up: '^',
  down: 'v',
  left: '<',
  right: '>',
};

const LEGEND = '@ you  G goal  # rock  ^v<> tower  1-9 enemy hp  . grass  ~ water  = path  * next enemy step';

export function describeState(state: EngineState): string {
  switch (state.phase) {
    case 'awaiting-player-input':
      return 'Your move';
    case 'enemy-phase':
      return 'Enemies advancing';
    case 'tower-phase':
      return 'Towers firing';
    case 'game-over':
      return 'Game over: an enemy reached the goal';
    case 'victory':
      return 'Victory: every enemy is destroyed';
  }
}

function enemyGlyph(hitPoints: number): string {
  return hitPoints > 9 ? '+' : String(hitPoints);
}

function cellGlyph(tile: Tile, position: Vec2, snapshot: EngineSnapshot, hinted: Set<string>): string {
  const { world } = snapshot;
  switch (tile.content) {
    case 'player':
      return '@';
    case 'goal':
      return 'G';
    case 'rock':
      return '#';
    case 'enemy': {
      const enemy = world.enemies.find((candidate) => candidate.x === position.x && candidate.y === position.y);
      return enemy ? enemyGlyph(enemy.hitPoints) : 'e';
    }
    case 'tower': {
      const tower = world.towers.find((candidate) => candidate.x === position.x && candidate.y === position.y);
      return tower ? TOWER_GLYPHS[tower.facing] : 't';
    }
    case 'empty':
      return hinted.has(`${position.x},${position.y}`) ? '*' : GROUND_GLYPHS[tile.ground];
  }
}

export function renderGrid(snapshot: EngineSnapshot, showPathHints: boolean): string[] {
  const { world } = snapshot;
  const hinted = new Set<string>();
  if (showPathHints) {
    for (const target of collectEnemyPathTargets(world.enemies, world.nextSteps)) {
      hinted.add(`${target.x},${target.y}`);
    }
  }

  return world.tiles.map((row, y) => row.map((tile, x) => cellGlyph(tile, { x, y }, snapshot, hinted)).join(''));
}

export function renderSnapshot(snapshot: EngineSnapshot, options: RenderOptions): string {
  const { world } = snapshot;
  const lines: string[] = [];

  lines.push(`Level ${snapshot.levelId} | turn ${snapshot.turn} | ${describeState(snapshot.state)}`);
  lines.push(...renderGrid(snapshot, options.showPathHints));

  const towersLeft = world.remainingTowers === null ? 'unlimited' : String(world.remainingTowers);
  lines.push(`Towers left: ${towersLeft} | Pending spawns: ${snapshot.pendingSpawns}`);

  const enemyList = world.enemies.map((enemy) => `#${enemy.id} (${enemy.x},${enemy.y}) ${enemy.hitPoints}hp`);
  lines.push(`Enemies: ${enemyList.length > 0 ? enemyList.join(', ') : 'none'}`);

  if (options.showLegend) {
    lines.push(LEGEND);
  }
  if (options.statusMessage) {
    lines.push(options.statusMessage);
  }

  return lines.join('\n');
}

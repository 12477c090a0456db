import { isAdjacent, offset, samePosition } from './direction';
import { GridWorldError } from './errors';
import { serializeTiles } from './levelParser';
import { computeNextSteps } from './pathNetwork';
import { cloneTiles, isWalkableBy } from './tile';
import type {
  ActorKind,
  Direction,
  Enemy,
  EnemyStep,
  ParsedLevel,
  Tile,
  Tower,
  Vec2,
  WorldSnapshot,
} from './types';

export const DEFAULT_ENEMY_HIT_POINTS = 5;

export interface GridWorldOptions {
  enemyHitPoints?: number;
}

function formatCell(position: Vec2): string {
  return `${position.x},${position.y}`;
}

/**
 * Tile matrix plus the entity indices derived from it. Ground never changes after load;
 * content changes only through the operations below.
 */
export class GridWorld {
  public readonly width: number;

  public readonly height: number;

  public readonly goal: Vec2;

  private readonly tiles: Tile[][];

  private readonly nextSteps: (Direction | null)[][];

  private readonly enemyHitPoints: number;

  private player: Vec2;

  // Insertion order is id order.
  private readonly enemiesById = new Map<number, Enemy>();

  private readonly enemiesByCell = new Map<string, Enemy>();

  private towerList: Tower[] = [];

  private nextEnemyId = 0;

  private nextTowerId = 0;

  private towersLeft: number | null;

  public constructor(level: ParsedLevel, options: GridWorldOptions = {}) {
    this.width = level.width;
    this.height = level.height;
    this.tiles = cloneTiles(level.tiles);
    this.goal = { ...level.goal };
    this.player = { ...level.playerSpawn };
    this.towersLeft = level.maxTowers;
    this.enemyHitPoints = Math.max(1, Math.floor(options.enemyHitPoints ?? DEFAULT_ENEMY_HIT_POINTS));
    this.nextSteps = computeNextSteps(this.tiles, this.goal);

    for (const spawn of level.enemySpawns) {
      this.addEnemy(this.createEnemy(spawn));
    }
    for (const tower of level.towers) {
      this.towerList.push({ id: this.nextTowerId, x: tower.x, y: tower.y, facing: tower.facing });
      this.nextTowerId += 1;
    }
  }

  public contains(position: Vec2): boolean {
    return position.x >= 0 && position.x < this.width && position.y >= 0 && position.y < this.height;
  }

  public tileAt(position: Vec2): Tile {
    if (!this.contains(position)) {
      throw new GridWorldError('OutOfBounds', `Cell ${formatCell(position)} is outside the ${this.width}x${this.height} grid.`);
    }
    return { ...this.tiles[position.y][position.x] };
  }

  public playerPosition(): Vec2 {
    return { ...this.player };
  }

  public enemies(): readonly Enemy[] {
    return Array.from(this.enemiesById.values(), (enemy) => ({ ...enemy }));
  }

  public towers(): readonly Tower[] {
    return this.towerList.map((tower) => ({ ...tower }));
  }

  public remainingTowers(): number | null {
    return this.towersLeft;
  }

  public enemyAt(position: Vec2): Enemy | null {
    const enemy = this.enemiesByCell.get(formatCell(position));
    return enemy ? { ...enemy } : null;
  }

  public nextStepAt(position: Vec2): Direction | null {
    return this.nextSteps[position.y]?.[position.x] ?? null;
  }

  public moveEntity(kind: ActorKind, from: Vec2, to: Vec2): void {
    if (!this.contains(from) || this.tiles[from.y][from.x].content !== kind) {
      throw new Error(`No ${kind} at ${formatCell(from)} to move.`);
    }

    if (!this.contains(to)) {
      throw new GridWorldError('OutOfBounds', `Cell ${formatCell(to)} is outside the ${this.width}x${this.height} grid.`);
    }

    if (!isAdjacent(from, to)) {
      throw new GridWorldError('NotAdjacent', `Cell ${formatCell(to)} is not next to ${formatCell(from)}.`);
    }

    if (!isWalkableBy(this.tiles[to.y][to.x], kind)) {
      throw new GridWorldError('BlockedDestination', `Cell ${formatCell(to)} is blocked for the ${kind}.`);
    }

    this.tiles[from.y][from.x].content = 'empty';
    this.tiles[to.y][to.x].content = kind;

    if (kind === 'player') {
      this.player = { ...to };
      return;
    }

    const enemy = this.enemiesByCell.get(formatCell(from));
    if (!enemy) {
      throw new Error(`Enemy index is out of sync at ${formatCell(from)}.`);
    }
    this.relocateEnemy(enemy, to);
  }

  public placeTower(position: Vec2, facing: Direction): Tower {
    if (!this.contains(position)) {
      throw new GridWorldError('OutOfBounds', `Cell ${formatCell(position)} is outside the ${this.width}x${this.height} grid.`);
    }

    if (!isAdjacent(this.player, position)) {
      throw new GridWorldError('TooFarFromPlayer', `Towers must be placed next to the player.`);
    }

    const tile = this.tiles[position.y][position.x];
    if (tile.content !== 'empty') {
      throw new GridWorldError('OccupiedTile', `Cell ${formatCell(position)} already holds a ${tile.content}.`);
    }

    if (tile.ground === 'water') {
      throw new GridWorldError('BlockedDestination', `Towers cannot be placed on water.`);
    }

    if (this.towersLeft === 0) {
      throw new GridWorldError('NoTowersRemaining', 'No towers left to place.');
    }

    tile.content = 'tower';
    const tower: Tower = { id: this.nextTowerId, x: position.x, y: position.y, facing };
    this.nextTowerId += 1;
    this.towerList.push(tower);
    if (this.towersLeft !== null) {
      this.towersLeft -= 1;
    }

    return { ...tower };
  }

  public applyDamage(enemyId: number, amount: number): Enemy {
    const enemy = this.enemiesById.get(enemyId);
    if (!enemy) {
      throw new Error(`Enemy ${enemyId} is not alive.`);
    }

    enemy.hitPoints = Math.max(0, enemy.hitPoints - amount);

    if (enemy.hitPoints === 0) {
      this.enemiesById.delete(enemy.id);
      this.enemiesByCell.delete(formatCell(enemy));
      // An enemy standing on the goal never clears the goal marker.
      if (!samePosition(enemy, this.goal)) {
        this.tiles[enemy.y][enemy.x].content = 'empty';
      }
    }

    return { ...enemy };
  }

  public stepEnemy(enemyId: number): EnemyStep {
    const enemy = this.enemiesById.get(enemyId);
    if (!enemy) {
      throw new Error(`Enemy ${enemyId} is not alive.`);
    }

    const from: Vec2 = { x: enemy.x, y: enemy.y };
    const direction = this.nextStepAt(from);
    if (!direction) {
      return { kind: 'stalled', enemyId, at: from };
    }

    const to = offset(from, direction);
    if (samePosition(to, this.goal)) {
      this.tiles[from.y][from.x].content = 'empty';
      this.relocateEnemy(enemy, to);
      return { kind: 'reached-goal', enemyId, from, to };
    }

    if (!isWalkableBy(this.tiles[to.y][to.x], 'enemy')) {
      return { kind: 'blocked', enemyId, at: from };
    }

    this.moveEntity('enemy', from, to);
    return { kind: 'moved', enemyId, from, to };
  }

  public spawnEnemy(position: Vec2): Enemy | null {
    if (!this.contains(position) || this.tiles[position.y][position.x].content !== 'empty') {
      return null;
    }

    const enemy = this.createEnemy(position);
    this.tiles[position.y][position.x].content = 'enemy';
    this.addEnemy(enemy);
    return { ...enemy };
  }

  public hasEnemyReachedGoal(): boolean {
    return this.enemiesByCell.has(formatCell(this.goal));
  }

  public snapshot(): WorldSnapshot {
    return {
      width: this.width,
      height: this.height,
      tiles: cloneTiles(this.tiles),
      player: { ...this.player },
      goal: { ...this.goal },
      enemies: this.enemies().slice(),
      towers: this.towerList.map((tower) => ({ ...tower })),
      remainingTowers: this.towersLeft,
      nextSteps: this.nextSteps.map((row) => row.slice()),
    };
  }

  public serialize(): string {
    return serializeTiles(this.tiles);
  }

  private addEnemy(enemy: Enemy): void {
    this.enemiesById.set(enemy.id, enemy);
    this.enemiesByCell.set(formatCell(enemy), enemy);
  }

  private relocateEnemy(enemy: Enemy, to: Vec2): void {
    this.enemiesByCell.delete(formatCell(enemy));
    enemy.x = to.x;
    enemy.y = to.y;
    this.enemiesByCell.set(formatCell(enemy), enemy);
  }

  private createEnemy(position: Vec2): Enemy {
    const enemy: Enemy = { id: this.nextEnemyId, x: position.x, y: position.y, hitPoints: this.enemyHitPoints };
    this.nextEnemyId += 1;
    return enemy;
  }
}

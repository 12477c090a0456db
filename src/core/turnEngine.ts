import { offset } from './direction';
import { GridWorldError, type TurnErrorCode } from './errors';
import { GridWorld, type GridWorldOptions } from './gridWorld';
import { resolveShot } from './lineOfFire';
import type { EngineSnapshot, EngineState, ParsedLevel, PlayerIntent, SpawnEvent, TurnEvent } from './types';

export type RejectionReason = TurnErrorCode | 'GameFinished';

export type TurnOutcome =
  | { status: 'advanced'; state: EngineState; turn: number; events: TurnEvent[] }
  | { status: 'rejected'; reason: RejectionReason; message: string };

type Subscriber = (snapshot: EngineSnapshot) => void;

function isTerminal(state: EngineState): boolean {
  return state.phase === 'game-over' || state.phase === 'victory';
}

/**
 * Player -> Enemy -> Tower phase loop over a world it owns exclusively.
 * Subscribers get a snapshot after every phase; they never see the world itself.
 */
export class TurnEngine {
  private readonly level: ParsedLevel;

  private readonly options: GridWorldOptions;

  private readonly subscribers = new Set<Subscriber>();

  private world: GridWorld;

  private state: EngineState = { phase: 'awaiting-player-input' };

  private turn = 0;

  private pendingSpawns: SpawnEvent[] = [];

  private events: TurnEvent[] = [];

  public constructor(level: ParsedLevel, options: GridWorldOptions = {}) {
    this.level = level;
    this.options = options;
    this.world = new GridWorld(level, options);
    this.resetProgress();
  }

  public subscribe(subscriber: Subscriber): () => void {
    this.subscribers.add(subscriber);
    subscriber(this.getSnapshot());
    return () => {
      this.subscribers.delete(subscriber);
    };
  }

  public getState(): EngineState {
    return this.state;
  }

  public getTurn(): number {
    return this.turn;
  }

  public getSnapshot(): EngineSnapshot {
    return {
      levelId: this.level.id,
      turn: this.turn,
      state: this.state,
      world: this.world.snapshot(),
      pendingSpawns: this.pendingSpawns.length,
      events: this.events.slice(),
    };
  }

  public serializeWorld(): string {
    return this.world.serialize();
  }

  public restart(): void {
    this.world = new GridWorld(this.level, this.options);
    this.resetProgress();
    this.emit();
  }

  public submit(intent: PlayerIntent): TurnOutcome {
    if (this.state.phase !== 'awaiting-player-input') {
      return {
        status: 'rejected',
        reason: 'GameFinished',
        message: isTerminal(this.state) ? 'The game is over.' : `Cannot take input during ${this.state.phase}.`,
      };
    }

    let playerEvent: TurnEvent;
    try {
      playerEvent = this.runPlayerPhase(intent);
    } catch (error) {
      if (error instanceof GridWorldError) {
        return { status: 'rejected', reason: error.code, message: error.message };
      }
      throw error;
    }

    this.events = [playerEvent];
    this.enterState({ phase: 'enemy-phase' });

    this.runEnemyPhase();
    if (this.getState().phase === 'game-over') {
      return this.advancedOutcome();
    }

    this.enterState({ phase: 'tower-phase' });
    this.runTowerPhase();
    this.cancelBlockedSpawns();

    if (this.world.enemies().length === 0 && this.pendingSpawns.length === 0) {
      this.enterState({ phase: 'victory' });
      return this.advancedOutcome();
    }

    this.turn += 1;
    this.applyDueSpawns();
    this.enterState({ phase: 'awaiting-player-input' });
    return this.advancedOutcome();
  }

  private resetProgress(): void {
    this.state = { phase: 'awaiting-player-input' };
    this.turn = 0;
    this.pendingSpawns = this.level.spawnEvents.map((event) => ({ ...event }));
    this.events = [];
    this.applyDueSpawns();
  }

  private runPlayerPhase(intent: PlayerIntent): TurnEvent {
    switch (intent.kind) {
      case 'move': {
        const from = this.world.playerPosition();
        const to = offset(from, intent.direction);
        this.world.moveEntity('player', from, to);
        return { kind: 'player-moved', from, to };
      }
      case 'place-tower': {
        const target = offset(this.world.playerPosition(), intent.direction);
        const tower = this.world.placeTower(target, intent.direction);
        return { kind: 'tower-placed', tower };
      }
      case 'skip':
        return { kind: 'player-skipped' };
    }
  }

  private runEnemyPhase(): void {
    for (const enemy of this.world.enemies()) {
      const step = this.world.stepEnemy(enemy.id);
      this.events.push({ kind: 'enemy-step', step });

      if (this.world.hasEnemyReachedGoal()) {
        this.enterState({ phase: 'game-over', reason: 'enemy-reached-goal' });
        return;
      }
    }
  }

  private runTowerPhase(): void {
    for (const tower of this.world.towers()) {
      this.events.push({ kind: 'shot', result: resolveShot(this.world, tower) });
    }
  }

  /** Tower, rock and goal cells never free up, so spawns there are dropped. */
  private cancelBlockedSpawns(): void {
    this.pendingSpawns = this.pendingSpawns.filter((event) => {
      const { content } = this.world.tileAt(event);
      if (content !== 'tower' && content !== 'rock' && content !== 'goal') {
        return true;
      }
      this.events.push({ kind: 'spawn-cancelled', x: event.x, y: event.y, turn: event.turn, content });
      return false;
    });
  }

  private applyDueSpawns(): void {
    this.cancelBlockedSpawns();
    const remaining: SpawnEvent[] = [];

    for (const event of this.pendingSpawns) {
      if (event.turn > this.turn) {
        remaining.push(event);
        continue;
      }

      const enemy = this.world.spawnEnemy(event);
      if (enemy) {
        this.events.push({ kind: 'enemy-spawned', enemy });
      } else {
        const delayed = { ...event, turn: this.turn + 1 };
        remaining.push(delayed);
        this.events.push({ kind: 'spawn-delayed', x: delayed.x, y: delayed.y, turn: delayed.turn });
      }
    }

    this.pendingSpawns = remaining;
  }

  private enterState(state: EngineState): void {
    this.state = state;
    this.emit();
  }

  private advancedOutcome(): TurnOutcome {
    return { status: 'advanced', state: this.state, turn: this.turn, events: this.events.slice() };
  }

  private emit(): void {
    const snapshot = this.getSnapshot();
    for (const subscriber of this.subscribers) {
      subscriber(snapshot);
    }
  }
}

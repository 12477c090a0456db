import { TurnEngine, type TurnOutcome } from '../core';
import type { EngineSnapshot, ParsedLevel, PlayerIntent, TurnEvent } from '../core';
import type { SessionCommand } from '../runtime/keyInput';
import type { GameSettings } from '../runtime/settingsStorage';

export interface ControllerSnapshot {
  engine: EngineSnapshot;
  settings: GameSettings;
  showPathHints: boolean;
  statusMessage: string | null;
  finished: boolean;
}

type Subscriber = (snapshot: ControllerSnapshot) => void;

function countKills(events: TurnEvent[]): number {
  return events.filter((event) => event.kind === 'shot' && event.result.kind === 'hit' && event.result.killed).length;
}

export function describeOutcome(outcome: TurnOutcome): string | null {
  if (outcome.status === 'rejected') {
    return `Can't do that: ${outcome.message}`;
  }

  switch (outcome.state.phase) {
    case 'game-over':
      return 'An enemy reached the goal. Press r to restart or q to quit.';
    case 'victory':
      return `All enemies destroyed on turn ${outcome.turn + 1}. Press r to play again or q to quit.`;
    default: {
      const kills = countKills(outcome.events);
      if (kills === 0) {
        return null;
      }
      return kills === 1 ? 'Enemy destroyed.' : `${kills} enemies destroyed.`;
    }
  }
}

/**
 * Session around one level: owns the engine, turns commands into intents and keeps the
 * status line the terminal shows under the grid.
 */
export class GameController {
  private readonly engine: TurnEngine;

  private readonly settings: GameSettings;

  private readonly subscribers = new Set<Subscriber>();

  private showPathHints: boolean;

  private statusMessage: string | null = null;

  public constructor(level: ParsedLevel, settings: GameSettings) {
    this.settings = settings;
    this.showPathHints = settings.showPathHints;
    this.engine = new TurnEngine(level, { enemyHitPoints: settings.enemyHitPoints });
  }

  public subscribe(subscriber: Subscriber): () => void {
    this.subscribers.add(subscriber);
    subscriber(this.getSnapshot());
    return () => {
      this.subscribers.delete(subscriber);
    };
  }

  /** Per-phase snapshots straight from the engine. */
  public subscribeToPhases(subscriber: (snapshot: EngineSnapshot) => void): () => void {
    return this.engine.subscribe(subscriber);
  }

  public getSnapshot(): ControllerSnapshot {
    const engine = this.engine.getSnapshot();
    return {
      engine,
      settings: this.settings,
      showPathHints: this.showPathHints,
      statusMessage: this.statusMessage,
      finished: engine.state.phase === 'game-over' || engine.state.phase === 'victory',
    };
  }

  /** Returns false once the session should end. */
  public handleCommand(command: SessionCommand): boolean {
    switch (command.kind) {
      case 'intent':
        this.submitIntent(command.intent);
        return true;
      case 'restart':
        this.restart();
        return true;
      case 'toggle-hints':
        this.showPathHints = !this.showPathHints;
        this.emit();
        return true;
      case 'quit':
        return false;
    }
  }

  public submitIntent(intent: PlayerIntent): TurnOutcome {
    const outcome = this.engine.submit(intent);
    this.statusMessage = describeOutcome(outcome);
    this.emit();
    return outcome;
  }

  public restart(): void {
    this.engine.restart();
    this.statusMessage = 'Level restarted.';
    this.emit();
  }

  private emit(): void {
    const snapshot = this.getSnapshot();
    for (const subscriber of this.subscribers) {
      subscriber(snapshot);
    }
  }
}

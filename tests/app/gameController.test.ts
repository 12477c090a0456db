import { describe, expect, it } from 'vitest';
import { GameController, type ControllerSnapshot } from '../../src/app/gameController';
import { getDefaultSettings, type GameSettings } from '../../src/runtime/settingsStorage';
import { buildLevel } from '../helpers/levels';

function settingsWith(overrides: Partial<GameSettings>): GameSettings {
  return { ...getDefaultSettings(), ...overrides };
}

function recordSnapshots(controller: GameController): ControllerSnapshot[] {
  const snapshots: ControllerSnapshot[] = [];
  controller.subscribe((snapshot) => {
    snapshots.push(snapshot);
  });
  return snapshots;
}

describe('game controller', () => {
  it('publishes the starting snapshot on subscribe', () => {
    const controller = new GameController(buildLevel(['Op|e|-Og']), settingsWith({ showPathHints: false }));
    const snapshots = recordSnapshots(controller);

    expect(snapshots).toHaveLength(1);
    expect(snapshots[0]).toMatchObject({ showPathHints: false, statusMessage: null, finished: false });
    expect(snapshots[0].engine.turn).toBe(0);
  });

  it('explains rejected intents in the status line', () => {
    const controller = new GameController(buildLevel(['OpOrOg']), getDefaultSettings());

    controller.handleCommand({ kind: 'intent', intent: { kind: 'move', direction: 'right' } });

    expect(controller.getSnapshot().statusMessage).toBe("Can't do that: Cell 1,0 is blocked for the player.");
  });

  it('passes the configured hit points to the engine', () => {
    const controller = new GameController(buildLevel(['Op|e|-Og']), settingsWith({ enemyHitPoints: 3 }));

    expect(controller.getSnapshot().engine.world.enemies[0].hitPoints).toBe(3);
  });

  it('reports kills that do not end the level', () => {
    const single = new GameController(
      buildLevel(['OtOeO-', 'OpO-Og', '|-|-|-'], ['@spawn 0 2 2']),
      settingsWith({ enemyHitPoints: 1 }),
    );
    single.submitIntent({ kind: 'skip' });
    expect(single.getSnapshot().statusMessage).toBe('Enemy destroyed.');

    const double = new GameController(
      buildLevel(['OtOeOg', 'OtOeO-', 'OpO-O-', '|-|-|-'], ['@spawn 0 3 5']),
      settingsWith({ enemyHitPoints: 1 }),
    );
    double.submitIntent({ kind: 'skip' });
    expect(double.getSnapshot().statusMessage).toBe('2 enemies destroyed.');
  });

  it('leaves the status empty on a quiet turn', () => {
    const controller = new GameController(buildLevel(['Op|e|-|-Og']), getDefaultSettings());

    controller.submitIntent({ kind: 'skip' });

    expect(controller.getSnapshot().statusMessage).toBeNull();
  });

  it('announces victory and marks the session finished', () => {
    const controller = new GameController(buildLevel(['OtOeOg', 'OpO-O-']), settingsWith({ enemyHitPoints: 1 }));

    controller.submitIntent({ kind: 'skip' });

    expect(controller.getSnapshot()).toMatchObject({
      statusMessage: 'All enemies destroyed on turn 1. Press r to play again or q to quit.',
      finished: true,
    });
  });

  it('announces a loss and restarts on request', () => {
    const controller = new GameController(buildLevel(['Og|e', 'OpO-']), getDefaultSettings());
    const snapshots = recordSnapshots(controller);

    controller.handleCommand({ kind: 'intent', intent: { kind: 'skip' } });
    expect(controller.getSnapshot()).toMatchObject({
      statusMessage: 'An enemy reached the goal. Press r to restart or q to quit.',
      finished: true,
    });

    expect(controller.handleCommand({ kind: 'restart' })).toBe(true);
    const latest = snapshots[snapshots.length - 1];
    expect(latest.statusMessage).toBe('Level restarted.');
    expect(latest.finished).toBe(false);
    expect(latest.engine.world.enemies).toEqual([{ id: 0, x: 1, y: 0, hitPoints: 5 }]);
  });

  it('toggles path hints and stops on quit', () => {
    const controller = new GameController(buildLevel(['Op|e|-Og']), getDefaultSettings());
    const snapshots = recordSnapshots(controller);

    expect(controller.handleCommand({ kind: 'toggle-hints' })).toBe(true);
    expect(snapshots.map((snapshot) => snapshot.showPathHints)).toEqual([true, false]);
    expect(controller.handleCommand({ kind: 'quit' })).toBe(false);
  });

  it('forwards every engine phase to phase subscribers', () => {
    const controller = new GameController(buildLevel(['Op|e|-|-Og']), getDefaultSettings());
    const phases: string[] = [];
    controller.subscribeToPhases((snapshot) => {
      phases.push(snapshot.state.phase);
    });

    controller.submitIntent({ kind: 'skip' });

    expect(phases).toEqual(['awaiting-player-input', 'enemy-phase', 'tower-phase', 'awaiting-player-input']);
  });
});

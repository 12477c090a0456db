import type { GridWorldOptions } from './gridWorld';
import { TurnEngine, type TurnOutcome } from './turnEngine';
import type { EngineSnapshot, ParsedLevel, PlayerIntent } from './types';

export interface SimulationStep {
  intent: PlayerIntent;
  outcome: TurnOutcome;
  snapshot: EngineSnapshot;
}

export interface SimulationResult {
  initial: EngineSnapshot;
  steps: SimulationStep[];
  final: EngineSnapshot;
}

export function simulate(level: ParsedLevel, intents: PlayerIntent[], options: GridWorldOptions = {}): SimulationResult {
  const engine = new TurnEngine(level, options);
  const initial = engine.getSnapshot();
  const steps: SimulationStep[] = [];

  for (const intent of intents) {
    const outcome = engine.submit(intent);
    steps.push({ intent, outcome, snapshot: engine.getSnapshot() });
  }

  return {
    initial,
    steps,
    final: steps.length > 0 ? steps[steps.length - 1].snapshot : initial,
  };
}

export function stateSnapshot(snapshot: EngineSnapshot): Record<string, unknown> {
  return {
    levelId: snapshot.levelId,
    turn: snapshot.turn,
    phase: snapshot.state.phase,
    player: { x: snapshot.world.player.x, y: snapshot.world.player.y },
    enemies: snapshot.world.enemies.map((enemy) => ({ id: enemy.id, x: enemy.x, y: enemy.y, hitPoints: enemy.hitPoints })),
    towers: snapshot.world.towers.map((tower) => ({ id: tower.id, x: tower.x, y: tower.y, facing: tower.facing })),
    remainingTowers: snapshot.world.remainingTowers,
    pendingSpawns: snapshot.pendingSpawns,
  };
}

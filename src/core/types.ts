export type Direction = 'up' | 'down' | 'left' | 'right';

export interface Vec2 {
  x: number;
  y: number;
}

export type GroundKind = 'grass' | 'water' | 'path';

export type ContentKind = 'empty' | 'player' | 'enemy' | 'tower' | 'rock' | 'goal';

export type ActorKind = 'player' | 'enemy';

export interface Tile {
  ground: GroundKind;
  content: ContentKind;
}

export interface Enemy extends Vec2 {
  id: number;
  hitPoints: number;
}

export interface Tower extends Vec2 {
  id: number;
  facing: Direction;
}

export interface AuthoredTower extends Vec2 {
  facing: Direction;
}

export interface SpawnEvent extends Vec2 {
  turn: number;
}

export interface ParsedLevel {
  id: string;
  width: number;
  height: number;
  tiles: Tile[][];
  playerSpawn: Vec2;
  goal: Vec2;
  enemySpawns: Vec2[];
  towers: AuthoredTower[];
  maxTowers: number | null;
  spawnEvents: SpawnEvent[];
}

export type PlayerIntent =
  | { kind: 'move'; direction: Direction }
  | { kind: 'place-tower'; direction: Direction }
  | { kind: 'skip' };

export type EngineState =
  | { phase: 'awaiting-player-input' }
  | { phase: 'enemy-phase' }
  | { phase: 'tower-phase' }
  | { phase: 'game-over'; reason: 'enemy-reached-goal' }
  | { phase: 'victory' };

export type EnginePhase = EngineState['phase'];

export type ShotResult =
  | { kind: 'miss'; towerId: number }
  | { kind: 'blocked'; towerId: number; x: number; y: number; content: ContentKind }
  | { kind: 'hit'; towerId: number; enemyId: number; x: number; y: number; killed: boolean };

export type EnemyStep =
  | { kind: 'moved'; enemyId: number; from: Vec2; to: Vec2 }
  | { kind: 'blocked'; enemyId: number; at: Vec2 }
  | { kind: 'stalled'; enemyId: number; at: Vec2 }
  | { kind: 'reached-goal'; enemyId: number; from: Vec2; to: Vec2 };

export type TurnEvent =
  | { kind: 'player-moved'; from: Vec2; to: Vec2 }
  | { kind: 'tower-placed'; tower: Tower }
  | { kind: 'player-skipped' }
  | { kind: 'enemy-step'; step: EnemyStep }
  | { kind: 'shot'; result: ShotResult }
  | { kind: 'enemy-spawned'; enemy: Enemy }
  | { kind: 'spawn-delayed'; x: number; y: number; turn: number }
  | { kind: 'spawn-cancelled'; x: number; y: number; turn: number; content: ContentKind };

export interface WorldSnapshot {
  width: number;
  height: number;
  tiles: Tile[][];
  player: Vec2;
  goal: Vec2;
  enemies: Enemy[];
  towers: Tower[];
  remainingTowers: number | null;
  nextSteps: (Direction | null)[][];
}

export interface EngineSnapshot {
  levelId: string;
  turn: number;
  state: EngineState;
  world: WorldSnapshot;
  pendingSpawns: number;
  events: TurnEvent[];
}

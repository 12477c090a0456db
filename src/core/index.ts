export * from './types';
export * from './errors';
export { DIRECTIONS, DIRECTION_VECTORS, isAdjacent, isDirection, offset, samePosition } from './direction';
export { blocksLineOfFire, decodeTile, encodeTile, isWalkableBy } from './tile';
export { cloneParsedLevel, parseLevelText, serializeParsedLevel, serializeTiles } from './levelParser';
export { computeNextSteps, computePathDistances } from './pathNetwork';
export { DEFAULT_ENEMY_HIT_POINTS, GridWorld, type GridWorldOptions } from './gridWorld';
export { resolveShot, TOWER_DAMAGE } from './lineOfFire';
export { TurnEngine, type RejectionReason, type TurnOutcome } from './turnEngine';
export { simulate, stateSnapshot, type SimulationResult, type SimulationStep } from './simulation';

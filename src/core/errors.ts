export type LevelErrorCode =
  | 'EmptyLevel'
  | 'InvalidGroundCode'
  | 'InvalidContentCode'
  | 'TruncatedTileCode'
  | 'IrregularGridShape'
  | 'MissingPlayer'
  | 'MultiplePlayers'
  | 'MissingGoal'
  | 'MultipleGoals'
  | 'InvalidDirective';

export type TurnErrorCode =
  | 'OutOfBounds'
  | 'NotAdjacent'
  | 'BlockedDestination'
  | 'OccupiedTile'
  | 'TooFarFromPlayer'
  | 'NoTowersRemaining';

export interface LevelErrorLocation {
  row?: number;
  column?: number;
}

/**
 * Load-time failure. Never recovered from: the level is rejected as a whole.
 */
export class LevelParseError extends Error {
  public readonly code: LevelErrorCode;

  public readonly levelId: string;

  public readonly location: LevelErrorLocation;

  public constructor(code: LevelErrorCode, levelId: string, message: string, location: LevelErrorLocation = {}) {
    super(`Level ${levelId}: ${message}`);
    this.name = 'LevelParseError';
    this.code = code;
    this.levelId = levelId;
    this.location = location;
  }
}

/**
 * Rejected move or placement. The engine reports it and waits for another intent.
 */
export class GridWorldError extends Error {
  public readonly code: TurnErrorCode;

  public constructor(code: TurnErrorCode, message: string) {
    super(message);
    this.name = 'GridWorldError';
    this.code = code;
  }
}

export class LevelLoadError extends Error {
  public readonly path: string;

  public constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LevelLoadError';
    this.path = path;
  }
}

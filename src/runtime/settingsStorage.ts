import { readFileSync } from 'node:fs';

export interface GameSettings {
  enemyHitPoints: number;
  showPathHints: boolean;
  showLegend: boolean;
}

export const DEFAULT_SETTINGS_FILE = 'tile-siege.settings.json';

const DEFAULT_SETTINGS: GameSettings = {
  enemyHitPoints: 5,
  showPathHints: true,
  showLegend: true,
};

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseSettings(raw: string): GameSettings {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { ...DEFAULT_SETTINGS };
  }

  if (!isRecord(parsed)) {
    return { ...DEFAULT_SETTINGS };
  }

  const hitPoints = parsed.enemyHitPoints;
  return {
    enemyHitPoints:
      typeof hitPoints === 'number' && Number.isFinite(hitPoints)
        ? clamp(Math.round(hitPoints), 1, 99)
        : DEFAULT_SETTINGS.enemyHitPoints,
    showPathHints:
      typeof parsed.showPathHints === 'boolean' ? parsed.showPathHints : DEFAULT_SETTINGS.showPathHints,
    showLegend: typeof parsed.showLegend === 'boolean' ? parsed.showLegend : DEFAULT_SETTINGS.showLegend,
  };
}

/**
 * A missing settings file is the normal case; an unreadable one falls back to defaults too.
 */
export function loadSettings(path = DEFAULT_SETTINGS_FILE): GameSettings {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf8');
  } catch {
    return { ...DEFAULT_SETTINGS };
  }

  return parseSettings(raw);
}

export function getDefaultSettings(): GameSettings {
  return { ...DEFAULT_SETTINGS };
}

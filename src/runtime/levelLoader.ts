import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { LevelLoadError } from '../core/errors';
import { parseLevelText } from '../core/levelParser';
import type { ParsedLevel } from '../core/types';

export const DEFAULT_LEVEL_PATH = fileURLToPath(new URL('../../levels/default.txt', import.meta.url));

export function levelIdFromPath(path: string): string {
  return basename(path, extname(path)) || 'level';
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export async function loadLevelFromFile(path: string = DEFAULT_LEVEL_PATH): Promise<ParsedLevel> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    const message = isMissingFile(error)
      ? `Level file not found at ${path}.`
      : `Failed to read level file ${path}: ${error instanceof Error ? error.message : String(error)}`;
    throw new LevelLoadError(path, message, { cause: error });
  }

  return parseLevelText(levelIdFromPath(path), raw);
}

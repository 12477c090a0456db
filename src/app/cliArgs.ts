import { DEFAULT_LEVEL_PATH } from '../runtime/levelLoader';
import { DEFAULT_SETTINGS_FILE } from '../runtime/settingsStorage';

export interface CliArgs {
  levelPath: string;
  settingsPath: string;
  check: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { levelPath: DEFAULT_LEVEL_PATH, settingsPath: DEFAULT_SETTINGS_FILE, check: false };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i] ?? '';
    if (token === '--check') {
      args.check = true;
    } else if (token === '--settings') {
      const next = argv[i + 1];
      if (!next || next.startsWith('--')) {
        throw new Error('--settings needs a file path.');
      }
      args.settingsPath = next;
      i += 1;
    } else if (token.startsWith('--')) {
      throw new Error(`Unknown option ${token}.`);
    } else {
      args.levelPath = token;
    }
  }

  return args;
}

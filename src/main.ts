import { createInterface, emitKeypressEvents } from 'node:readline';
import { parseArgs } from './app/cliArgs';
import { GameController } from './app/gameController';
import { lintLevel, summarizeLevel } from './editor/levelLint';
import { commandFromKeypress, commandFromLine, type KeyPress } from './runtime/keyInput';
import { loadLevelFromFile } from './runtime/levelLoader';
import { loadSettings } from './runtime/settingsStorage';
import { renderSnapshot } from './runtime/terminalView';

const CLEAR_SCREEN = '\x1b[2J\x1b[H';

function runInteractive(controller: GameController): Promise<void> {
  return new Promise((resolve) => {
    const input = process.stdin;
    emitKeypressEvents(input);
    input.setRawMode(true);

    const unsubscribe = controller.subscribe((snapshot) => {
      process.stdout.write(
        `${CLEAR_SCREEN}${renderSnapshot(snapshot.engine, {
          showPathHints: snapshot.showPathHints,
          showLegend: snapshot.settings.showLegend,
          statusMessage: snapshot.statusMessage,
        })}\n`,
      );
    });

    const onKeypress = (_chunk: string | undefined, key: KeyPress | undefined): void => {
      const command = commandFromKeypress(key);
      if (!command || controller.handleCommand(command)) {
        return;
      }

      input.off('keypress', onKeypress);
      input.setRawMode(false);
      input.pause();
      unsubscribe();
      resolve();
    };

    input.on('keypress', onKeypress);
    input.resume();
  });
}

async function runScripted(controller: GameController): Promise<void> {
  const lines = createInterface({ input: process.stdin, crlfDelay: Infinity });
  const unsubscribe = controller.subscribe((snapshot) => {
    console.log(
      renderSnapshot(snapshot.engine, {
        showPathHints: snapshot.showPathHints,
        showLegend: false,
        statusMessage: snapshot.statusMessage,
      }),
    );
  });

  try {
    for await (const line of lines) {
      const command = commandFromLine(line);
      if (!command) {
        console.error(`Unknown command: ${line.trim()}`);
        continue;
      }
      if (!controller.handleCommand(command)) {
        break;
      }
    }
  } finally {
    unsubscribe();
    lines.close();
  }
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const level = await loadLevelFromFile(args.levelPath);

  if (args.check) {
    const summary = summarizeLevel(level);
    console.log(
      `${summary.id}: ${summary.width}x${summary.height}, ${summary.enemies} enemies, ${summary.towers} towers, ` +
        `${summary.spawnEvents} spawn events, max towers ${summary.maxTowers ?? 'unlimited'}`,
    );
    for (const warning of lintLevel(level).warnings) {
      console.log(`warning: ${warning}`);
    }
    return;
  }

  const controller = new GameController(level, loadSettings(args.settingsPath));
  if (process.stdin.isTTY) {
    await runInteractive(controller);
  } else {
    await runScripted(controller);
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});

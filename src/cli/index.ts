#!/usr/bin/env node
/**
 * Terminal host for the first-to-five engine.
 *
 * Usage:
 *   first-to-five           # interactive two-player game
 *   first-to-five --demo    # replay the sample game and exit
 *
 * Rules and logging are configured through environment variables (see
 * src/cli/config/env.ts), e.g. FTF_MAX_MOVES=200 to enable a move-limit draw.
 */

import { createInterface } from 'readline';
import { GameEngine, wrapEngineError } from '../shared/engine';
import { config } from './config';
import { GameIO, HELP_TEXT, PlayGameOptions, playGame, runDemo } from './playGame';
import { logger } from './utils/logger';

export interface CliArgs {
  demo: boolean;
  help: boolean;
}

export function parseArgs(argv: string[]): CliArgs | null {
  const args: CliArgs = { demo: false, help: false };

  for (const raw of argv.slice(2)) {
    switch (raw) {
      case '--demo':
        args.demo = true;
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        // eslint-disable-next-line no-console
        console.error(`Unknown argument: ${raw}`);
        return null;
    }
  }

  return args;
}

function printUsage(): void {
  // eslint-disable-next-line no-console
  console.log(['Usage: first-to-five [--demo] [--help]', '', HELP_TEXT].join('\n'));
}

/**
 * Readline-backed {@link GameIO}. Lines are pulled through the async
 * iterator so end of input resolves as null instead of hanging.
 */
function createTerminalIO(): { io: GameIO; close: () => void } {
  const rl = createInterface({ input: process.stdin, output: process.stdout, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  const io: GameIO = {
    async readLine(prompt) {
      process.stdout.write(prompt);
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    write(text) {
      process.stdout.write(text);
    },
  };

  return { io, close: () => rl.close() };
}

export async function main(argv: string[]): Promise<number> {
  const args = parseArgs(argv);
  if (!args) {
    printUsage();
    return 2;
  }
  if (args.help) {
    printUsage();
    return 0;
  }

  const engine = new GameEngine({ rules: config.rules });
  const options: PlayGameOptions = {
    viewportPadding: config.display.viewportPadding,
    maxViewportSize: config.display.maxViewportSize,
  };

  if (args.demo) {
    runDemo(engine, { write: (text) => process.stdout.write(text) }, options);
    return 0;
  }

  const terminal = createTerminalIO();
  try {
    await playGame(engine, terminal.io, options);
  } finally {
    terminal.close();
  }
  return 0;
}

if (require.main === module) {
  main(process.argv)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      const engineError = wrapEngineError(error, 'CLI');
      logger.error('Fatal error', { error: engineError.toJSON() });
      process.exitCode = 1;
    });
}

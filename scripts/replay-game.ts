#!/usr/bin/env ts-node
/**
 * Replay a Quorum move list and print the resulting game.
 *
 * Usage (from repo root):
 *
 *   npx ts-node scripts/replay-game.ts --file games/sample.txt
 *   npx ts-node scripts/replay-game.ts --moves "1. b1-d3 g8-e6 2. ++ h7-f5"
 *
 * Move lists are whitespace-separated tokens in the selected display style.
 * Numbering tokens (`12.`) and result tokens (`1-0`, `0-1`, `½-½`) are
 * skipped, so the output of `formatMoveList` can be fed straight back in.
 */

import * as fs from 'fs';
import * as path from 'path';

import { DisplayStyleNameSchema, type DisplayStyleName } from '../src/shared/config';
import {
  DISPLAY_STYLES,
  STRICT_RULES,
  formatMoveList,
  parseMove,
  renderPosition,
  type DisplayStyle,
  type Move,
} from '../src/shared/engine';
import { isGameError } from '../src/shared/errors';
import { replayGame } from '../src/shared/replay/replayGame';
import { logger } from '../src/shared/utils/logger';

export interface CliArgs {
  filePath?: string;
  moves?: string;
  style?: DisplayStyleName;
  strict: boolean;
  quiet: boolean;
}

const RESULT_TOKENS = new Set(['1-0', '0-1', '½-½', '1/2-1/2']);
const NUMBERING_TOKEN = /^\d+\.$/;

function printUsage(): void {
  console.error(
    [
      'Usage:',
      '  npx ts-node scripts/replay-game.ts --file <path> [--style <name>] [--strict] [--quiet]',
      '  npx ts-node scripts/replay-game.ts --moves "<move list>" [--style <name>]',
      '',
      'Options:',
      '  --file <path>     Read the move list from a file',
      '  --moves <list>    Move list given inline',
      `  --style <name>    Display style (${DisplayStyleNameSchema.options.join(', ')})`,
      '  --strict          Reject partial moves and jumps from an empty square',
      '  --quiet           Print the move list only',
      '  --help            Show this message',
    ].join('\n')
  );
}

/**
 * Parse CLI arguments. Returns 'help' for --help and null (after printing
 * the problem) when the arguments are unusable.
 */
export function parseArgs(argv: string[]): CliArgs | 'help' | null {
  let filePath: string | undefined;
  let moves: string | undefined;
  let style: DisplayStyleName | undefined;
  let strict = false;
  let quiet = false;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const value = argv[i + 1];

    if (arg === '--help' || arg === '-h') {
      return 'help';
    } else if (arg === '--file' && value !== undefined) {
      filePath = path.isAbsolute(value) ? value : path.resolve(process.cwd(), value);
      i += 1;
    } else if (arg === '--moves' && value !== undefined) {
      moves = value;
      i += 1;
    } else if (arg === '--style' && value !== undefined) {
      const parsed = DisplayStyleNameSchema.safeParse(value);
      if (!parsed.success) {
        console.error(`Unknown --style value: ${value}`);
        return null;
      }
      style = parsed.data;
      i += 1;
    } else if (arg === '--strict') {
      strict = true;
    } else if (arg === '--quiet') {
      quiet = true;
    } else {
      console.error(`Unknown or incomplete argument: ${arg}`);
      return null;
    }
  }

  if ((filePath === undefined) === (moves === undefined)) {
    console.error('Exactly one of --file or --moves is required');
    return null;
  }

  return {
    ...(filePath !== undefined && { filePath }),
    ...(moves !== undefined && { moves }),
    ...(style !== undefined && { style }),
    strict,
    quiet,
  };
}

/** Parse a move list, skipping move numbers and result tokens. */
export function parseMoveTokens(text: string, style?: DisplayStyle): Move[] {
  return text
    .split(/\s+/)
    .filter((token) => token !== '' && !NUMBERING_TOKEN.test(token) && !RESULT_TOKENS.has(token))
    .map((token) => parseMove(token, style));
}

/**
 * Replay the requested game and print it. Returns the process exit code.
 */
export function runReplay(args: CliArgs): number {
  const style = args.style !== undefined ? DISPLAY_STYLES[args.style] : undefined;
  const text =
    args.filePath !== undefined ? fs.readFileSync(args.filePath, 'utf8') : (args.moves ?? '');

  const moves = parseMoveTokens(text, style);
  const result = replayGame(moves, args.strict ? { rulesOptions: STRICT_RULES } : {});
  const winner = result.winner !== 'empty' ? result.winner : undefined;

  console.log(formatMoveList(result.appliedMoves, winner, style));

  if (!args.quiet) {
    for (const position of result.positions) {
      console.log('');
      console.log(renderPosition(position, style));
    }
  }

  if (result.failure) {
    const { moveIndex, error } = result.failure;
    logger.error('Move rejected', {
      moveNumber: moveIndex + 1,
      code: error.code,
      reason: error.message,
      context: error.context,
    });
    console.error(`Move ${moveIndex + 1} rejected: ${error.message}`);
    return 1;
  }

  logger.info('Replay complete', { plies: result.final.ply, winner: result.winner });
  return 0;
}

export function main(argv: string[] = process.argv.slice(2)): void {
  const args = parseArgs(argv);
  if (args === 'help') {
    printUsage();
    return;
  }
  if (!args) {
    printUsage();
    process.exitCode = 1;
    return;
  }

  try {
    process.exitCode = runReplay(args);
  } catch (err) {
    if (!isGameError(err)) {
      throw err;
    }
    logger.error('Replay failed', { code: err.code, reason: err.message });
    console.error(err.message);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  try {
    main();
  } catch (err) {
    console.error('[replay-game] Fatal error:', err);
    process.exitCode = 1;
  }
}

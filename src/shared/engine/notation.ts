import { config, type DisplayStyleName } from '../config';
import { InvalidNotationError } from '../errors/GameDomainErrors';
import type { Move, Player, Square } from '../types/game';
import { BOARD_SIZE, createJump, createPlacement } from './core';

/**
 * Shared move-notation helpers.
 *
 * Squares are written file-then-rank (`d4`), placements as a placement token
 * (`++` in the default style) and jumps as origin, separator, target
 * (`b1-d3`). A move list is numbered two plies per line:
 *
 * ```
 *   1. b1-d3  g8-e6
 *   2. ++     e8-e4
 *   3. 0-1
 * ```
 */

export interface DisplayStyle {
  /** Symbols for a black stone, a white stone and an empty square, in that order. */
  pieces: string;
  /** Token printed for a placement move. */
  placement: string;
  /** Printed between a jump's origin and target. */
  fromToSeparator: string;
  /** Column separator between the board and the side panel. */
  sep: string;
  files: string;
  ranks: string;
}

export const DISPLAY_STYLES: Readonly<Record<DisplayStyleName, DisplayStyle>> = {
  circles: {
    pieces: '●○·',
    placement: '++',
    fromToSeparator: '-',
    sep: '⎸',
    files: 'abcdefgh',
    ranks: '12345678',
  },
  lowercase_ascii: {
    pieces: 'xo.',
    placement: '+',
    fromToSeparator: '',
    sep: '|',
    files: 'abcdefgh',
    ranks: '12345678',
  },
  uppercase_ascii: {
    pieces: 'XO.',
    placement: '+',
    fromToSeparator: '',
    sep: '|',
    files: 'ABCDEFGH',
    ranks: '12345678',
  },
  greek: {
    pieces: '●○·',
    placement: '+',
    fromToSeparator: '',
    sep: '⎸',
    files: 'αβγδεζηθ',
    ranks: '12345678',
  },
};

/** Style selected by QUORUM_DISPLAY_STYLE. */
export const getDefaultDisplayStyle = (): DisplayStyle => DISPLAY_STYLES[config.display.style];

/** Column width reserved for one move in a move list. */
export const moveWidth = (style: DisplayStyle): number =>
  Math.max(4 + [...style.fromToSeparator].length + 1, [...style.placement].length);

const symbolAt = (symbols: string, value: number): string | undefined =>
  value >= 1 && value <= BOARD_SIZE ? [...symbols][value - 1] : undefined;

export function formatSquare(sq: Square, style: DisplayStyle = getDefaultDisplayStyle()): string {
  const file = symbolAt(style.files, sq.file) ?? `<${sq.file}>`;
  const rank = symbolAt(style.ranks, sq.rank) ?? `<${sq.rank}>`;
  return `${file}${rank}`;
}

export function formatMove(move: Move, style: DisplayStyle = getDefaultDisplayStyle()): string {
  const origin = move.origin !== undefined ? formatSquare(move.origin, style) : style.placement;
  const target =
    move.target !== undefined ? `${style.fromToSeparator}${formatSquare(move.target, style)}` : '';
  return `${origin}${target}`;
}

/** Result token: 1-0 (White), 0-1 (Black), ½-½ (no winner). */
export function formatResult(winner: Player): string {
  switch (winner) {
    case 'white':
      return '1-0';
    case 'black':
      return '0-1';
    case 'empty':
      return '½-½';
  }
}

export function formatMoveList(
  moves: readonly Move[],
  result?: Player,
  style: DisplayStyle = getDefaultDisplayStyle()
): string {
  const entries = moves.map((m) => formatMove(m, style));
  if (result !== undefined) {
    entries.push(formatResult(result));
  }

  const width = moveWidth(style);
  const lines: string[] = [];
  for (let i = 0; i < entries.length; i += 2) {
    const number = `${i / 2 + 1}.`.padStart(3);
    const pair = entries.slice(i, i + 2).map((entry) => entry.padEnd(width));
    lines.push(`${number} ${pair.join(' ')}`.trimEnd());
  }
  return lines.join('\n');
}

// ═══════════════════════════════════════════════════════════════════════════
// Parsing
// ═══════════════════════════════════════════════════════════════════════════

const indexOfSymbol = (symbols: string, symbol: string): number => {
  const list = [...symbols];
  const exact = list.indexOf(symbol);
  if (exact >= 0) return exact;
  return list.findIndex((s) => s.toLowerCase() === symbol.toLowerCase());
};

export function parseSquare(text: string, style: DisplayStyle = getDefaultDisplayStyle()): Square {
  const chars = [...text.trim()];
  if (chars.length !== 2) {
    throw new InvalidNotationError(text, 'expected a file followed by a rank');
  }

  const [fileChar = '', rankChar = ''] = chars;
  const file = indexOfSymbol(style.files, fileChar);
  if (file < 0) {
    throw new InvalidNotationError(text, `unknown file "${fileChar}"`);
  }
  const rank = indexOfSymbol(style.ranks, rankChar);
  if (rank < 0) {
    throw new InvalidNotationError(text, `unknown rank "${rankChar}"`);
  }

  return { file: file + 1, rank: rank + 1 };
}

/**
 * Parse a placement (`+`, `++`, the style's placement token or an empty
 * string) or a jump (`b1-d3`, `b1d3`, or with the style's separator).
 */
export function parseMove(text: string, style: DisplayStyle = getDefaultDisplayStyle()): Move {
  const trimmed = text.trim();
  if (trimmed === '' || trimmed === style.placement || /^\+{1,2}$/.test(trimmed)) {
    return createPlacement();
  }

  let squares = trimmed;
  if (style.fromToSeparator !== '') {
    squares = squares.split(style.fromToSeparator).join('');
  }
  squares = squares.replace(/-/g, '');

  const chars = [...squares];
  if (chars.length !== 4) {
    throw new InvalidNotationError(text, 'expected a placement or two squares');
  }

  const origin = parseSquare(chars.slice(0, 2).join(''), style);
  const target = parseSquare(chars.slice(2).join(''), style);
  return createJump(origin, target);
}


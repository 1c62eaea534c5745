/**
 * Test Fixtures and Utilities
 * Common board builders and square helpers for engine tests
 */

import { BOARD_SIZE, pieceOf, square } from '../../src/shared/engine';
import type { Board, Piece, Player, Square } from '../../src/shared/engine';

const FILES = 'abcdefgh';

const DIAGRAM_CELLS: Record<string, Player> = {
  x: 'black',
  o: 'white',
  '.': 'empty',
};

/**
 * Square helper - sq('d4') === { file: 4, rank: 4 }
 */
export function sq(name: string): Square {
  const match = /^([a-h])([1-8])$/.exec(name);
  if (!match) {
    throw new Error(`Bad square name in test: ${name}`);
  }
  return square(FILES.indexOf(match[1]) + 1, Number(match[2]));
}

/**
 * Builds a board from eight rows, rank 8 first. `x` is Black, `o` is White,
 * `.` is empty; spaces are ignored.
 *
 *   boardFromDiagram([
 *     'x o . . . . . .',
 *     ...
 *   ])
 */
export function boardFromDiagram(rows: readonly string[]): Board {
  if (rows.length !== BOARD_SIZE) {
    throw new Error(`Diagram needs ${BOARD_SIZE} rows, got ${rows.length}`);
  }

  return rows.flatMap((row): Piece[] => {
    const cells = row.replace(/\s+/g, '').split('');
    if (cells.length !== BOARD_SIZE) {
      throw new Error(`Diagram row "${row}" needs ${BOARD_SIZE} cells`);
    }
    return cells.map((cell) => {
      const player = DIAGRAM_CELLS[cell];
      if (player === undefined) {
        throw new Error(`Unknown diagram cell "${cell}"`);
      }
      return pieceOf(player);
    });
  });
}

export function emptyBoard(): Board {
  return boardFromDiagram(Array.from({ length: BOARD_SIZE }, () => '........'));
}

/** Owner of every square, rank 8 first, as a compact diagram. */
export function diagramOf(board: Board): string[] {
  const symbols: Record<Player, string> = { black: 'x', white: 'o', empty: '.' };
  const rows: string[] = [];
  for (let start = 0; start < board.length; start += BOARD_SIZE) {
    rows.push(
      board
        .slice(start, start + BOARD_SIZE)
        .map((piece) => symbols[piece.player])
        .join('')
    );
  }
  return rows;
}

export function countStones(board: Board, player: Player): number {
  return board.filter((piece) => piece.player === player).length;
}

import { Board, Square, StoneColor, pieceOf, playerFromValue } from '../types/game';
import { BOARD_TABLES } from './boardTables';
import { square } from './core';

/**
 * Squares on which each side generates new stones with a placement move.
 * Black's sit in the h8 corner, White's mirror them in the a1 corner.
 */
export const HOME_SQUARES: Readonly<Record<StoneColor, readonly Square[]>> = {
  black: [square(8, 8), square(8, 7), square(7, 8), square(7, 7)],
  white: [square(1, 1), square(1, 2), square(2, 1), square(2, 2)],
};

/** d4, d5, e4, e5: holding all four wins the game. */
export const CENTER_SQUARES: readonly Square[] = [
  square(4, 4),
  square(4, 5),
  square(5, 4),
  square(5, 5),
];

/** Fresh copy of the fixed opening layout (ten stones per side). */
export function createInitialBoard(): Board {
  return BOARD_TABLES.startLayout.map((value) => pieceOf(playerFromValue(value)));
}

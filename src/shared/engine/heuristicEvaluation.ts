import { Board, pieceValue } from '../types/game';
import { BOARD_TABLES } from './boardTables';
import { assertBoardShape } from './core';

/**
 * Static positional evaluation: each stone's signed value times the weight
 * of its square, summed over the board and scaled by 1/10. Centre squares
 * weigh 10, the rim 1. Positive favours White.
 *
 * Purely informational; no rule consults it.
 */
export function evaluateStatic(
  board: Board,
  weights: readonly number[] = BOARD_TABLES.pieceWeights
): number {
  assertBoardShape(board);
  let total = 0;
  board.forEach((piece, index) => {
    total += pieceValue(piece) * (weights[index] ?? 0);
  });
  return total / 10;
}

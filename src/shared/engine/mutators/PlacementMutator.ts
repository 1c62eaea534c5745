import { Board, Piece, Square, StoneColor, pieceOf } from '../../types/game';
import { setPiece } from '../core';
import { getEmptyHomeSquares } from '../validators/PlacementValidator';

export interface PlacementOutcome {
  board: Piece[];
  filled: Square[];
}

/**
 * Canonical board-level placement mutator: every empty home square of
 * `player` receives a new stone in a single move. Returns a new board;
 * `board` is left untouched.
 */
export function applyPlacementOnBoard(board: Board, player: StoneColor): PlacementOutcome {
  const filled = getEmptyHomeSquares(board, player);
  const working = [...board];
  for (const sq of filled) {
    setPiece(working, sq, pieceOf(player));
  }
  return { board: working, filled };
}

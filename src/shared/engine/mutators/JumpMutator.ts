import { Board, EMPTY_PIECE, Piece, Square, StoneColor, pieceOf } from '../../types/game';
import { setPiece } from '../core';
import { findConversions, findSuffocatedStones } from '../captureLogic';
import type { JumpSquares } from '../validators/JumpValidator';

export interface JumpOutcome {
  board: Piece[];
  suffocated: Square[];
  converted: Square[];
}

/**
 * Board-level jump mutator. Assumes the jump was validated against `board`.
 *
 * Returns a fresh board where the origin's piece has moved to the target,
 * then suffocated opponent stones next to the target are removed and
 * flanked opponent stones are converted to `mover`. Capture scans read the
 * board as it stood right after the stone landed; `board` itself is never
 * written.
 */
export function applyJumpOnBoard(board: Board, squares: JumpSquares, mover: StoneColor): JumpOutcome {
  const working = [...board];
  setPiece(working, squares.target, squares.originPiece);
  setPiece(working, squares.origin, EMPTY_PIECE);

  const landed: Board = [...working];
  const suffocated = findSuffocatedStones(landed, squares.target, mover);
  const converted = findConversions(landed, squares.target, mover);

  for (const sq of suffocated) {
    setPiece(working, sq, EMPTY_PIECE);
  }
  for (const sq of converted) {
    setPiece(working, sq, pieceOf(mover));
  }

  return { board: working, suffocated, converted };
}

import { Board, Square, StoneColor, ValidationResult, isEmptyPiece } from '../../types/game';
import { getPiece } from '../core';
import { HOME_SQUARES } from '../initialState';

/** Home squares of `player` that are currently unoccupied. */
export function getEmptyHomeSquares(board: Board, player: StoneColor): Square[] {
  return HOME_SQUARES[player].filter((sq) => isEmptyPiece(getPiece(board, sq)));
}

/**
 * A placement is legal while at least one of the mover's home squares is
 * empty. Turn order is the caller's concern.
 */
export function validatePlacement(board: Board, player: StoneColor): ValidationResult {
  if (getEmptyHomeSquares(board, player).length === 0) {
    return {
      valid: false,
      reason: 'At least one home square must be empty',
      code: 'HOME_SQUARES_FULL',
    };
  }
  return { valid: true };
}

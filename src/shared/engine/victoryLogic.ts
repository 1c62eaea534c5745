import { Board, Player, pieceValue, playerFromValue } from '../types/game';
import { getPiece } from './core';
import { CENTER_SQUARES } from './initialState';

export const QUORUM = CENTER_SQUARES.length;

/**
 * Signed sum of the centre squares' values, in [-4, 4]. Positive favours
 * White, negative favours Black.
 */
export function computeWinProgress(board: Board): number {
  return CENTER_SQUARES.reduce((sum, sq) => sum + pieceValue(getPiece(board, sq)), 0);
}

/**
 * The player holding all four centre squares, or 'empty' while the centre
 * is contested or unoccupied.
 */
export function evaluateWinner(board: Board): Player {
  const progress = computeWinProgress(board);
  if (Math.abs(progress) === QUORUM) {
    return playerFromValue(progress);
  }
  return 'empty';
}

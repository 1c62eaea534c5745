import { Board, Square, StoneColor, isEmptyPiece, opponentOf } from '../types/game';
import {
  SQUARE_MOORE_DIRECTIONS,
  addSquares,
  getPiece,
  isInBounds,
  midpoint,
  neighborsInBounds,
} from './core';

/**
 * Post-jump capture rules. Both scans read a single board snapshot taken
 * right after the jumping stone lands, so neither rule sees the other's
 * effects and suffocations never cascade within one move.
 */

/** True when at least one in-bounds neighbour of `sq` is empty. */
export function hasEmptyNeighbor(board: Board, sq: Square): boolean {
  return neighborsInBounds(sq).some((n) => isEmptyPiece(getPiece(board, n)));
}

/**
 * Opponent stones adjacent to `target` left with no empty neighbour.
 * The board edge counts as neither empty nor occupied.
 */
export function findSuffocatedStones(board: Board, target: Square, mover: StoneColor): Square[] {
  const opponent = opponentOf(mover);
  return neighborsInBounds(target).filter(
    (n) => getPiece(board, n).player === opponent && !hasEmptyNeighbor(board, n)
  );
}

/**
 * Opponent stones sandwiched between `target` and a mover stone two squares
 * further along the same direction. Directions whose far square is off the
 * board are skipped.
 */
export function findConversions(board: Board, target: Square, mover: StoneColor): Square[] {
  const converted: Square[] = [];

  for (const [df, dr] of SQUARE_MOORE_DIRECTIONS) {
    const far = addSquares(target, [df * 2, dr * 2]);
    if (!isInBounds(far)) {
      continue;
    }

    const mid = midpoint(far, target);
    const midPiece = getPiece(board, mid);
    if (isEmptyPiece(midPiece) || midPiece.player === mover) {
      continue;
    }

    if (opponentOf(midPiece.player) === getPiece(board, far).player) {
      converted.push(mid);
    }
  }

  return converted;
}

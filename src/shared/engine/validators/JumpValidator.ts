import {
  Board,
  Move,
  Piece,
  ResolvedRulesOptions,
  Square,
  ValidationResult,
  isEmptyPiece,
  pieceValue,
} from '../../types/game';
import { getPiece, isInBounds, midpoint } from '../core';

/** The three squares a jump touches, with the pieces currently on them. */
export interface JumpSquares {
  origin: Square;
  center: Square;
  target: Square;
  originPiece: Piece;
  centerPiece: Piece;
  targetPiece: Piece;
}

export type JumpValidationResult =
  | { valid: true; squares: JumpSquares }
  | { valid: false; reason: string; code: string; squares?: JumpSquares };

/**
 * Resolve origin/center/target for a jump-shaped move, or undefined. The
 * center is always re-derived from origin and target.
 */
export function resolveJumpSquares(
  move: Move
): { origin: Square; center: Square; target: Square } | undefined {
  const { origin, target } = move;
  if (origin === undefined || target === undefined) {
    return undefined;
  }
  return { origin, center: midpoint(origin, target), target };
}

/**
 * Jump legality on a concrete board.
 *
 * Pieces are compared through their signed values (black -1, empty 0,
 * white +1): the jump is legal exactly when `origin - center == target == 0`,
 * i.e. origin and center hold the same value and the target is empty. With
 * `emptyOriginJumps: 'allow'` this admits an empty origin over an empty
 * center; 'reject' additionally requires a stone at the origin.
 */
export function validateJump(
  board: Board,
  move: Move,
  options: ResolvedRulesOptions
): JumpValidationResult {
  const resolved = resolveJumpSquares(move);
  if (resolved === undefined) {
    return { valid: false, reason: 'A jump needs an origin and a target', code: 'NOT_A_JUMP' };
  }

  const { origin, center, target } = resolved;
  for (const sq of [origin, center, target]) {
    if (!isInBounds(sq)) {
      return {
        valid: false,
        reason: `Square (${sq.file}, ${sq.rank}) is off the board`,
        code: 'OFF_BOARD',
      };
    }
  }

  const squares: JumpSquares = {
    ...resolved,
    originPiece: getPiece(board, origin),
    centerPiece: getPiece(board, center),
    targetPiece: getPiece(board, target),
  };

  const o = pieceValue(squares.originPiece);
  const c = pieceValue(squares.centerPiece);
  const t = pieceValue(squares.targetPiece);

  if (!(o - c === t && t === 0)) {
    return {
      valid: false,
      reason: 'Origin and center must hold the same player, and target must be empty',
      code: 'OWNERSHIP_MISMATCH',
      squares,
    };
  }

  if (options.emptyOriginJumps === 'reject' && isEmptyPiece(squares.originPiece)) {
    return {
      valid: false,
      reason: 'Origin must hold a stone',
      code: 'EMPTY_ORIGIN',
      squares,
    };
  }

  return { valid: true, squares };
}

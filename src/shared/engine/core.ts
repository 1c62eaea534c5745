import {
  Board,
  Move,
  MoveKind,
  Piece,
  Square,
  SquareDelta,
  type Player,
} from '../types/game';
import { InvalidSquareError, InvariantViolationError } from '../errors/GameDomainErrors';

/**
 * Shared, side-effect-free geometry and board helpers for the Quorum engine.
 *
 * Squares are plain `{ file, rank }` values with 1-based components. The board
 * is a flat array of 64 pieces indexed by `file - 8 * rank + 63`, which puts
 * a8 at 0, h8 at 7, a1 at 56 and h1 at 63 (row-major from rank 8 down).
 * Every lookup must go through `isInBounds` first: out-of-bounds squares are
 * legitimate intermediate values in neighbour and flank scans.
 */

export const BOARD_SIZE = 8;
export const BOARD_CELLS = BOARD_SIZE * BOARD_SIZE;

/**
 * Canonical 8-direction Moore neighbourhood as (Δfile, Δrank) pairs.
 * Iteration order only affects scan order, never outcomes.
 */
export const SQUARE_MOORE_DIRECTIONS: readonly SquareDelta[] = [
  [-1, -1],
  [-1, 0],
  [-1, 1],
  [0, 1],
  [1, 1],
  [1, 0],
  [1, -1],
  [0, -1],
];

export const square = (file: number, rank: number): Square => ({ file, rank });

const isDelta = (value: Square | SquareDelta): value is SquareDelta => Array.isArray(value);

/** Component-wise sum. The result may lie off the board. */
export function addSquares(a: Square, b: Square | SquareDelta): Square {
  if (isDelta(b)) {
    return { file: a.file + b[0], rank: a.rank + b[1] };
  }
  return { file: a.file + b.file, rank: a.rank + b.rank };
}

/** Floor division of both components by an integer scalar. */
export function divideSquare(sq: Square, divisor: number): Square {
  if (!Number.isInteger(divisor) || divisor === 0) {
    throw new InvariantViolationError('A square can only be divided by a non-zero integer', {
      divisor,
    });
  }
  return { file: Math.floor(sq.file / divisor), rank: Math.floor(sq.rank / divisor) };
}

/**
 * Line centre of two squares. Only meaningful when the displacement is even
 * in both components; otherwise the floored value is returned as-is.
 */
export const midpoint = (a: Square, b: Square): Square => divideSquare(addSquares(a, b), 2);

export const isInBounds = (sq: Square): boolean =>
  sq.file >= 1 && sq.file <= BOARD_SIZE && sq.rank >= 1 && sq.rank <= BOARD_SIZE;

export const squaresEqual = (a: Square, b: Square): boolean =>
  a.file === b.file && a.rank === b.rank;

/** True when `b` is two steps from `a` along one of the eight directions. */
export function isJumpDisplacement(a: Square, b: Square): boolean {
  const df = Math.abs(b.file - a.file);
  const dr = Math.abs(b.rank - a.rank);
  return (df === 0 || df === 2) && (dr === 0 || dr === 2) && df + dr > 0;
}

export function squareIndex(sq: Square): number {
  if (!Number.isInteger(sq.file) || !Number.isInteger(sq.rank) || !isInBounds(sq)) {
    throw new InvalidSquareError(sq.file, sq.rank);
  }
  return sq.file - BOARD_SIZE * sq.rank + (BOARD_CELLS - 1);
}

export function squareFromIndex(index: number): Square {
  if (!Number.isInteger(index) || index < 0 || index >= BOARD_CELLS) {
    throw new InvariantViolationError(`Board index ${index} is outside 0..${BOARD_CELLS - 1}`, {
      index,
    });
  }
  return {
    file: (index % BOARD_SIZE) + 1,
    rank: BOARD_SIZE - Math.floor(index / BOARD_SIZE),
  };
}

/** In-bounds Moore neighbours of a square. */
export const neighborsInBounds = (sq: Square): Square[] =>
  SQUARE_MOORE_DIRECTIONS.map((d) => addSquares(sq, d)).filter(isInBounds);

export const getPiece = (board: Board, sq: Square): Piece => {
  const piece = board[squareIndex(sq)];
  if (piece === undefined) {
    throw new InvariantViolationError('Board has no piece at an in-bounds index', {
      file: sq.file,
      rank: sq.rank,
      length: board.length,
    });
  }
  return piece;
};

export const getOwner = (board: Board, sq: Square): Player => getPiece(board, sq).player;

export function setPiece(board: Piece[], sq: Square, piece: Piece): void {
  board[squareIndex(sq)] = piece;
}

export function assertBoardShape(board: Board): void {
  if (board.length !== BOARD_CELLS) {
    throw new InvariantViolationError(
      `A board must hold exactly ${BOARD_CELLS} pieces, got ${board.length}`,
      { length: board.length }
    );
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// Moves
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Build a move from optional origin/target squares. The centre is derived
 * only when both are present; the displacement is not validated here.
 */
export function createMove(origin?: Square, target?: Square): Move {
  const center = origin !== undefined && target !== undefined ? midpoint(origin, target) : undefined;
  return { origin, target, center };
}

export const createPlacement = (): Move => createMove();

export const createJump = (origin: Square, target: Square): Move => createMove(origin, target);

export function getMoveKind(move: Move): MoveKind {
  if (move.origin === undefined && move.target === undefined) {
    return 'placement';
  }
  if (move.origin !== undefined && move.target !== undefined) {
    return 'jump';
  }
  return 'partial';
}

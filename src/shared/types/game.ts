import { InvariantViolationError } from '../errors/GameDomainErrors';

/**
 * Ownership of a square. 'empty' is a sentinel describing an unoccupied
 * square (or, for `winner`, an undecided game); it never moves.
 */
export type Player = 'black' | 'white' | 'empty';

/** A participating side. */
export type StoneColor = Exclude<Player, 'empty'>;

/** Signed projection of a Player used only in sums and legality arithmetic. */
export type PlayerValue = -1 | 0 | 1;

export interface Piece {
  readonly player: Player;
}

/**
 * Board coordinate. Files and ranks are 1-based (a1 = { file: 1, rank: 1 }).
 * Out-of-bounds values are representable; check with `isInBounds` before
 * indexing a board.
 */
export interface Square {
  readonly file: number;
  readonly rank: number;
}

/** A (Δfile, Δrank) offset. */
export type SquareDelta = readonly [number, number];

/**
 * A placement carries neither origin nor target. A jump carries both, plus
 * the derived `center` (midpoint) square. Anything else is a partial move.
 */
export interface Move {
  readonly origin?: Square | undefined;
  readonly target?: Square | undefined;
  readonly center?: Square | undefined;
}

export type MoveKind = 'placement' | 'jump' | 'partial';

/** 64 pieces ordered rank 8 → rank 1, file a → h. */
export type Board = readonly Piece[];

export type PartialMoveHandling = 'pass' | 'reject';
export type EmptyOriginJumpHandling = 'allow' | 'reject';

/**
 * Per-game rule switches for the two behaviours the rules leave open.
 * Omitted fields fall back to the configured defaults.
 */
export interface RulesOptions {
  /**
   * 'pass' treats a move with only an origin or only a target as a pass
   * (ply and last move update, board untouched); 'reject' raises
   * PartialMoveError.
   */
  partialMoves?: PartialMoveHandling;
  /**
   * 'allow' keeps the arithmetic jump check as-is, which accepts an empty
   * origin over an empty midpoint; 'reject' also requires a stone at the
   * origin.
   */
  emptyOriginJumps?: EmptyOriginJumpHandling;
}

export type ResolvedRulesOptions = Required<RulesOptions>;

export type ValidationResult = { valid: true } | { valid: false; reason: string; code: string };

// ═══════════════════════════════════════════════════════════════════════════
// Player / Piece helpers
// ═══════════════════════════════════════════════════════════════════════════

const PLAYER_VALUES: Record<Player, PlayerValue> = {
  black: -1,
  empty: 0,
  white: 1,
};

export const playerValue = (player: Player): PlayerValue => PLAYER_VALUES[player];

export const playerFromValue = (value: number): Player => {
  if (value < 0) return 'black';
  if (value > 0) return 'white';
  return 'empty';
};

export function opponentOf(player: Player): StoneColor {
  if (player === 'empty') {
    throw new InvariantViolationError('Cannot take the opponent of an empty square', {
      player,
    });
  }
  return player === 'black' ? 'white' : 'black';
}

export const isStoneColor = (player: Player): player is StoneColor => player !== 'empty';

const PIECES: Record<Player, Piece> = {
  black: Object.freeze({ player: 'black' }),
  white: Object.freeze({ player: 'white' }),
  empty: Object.freeze({ player: 'empty' }),
};

/** Shared, frozen piece instance for a player. */
export const pieceOf = (player: Player): Piece => PIECES[player];

export const EMPTY_PIECE: Piece = PIECES.empty;

export const isEmptyPiece = (piece: Piece): boolean => piece.player === 'empty';

export const pieceValue = (piece: Piece): PlayerValue => playerValue(piece.player);

export const opponentPiece = (piece: Piece): Piece => pieceOf(opponentOf(piece.player));

export const playerLabel = (player: Player): string =>
  player.charAt(0).toUpperCase() + player.slice(1);

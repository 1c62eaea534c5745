/**
 * Game Domain Errors - Structured error types for the Quorum rules engine
 *
 * Every failure surfaced by the engine, the notation layer and the replay
 * helpers is a {@link GameError} carrying a stable {@link GameErrorCode} and a
 * context record describing the squares and pieces involved.
 *
 * Error Categories:
 * - **Move Errors**: rejected placements and jumps. These are recoverable; the
 *   Position the move was applied to is unchanged.
 * - **Square/Notation Errors**: board indexing and text parsing failures.
 * - **Game State Errors**: moves issued after the game has been decided.
 * - **Internal Errors**: invariant violations and configuration failures.
 *
 * Usage:
 * ```typescript
 * import { GameError, HomeSquaresFullError } from './GameDomainErrors';
 *
 * try {
 *   next = position.move(createPlacement());
 * } catch (error) {
 *   if (error instanceof GameError) {
 *     console.log(error.code, error.context);
 *   }
 * }
 * ```
 *
 * @module GameDomainErrors
 */

// ═══════════════════════════════════════════════════════════════════════════
// ERROR CODES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Enumeration of all game domain error codes.
 *
 * Error codes are prefixed by category:
 * - GAME_*: General game state errors
 * - MOVE_*: Move-related errors
 * - SQUARE_* / NOTATION_*: Coordinate and text errors
 */
export enum GameErrorCode {
  // Game State Errors
  GAME_ALREADY_COMPLETED = 'GAME_ALREADY_COMPLETED',

  // Move Errors
  MOVE_HOME_SQUARES_FULL = 'MOVE_HOME_SQUARES_FULL',
  MOVE_ILLEGAL_JUMP = 'MOVE_ILLEGAL_JUMP',
  MOVE_PARTIAL = 'MOVE_PARTIAL',

  // Square / Notation Errors
  SQUARE_OUT_OF_BOUNDS = 'SQUARE_OUT_OF_BOUNDS',
  NOTATION_INVALID = 'NOTATION_INVALID',

  // Internal Errors
  INVARIANT_VIOLATION = 'INVARIANT_VIOLATION',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

// ═══════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base class for all game domain errors.
 *
 * Provides:
 * - Structured error code
 * - Context for debugging
 * - Serialization for logs and tooling
 */
export class GameError extends Error {
  /** Error code for programmatic handling */
  readonly code: GameErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Whether this error is fatal (the caller cannot retry with another move) */
  readonly isFatal: boolean;

  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(
    code: GameErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    isFatal: boolean = false
  ) {
    super(message);
    this.name = 'GameError';
    this.code = code;
    this.context = context;
    this.isFatal = isFatal;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, GameError.prototype);
  }

  /** Serialize to a JSON-safe object */
  toJSON(): GameErrorJSON {
    return {
      error: true,
      code: this.code,
      message: this.message,
      context: this.context,
      isFatal: this.isFatal,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of a GameError.
 */
export interface GameErrorJSON {
  error: true;
  code: string;
  message: string;
  context: Record<string, unknown>;
  isFatal: boolean;
  timestamp: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// SPECIFIC ERROR CLASSES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Placement attempted while every home square of the mover is occupied.
 */
export class HomeSquaresFullError extends GameError {
  constructor(player: string, context: Record<string, unknown> = {}) {
    super(
      GameErrorCode.MOVE_HOME_SQUARES_FULL,
      `Home squares full: ${player} needs at least one empty home square to place`,
      { player, ...context },
      false
    );
    this.name = 'HomeSquaresFullError';
    Object.setPrototypeOf(this, HomeSquaresFullError.prototype);
  }
}

/**
 * Jump whose origin, midpoint and target fail the ownership-and-emptiness
 * check.
 */
export class IllegalJumpError extends GameError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.MOVE_ILLEGAL_JUMP, message, context, false);
    this.name = 'IllegalJumpError';
    Object.setPrototypeOf(this, IllegalJumpError.prototype);
  }
}

/**
 * Move carrying only an origin or only a target, under strict rules.
 */
export class PartialMoveError extends GameError {
  constructor(context: Record<string, unknown> = {}) {
    super(
      GameErrorCode.MOVE_PARTIAL,
      'A move needs both an origin and a target (jump) or neither (placement)',
      context,
      false
    );
    this.name = 'PartialMoveError';
    Object.setPrototypeOf(this, PartialMoveError.prototype);
  }
}

/**
 * Board access with a square outside the 8x8 grid.
 */
export class InvalidSquareError extends GameError {
  constructor(file: number, rank: number, context: Record<string, unknown> = {}) {
    super(
      GameErrorCode.SQUARE_OUT_OF_BOUNDS,
      `Square (${file}, ${rank}) is outside the board`,
      { file, rank, ...context },
      false
    );
    this.name = 'InvalidSquareError';
    Object.setPrototypeOf(this, InvalidSquareError.prototype);
  }
}

/**
 * Square or move text that cannot be parsed.
 */
export class InvalidNotationError extends GameError {
  constructor(text: string, reason: string, context: Record<string, unknown> = {}) {
    super(
      GameErrorCode.NOTATION_INVALID,
      `Invalid notation "${text}": ${reason}`,
      { text, reason, ...context },
      false
    );
    this.name = 'InvalidNotationError';
    Object.setPrototypeOf(this, InvalidNotationError.prototype);
  }
}

/**
 * Move supplied after one player already holds all four centre squares.
 */
export class GameAlreadyCompletedError extends GameError {
  constructor(winner: string, context: Record<string, unknown> = {}) {
    super(
      GameErrorCode.GAME_ALREADY_COMPLETED,
      `Game is already over: ${winner} wins by quorum`,
      { winner, ...context },
      false
    );
    this.name = 'GameAlreadyCompletedError';
    Object.setPrototypeOf(this, GameAlreadyCompletedError.prototype);
  }
}

/**
 * Internal invariant broken (e.g. opponent of Empty, malformed board).
 */
export class InvariantViolationError extends GameError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.INVARIANT_VIOLATION, message, context, true);
    this.name = 'InvariantViolationError';
    Object.setPrototypeOf(this, InvariantViolationError.prototype);
  }
}

/**
 * Invalid environment settings or board tables.
 */
export class ConfigurationError extends GameError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.CONFIGURATION_ERROR, message, context, true);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Check if an error is a GameError.
 */
export function isGameError(error: unknown): error is GameError {
  return error instanceof GameError;
}

/**
 * Check if an error is fatal.
 */
export function isFatalError(error: unknown): boolean {
  return isGameError(error) && error.isFatal;
}

/**
 * Wrap an unknown error in a GameError.
 */
export function wrapError(error: unknown, context: Record<string, unknown> = {}): GameError {
  if (isGameError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new GameError(GameErrorCode.INTERNAL_ERROR, message, {
    ...context,
    originalStack: stack,
  });
}

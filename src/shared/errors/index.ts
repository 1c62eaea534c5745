/**
 * Shared Errors Module
 *
 * This module exports structured error types for consistent error handling
 * across the Quorum engine, notation and replay layers.
 *
 * @module errors
 */

export {
  // Error codes
  GameErrorCode,
  // Base class
  GameError,
  type GameErrorJSON,
  // Specific errors
  HomeSquaresFullError,
  IllegalJumpError,
  PartialMoveError,
  InvalidSquareError,
  InvalidNotationError,
  GameAlreadyCompletedError,
  InvariantViolationError,
  ConfigurationError,
  // Utilities
  isGameError,
  isFatalError,
  wrapError,
} from './GameDomainErrors';

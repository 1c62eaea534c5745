// =============================================================================
// QUORUM RULES ENGINE - PUBLIC API
// =============================================================================
// Tools and tests should import the engine through this file rather than
// reaching into individual modules.
// =============================================================================

// =============================================================================
// CORE TYPES
// =============================================================================

export type {
  Board,
  EmptyOriginJumpHandling,
  Move,
  MoveKind,
  PartialMoveHandling,
  Piece,
  Player,
  PlayerValue,
  ResolvedRulesOptions,
  RulesOptions,
  Square,
  SquareDelta,
  StoneColor,
  ValidationResult,
} from '../types/game';

export {
  EMPTY_PIECE,
  isEmptyPiece,
  isStoneColor,
  opponentOf,
  opponentPiece,
  pieceOf,
  pieceValue,
  playerFromValue,
  playerLabel,
  playerValue,
} from '../types/game';

// =============================================================================
// GEOMETRY & BOARD ACCESS
// =============================================================================

export {
  BOARD_CELLS,
  BOARD_SIZE,
  SQUARE_MOORE_DIRECTIONS,
  addSquares,
  createJump,
  createMove,
  createPlacement,
  divideSquare,
  getMoveKind,
  getOwner,
  getPiece,
  isInBounds,
  isJumpDisplacement,
  midpoint,
  neighborsInBounds,
  square,
  squareFromIndex,
  squareIndex,
  squaresEqual,
} from './core';

export { BOARD_TABLES, parseBoardTables } from './boardTables';
export type { BoardTables } from './boardTables';
export { CENTER_SQUARES, HOME_SQUARES, createInitialBoard } from './initialState';

// =============================================================================
// RULES
// =============================================================================

export { getEmptyHomeSquares, validatePlacement } from './validators/PlacementValidator';
export { resolveJumpSquares, validateJump } from './validators/JumpValidator';
export type { JumpSquares, JumpValidationResult } from './validators/JumpValidator';
export { applyPlacementOnBoard } from './mutators/PlacementMutator';
export type { PlacementOutcome } from './mutators/PlacementMutator';
export { applyJumpOnBoard } from './mutators/JumpMutator';
export type { JumpOutcome } from './mutators/JumpMutator';
export { findConversions, findSuffocatedStones, hasEmptyNeighbor } from './captureLogic';
export { QUORUM, computeWinProgress, evaluateWinner } from './victoryLogic';
export { evaluateStatic } from './heuristicEvaluation';
export { STRICT_RULES, resolveRulesOptions } from './rulesConfig';

// =============================================================================
// POSITION
// =============================================================================

export { Position, applyMove } from './Position';
export type { PositionInit } from './Position';

// =============================================================================
// NOTATION & RENDERING
// =============================================================================

export {
  DISPLAY_STYLES,
  formatMove,
  formatMoveList,
  formatResult,
  formatSquare,
  getDefaultDisplayStyle,
  moveWidth,
  parseMove,
  parseSquare,
} from './notation';
export type { DisplayStyle } from './notation';
export { describePosition, pieceSymbol, renderPosition } from './boardRenderer';

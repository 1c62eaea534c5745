import {
  Board,
  Move,
  Piece,
  Player,
  ResolvedRulesOptions,
  RulesOptions,
  Square,
  StoneColor,
} from '../types/game';
import {
  HomeSquaresFullError,
  IllegalJumpError,
  InvariantViolationError,
  PartialMoveError,
} from '../errors/GameDomainErrors';
import { logger } from '../utils/logger';
import { BOARD_SIZE, assertBoardShape, getMoveKind, getPiece } from './core';
import { createInitialBoard } from './initialState';
import { resolveRulesOptions } from './rulesConfig';
import { validatePlacement } from './validators/PlacementValidator';
import { validateJump } from './validators/JumpValidator';
import { applyPlacementOnBoard } from './mutators/PlacementMutator';
import { applyJumpOnBoard } from './mutators/JumpMutator';
import { computeWinProgress, evaluateWinner } from './victoryLogic';
import { evaluateStatic } from './heuristicEvaluation';

export interface PositionInit {
  /** 64 pieces, rank 8 first. Defaults to the opening layout. */
  board?: Board;
  ply?: number;
  lastMove?: Move;
  rulesOptions?: RulesOptions;
}

const formatSquare = (sq: Square | undefined): string | undefined =>
  sq === undefined ? undefined : `${sq.file},${sq.rank}`;

/**
 * Immutable Quorum game state: board, ply counter and last move.
 *
 * Ply 0 is the opening position with White to move; White moves on even
 * plies and Black on odd ones. `move` never mutates the receiver: it reads
 * from this position's frozen board and returns a new Position built on a
 * fresh copy, so earlier positions stay valid snapshots of game history.
 *
 * The engine does not stop play once a side holds the centre; callers
 * should check `winner` before issuing further moves.
 */
export class Position {
  readonly board: Board;
  readonly ply: number;
  readonly lastMove: Move | undefined;
  readonly rulesOptions: ResolvedRulesOptions;

  constructor(init: PositionInit = {}) {
    const board = init.board ?? createInitialBoard();
    assertBoardShape(board);

    const ply = init.ply ?? 0;
    if (!Number.isInteger(ply) || ply < 0) {
      throw new InvariantViolationError(`Ply must be a non-negative integer, got ${ply}`, { ply });
    }

    this.board = Object.freeze([...board]);
    this.ply = ply;
    this.lastMove = init.lastMove;
    this.rulesOptions = resolveRulesOptions(init.rulesOptions);
  }

  /** The opening position. */
  static initial(rulesOptions?: RulesOptions): Position {
    return new Position({ rulesOptions });
  }

  get toMove(): StoneColor {
    return this.ply % 2 === 0 ? 'white' : 'black';
  }

  /** Conventional move number for display: plies 0 and 1 are move 1. */
  get wholeMove(): number {
    return Math.floor(this.ply / 2) + 1;
  }

  get winProgress(): number {
    return computeWinProgress(this.board);
  }

  get winner(): Player {
    return evaluateWinner(this.board);
  }

  get staticEvaluation(): number {
    return evaluateStatic(this.board);
  }

  pieceAt(sq: Square): Piece {
    return getPiece(this.board, sq);
  }

  /** Board rows from rank 8 down to rank 1, each from file a to h. */
  rows(): Piece[][] {
    const rows: Piece[][] = [];
    for (let start = 0; start < this.board.length; start += BOARD_SIZE) {
      rows.push(this.board.slice(start, start + BOARD_SIZE));
    }
    return rows;
  }

  /**
   * Apply `move` for the side to move and return the resulting position.
   *
   * @throws HomeSquaresFullError placement with no empty home square
   * @throws IllegalJumpError jump failing the ownership/emptiness check
   * @throws PartialMoveError half-specified move under `partialMoves: 'reject'`
   */
  move(move: Move): Position {
    const mover = this.toMove;
    const kind = getMoveKind(move);
    let board: Board = this.board;

    switch (kind) {
      case 'placement': {
        const validation = validatePlacement(this.board, mover);
        if (!validation.valid) {
          logger.debug('Placement rejected', { ply: this.ply, mover, code: validation.code });
          throw new HomeSquaresFullError(mover, { ply: this.ply });
        }
        const outcome = applyPlacementOnBoard(this.board, mover);
        board = outcome.board;
        logger.debug('Placement applied', {
          ply: this.ply,
          mover,
          filled: outcome.filled.map(formatSquare),
        });
        break;
      }

      case 'jump': {
        const validation = validateJump(this.board, move, this.rulesOptions);
        if (!validation.valid) {
          const squares = validation.squares;
          logger.debug('Jump rejected', { ply: this.ply, mover, code: validation.code });
          throw new IllegalJumpError(validation.reason, {
            ply: this.ply,
            mover,
            code: validation.code,
            origin: formatSquare(move.origin),
            target: formatSquare(move.target),
            originPiece: squares?.originPiece.player,
            centerPiece: squares?.centerPiece.player,
            targetPiece: squares?.targetPiece.player,
          });
        }
        const outcome = applyJumpOnBoard(this.board, validation.squares, mover);
        board = outcome.board;
        logger.debug('Jump applied', {
          ply: this.ply,
          mover,
          origin: formatSquare(validation.squares.origin),
          target: formatSquare(validation.squares.target),
          suffocated: outcome.suffocated.map(formatSquare),
          converted: outcome.converted.map(formatSquare),
        });
        break;
      }

      case 'partial': {
        if (this.rulesOptions.partialMoves === 'reject') {
          logger.debug('Partial move rejected', { ply: this.ply, mover });
          throw new PartialMoveError({
            ply: this.ply,
            origin: formatSquare(move.origin),
            target: formatSquare(move.target),
          });
        }
        logger.debug('Partial move passed through', { ply: this.ply, mover });
        break;
      }
    }

    return new Position({
      board,
      ply: this.ply + 1,
      lastMove: move,
      rulesOptions: this.rulesOptions,
    });
  }
}

/** Free-function form of {@link Position.move}. */
export const applyMove = (position: Position, move: Move): Position => position.move(move);

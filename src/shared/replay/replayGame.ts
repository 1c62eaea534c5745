import type { Move, Player, RulesOptions } from '../types/game';
import { GameAlreadyCompletedError, GameError, wrapError } from '../errors/GameDomainErrors';
import { Position } from '../engine/Position';
import { logger } from '../utils/logger';

export interface ReplayOptions {
  /** Position to start from; defaults to the opening position. */
  start?: Position;
  /** Rule switches for the default opening position. Ignored with `start`. */
  rulesOptions?: RulesOptions;
}

export interface ReplayFailure {
  /** 0-based index into the supplied move list. */
  moveIndex: number;
  move: Move;
  error: GameError;
}

export interface ReplayResult {
  /** Every position reached, starting with the start position. */
  positions: Position[];
  /** Moves that were applied (a prefix of the input). */
  appliedMoves: Move[];
  final: Position;
  /** Holder of the centre in the final position, or 'empty'. */
  winner: Player;
  /** Set when a move was rejected; replay stops there. */
  failure?: ReplayFailure;
}

/**
 * Apply `moves` in order from the start position.
 *
 * Replay stops at the first move the engine rejects, and at any move
 * issued after a side already holds the centre (the engine itself keeps
 * accepting moves past a win, so that guard lives here).
 */
export function replayGame(moves: readonly Move[], options: ReplayOptions = {}): ReplayResult {
  const start = options.start ?? Position.initial(options.rulesOptions);
  const positions: Position[] = [start];
  const appliedMoves: Move[] = [];
  let current = start;

  const finish = (failure?: ReplayFailure): ReplayResult => ({
    positions,
    appliedMoves,
    final: current,
    winner: current.winner,
    ...(failure ? { failure } : {}),
  });

  for (const [moveIndex, move] of moves.entries()) {
    const winner = current.winner;
    if (winner !== 'empty') {
      const error = new GameAlreadyCompletedError(winner, { moveIndex, ply: current.ply });
      logger.warn('Move issued after the game was decided', { moveIndex, winner });
      return finish({ moveIndex, move, error });
    }

    try {
      current = current.move(move);
    } catch (err) {
      const error = wrapError(err, { moveIndex, ply: current.ply });
      logger.warn('Replay stopped at rejected move', {
        moveIndex,
        ply: current.ply,
        code: error.code,
        reason: error.message,
      });
      return finish({ moveIndex, move, error });
    }

    positions.push(current);
    appliedMoves.push(move);
  }

  return finish();
}

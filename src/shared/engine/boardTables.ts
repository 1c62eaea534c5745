import { z } from 'zod';

import rawBoardTables from './data/boardTables.json';
import { ConfigurationError } from '../errors/GameDomainErrors';
import type { PlayerValue } from '../types/game';
import { BOARD_SIZE } from './core';

/**
 * Fixed board tables (starting layout and positional weights), stored as
 * eight rows from rank 8 down to rank 1 in `data/boardTables.json` and
 * flattened here into the engine's 64-entry board order.
 */

const CellValueSchema = z.union([z.literal(-1), z.literal(0), z.literal(1)]);

const rowsOf = <T extends z.ZodTypeAny>(cell: T) =>
  z.array(z.array(cell).length(BOARD_SIZE)).length(BOARD_SIZE);

export const BoardTablesSchema = z.object({
  startLayout: rowsOf(CellValueSchema),
  pieceWeights: rowsOf(z.number().int().nonnegative()),
});

export type RawBoardTables = z.infer<typeof BoardTablesSchema>;

export interface BoardTables {
  readonly startLayout: readonly PlayerValue[];
  readonly pieceWeights: readonly number[];
}

export function parseBoardTables(raw: unknown): BoardTables {
  const result = BoardTablesSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError('Invalid board tables', {
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }

  return Object.freeze({
    startLayout: Object.freeze(result.data.startLayout.flat()),
    pieceWeights: Object.freeze(result.data.pieceWeights.flat()),
  });
}

export const BOARD_TABLES: BoardTables = parseBoardTables(rawBoardTables);

import { BOARD_TABLES, parseBoardTables } from '../../src/shared/engine/boardTables';
import { squareIndex } from '../../src/shared/engine/core';
import { ConfigurationError, GameErrorCode } from '../../src/shared/errors';
import { sq } from '../utils/fixtures';

describe('board tables', () => {
  it('flattens the tables into 64 entries, rank 8 first', () => {
    expect(BOARD_TABLES.startLayout).toHaveLength(64);
    expect(BOARD_TABLES.pieceWeights).toHaveLength(64);
    expect(BOARD_TABLES.startLayout[squareIndex(sq('h8'))]).toBe(-1);
    expect(BOARD_TABLES.startLayout[squareIndex(sq('a1'))]).toBe(1);
  });

  it('weighs the centre 10 and the rim 1', () => {
    for (const name of ['d4', 'd5', 'e4', 'e5']) {
      expect(BOARD_TABLES.pieceWeights[squareIndex(sq(name))]).toBe(10);
    }
    expect(BOARD_TABLES.pieceWeights[squareIndex(sq('a1'))]).toBe(1);
    expect(BOARD_TABLES.pieceWeights[squareIndex(sq('c3'))]).toBe(2);
  });

  it('starts with a balanced layout', () => {
    expect(BOARD_TABLES.startLayout.reduce<number>((sum, v) => sum + v, 0)).toBe(0);
    expect(BOARD_TABLES.startLayout.filter((v) => v === -1)).toHaveLength(10);
  });

  it('rejects malformed tables', () => {
    const row = [0, 0, 0, 0, 0, 0, 0, 0];
    const rows = Array.from({ length: 8 }, () => row);

    expect(() => parseBoardTables({ startLayout: rows.slice(1), pieceWeights: rows })).toThrow(
      ConfigurationError
    );
    const badCell = [[2, ...row.slice(1)], ...rows.slice(1)];
    expect(() => parseBoardTables({ startLayout: badCell, pieceWeights: rows })).toThrow(
      ConfigurationError
    );

    try {
      parseBoardTables({ startLayout: rows });
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.code).toBe(GameErrorCode.CONFIGURATION_ERROR);
        expect(err.isFatal).toBe(true);
        expect(err.context.issues).toEqual([
          { path: 'pieceWeights', message: expect.any(String) },
        ]);
      }
    }
  });

  it('returns frozen tables', () => {
    expect(Object.isFrozen(BOARD_TABLES)).toBe(true);
    expect(Object.isFrozen(BOARD_TABLES.startLayout)).toBe(true);
  });
});

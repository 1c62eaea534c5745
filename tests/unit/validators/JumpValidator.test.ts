/**
 * JumpValidator tests
 * Tests for src/shared/engine/validators/JumpValidator.ts
 *
 * Legality is the arithmetic check origin - center == target == 0 on the
 * signed piece values, plus the optional empty-origin rule.
 */

import {
  resolveJumpSquares,
  validateJump,
} from '../../../src/shared/engine/validators/JumpValidator';
import { createInitialBoard } from '../../../src/shared/engine/initialState';
import { createJump, createMove, createPlacement } from '../../../src/shared/engine/core';
import { STRICT_RULES, resolveRulesOptions } from '../../../src/shared/engine/rulesConfig';
import { boardFromDiagram, sq } from '../../utils/fixtures';

const DEFAULT_RULES = resolveRulesOptions({}, { partialMoves: 'pass', emptyOriginJumps: 'allow' });

const MIXED = boardFromDiagram([
  '. . . . . . . .',
  '. . . . . . . .',
  '. . . . . . . .',
  '. . . . . . . .',
  '. . . . . . . .',
  '. . x . . . . .',
  '. o . . . . . .',
  'o . . . . . . .',
]);

describe('JumpValidator', () => {
  describe('resolveJumpSquares', () => {
    it('re-derives the centre from origin and target', () => {
      const move = { origin: sq('b1'), target: sq('d3'), center: sq('h8') };
      expect(resolveJumpSquares(move)).toEqual({
        origin: sq('b1'),
        center: sq('c2'),
        target: sq('d3'),
      });
    });

    it('returns undefined for placements and partial moves', () => {
      expect(resolveJumpSquares(createPlacement())).toBeUndefined();
      expect(resolveJumpSquares(createMove(sq('b1')))).toBeUndefined();
    });
  });

  describe('validateJump', () => {
    it('accepts a stone jumping over its own colour onto an empty square', () => {
      const move = createJump(sq('b1'), sq('d3'));
      const result = validateJump(createInitialBoard(), move, DEFAULT_RULES);
      expect(result.valid).toBe(true);
      if (result.valid) {
        expect(result.squares.originPiece.player).toBe('white');
        expect(result.squares.centerPiece.player).toBe('white');
        expect(result.squares.targetPiece.player).toBe('empty');
      }
    });

    it('does not check whose stone is jumping', () => {
      const move = createJump(sq('g8'), sq('e6'));
      const result = validateJump(createInitialBoard(), move, DEFAULT_RULES);
      expect(result.valid).toBe(true);
    });

    it('rejects jumping over an opponent stone', () => {
      const result = validateJump(MIXED, createJump(sq('b2'), sq('d4')), DEFAULT_RULES);
      expect(result).toMatchObject({ valid: false, code: 'OWNERSHIP_MISMATCH' });
    });

    it('rejects an occupied target', () => {
      const result = validateJump(MIXED, createJump(sq('a1'), sq('c3')), DEFAULT_RULES);
      expect(result).toMatchObject({ valid: false, code: 'OWNERSHIP_MISMATCH' });
    });

    it('rejects a stone jumping over an empty square', () => {
      const result = validateJump(MIXED, createJump(sq('c3'), sq('e5')), DEFAULT_RULES);
      expect(result).toMatchObject({ valid: false, code: 'OWNERSHIP_MISMATCH' });
    });

    it('rejects squares off the board', () => {
      const result = validateJump(MIXED, createJump(sq('a1'), { file: 1, rank: -1 }), DEFAULT_RULES);
      expect(result).toEqual({
        valid: false,
        reason: 'Square (1, 0) is off the board',
        code: 'OFF_BOARD',
      });
    });

    it('rejects a placement passed as a jump', () => {
      expect(validateJump(MIXED, createPlacement(), DEFAULT_RULES)).toMatchObject({
        valid: false,
        code: 'NOT_A_JUMP',
      });
    });

    it('admits an empty origin over an empty centre unless the strict rule is on', () => {
      const move = createJump(sq('e5'), sq('g7'));
      expect(validateJump(MIXED, move, DEFAULT_RULES).valid).toBe(true);
      expect(validateJump(MIXED, move, STRICT_RULES)).toMatchObject({
        valid: false,
        code: 'EMPTY_ORIGIN',
      });
    });
  });
});

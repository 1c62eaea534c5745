/**
 * Board rendering tests
 * Tests for src/shared/engine/boardRenderer.ts
 */

import {
  describePosition,
  pieceSymbol,
  renderPosition,
} from '../../src/shared/engine/boardRenderer';
import { DISPLAY_STYLES } from '../../src/shared/engine/notation';
import { Position } from '../../src/shared/engine/Position';
import { createJump } from '../../src/shared/engine/core';
import { boardFromDiagram, sq } from '../utils/fixtures';

const { circles, uppercase_ascii } = DISPLAY_STYLES;

describe('boardRenderer', () => {
  it('maps players to the style piece symbols', () => {
    expect(pieceSymbol('black', circles)).toBe('●');
    expect(pieceSymbol('white', circles)).toBe('○');
    expect(pieceSymbol('empty', circles)).toBe('·');
    expect(pieceSymbol('black', uppercase_ascii)).toBe('X');
  });

  it('renders the opening position', () => {
    expect(renderPosition(Position.initial(), circles).split('\n')).toEqual([
      '  a b c d e f g h  ⎸  ',
      '8 · · · · ● ● ● ●  ⎸  ○ to move',
      '7 · · · · · ● ● ●  ⎸  Move: 1 (ply 0)',
      '6 · · · · · · ● ●  ⎸  Last move: None',
      '5 · · · · · · · ●  ⎸  Win progress: 0',
      '4 ○ · · · · · · ·  ⎸  Static evaluation: 0.0',
      '3 ○ ○ · · · · · ·  ⎸  ',
      '2 ○ ○ ○ · · · · ·  ⎸  ',
      '1 ○ ○ ○ ○ · · · ·  ⎸  ',
    ]);
  });

  it('renders in an ASCII style', () => {
    const lines = renderPosition(Position.initial(), uppercase_ascii).split('\n');
    expect(lines[0]).toBe('  A B C D E F G H  |  ');
    expect(lines[1]).toBe('8 . . . . X X X X  |  O to move');
    expect(lines[8]).toBe('1 O O O O . . . .  |  ');
  });

  it('describes the position after a move', () => {
    const next = Position.initial().move(createJump(sq('b1'), sq('d3')));
    expect(describePosition(next, circles)).toEqual([
      '● to move',
      'Move: 1 (ply 1)',
      'Last move: b1-d3',
      'Win progress: 0',
      'Static evaluation: 0.4',
    ]);
  });

  it('announces a decided game', () => {
    const won = new Position({
      ply: 7,
      board: boardFromDiagram([
        '. . . . . . . .',
        '. . . . . . . .',
        '. . . . . . . .',
        '. . . x x . . .',
        '. . . x x . . .',
        '. . . . . . . .',
        '. . . . . . . .',
        '. . . . . . . .',
      ]),
    });

    expect(describePosition(won, circles)).toEqual([
      '● wins by quorum',
      'Move: 4 (ply 7)',
      'Last move: None',
      'Win progress: -4',
      'Static evaluation: -4.0',
    ]);
  });
});

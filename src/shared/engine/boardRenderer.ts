import type { Player } from '../types/game';
import { DisplayStyle, formatMove, getDefaultDisplayStyle } from './notation';
import type { Position } from './Position';

const PIECE_SYMBOL_INDEX: Record<Player, number> = { black: 0, white: 1, empty: 2 };

export function pieceSymbol(player: Player, style: DisplayStyle = getDefaultDisplayStyle()): string {
  return [...style.pieces][PIECE_SYMBOL_INDEX[player]] ?? '?';
}

/**
 * Side-panel lines printed next to the first ranks of the board.
 */
export function describePosition(
  position: Position,
  style: DisplayStyle = getDefaultDisplayStyle()
): string[] {
  const winner = position.winner;
  const status =
    winner === 'empty'
      ? `${pieceSymbol(position.toMove, style)} to move`
      : `${pieceSymbol(winner, style)} wins by quorum`;
  const lastMove = position.lastMove ? formatMove(position.lastMove, style) : 'None';

  return [
    status,
    `Move: ${position.wholeMove} (ply ${position.ply})`,
    `Last move: ${lastMove}`,
    `Win progress: ${position.winProgress}`,
    `Static evaluation: ${position.staticEvaluation.toFixed(1)}`,
  ];
}

/**
 * Text diagram of a position, rank 8 at the top:
 *
 * ```
 *   a b c d e f g h  ⎸
 * 8 · · · · ● ● ● ●  ⎸  ○ to move
 * 7 · · · · · ● ● ●  ⎸  Move: 1 (ply 0)
 * ...
 * ```
 */
export function renderPosition(
  position: Position,
  style: DisplayStyle = getDefaultDisplayStyle()
): string {
  const sep = `  ${style.sep}  `;
  const ranks = [...style.ranks];
  const extras = describePosition(position, style);

  const lines = [`  ${[...style.files].join(' ')}${sep}`];
  position.rows().forEach((row, i) => {
    const rankLabel = ranks[ranks.length - 1 - i] ?? '?';
    const cells = row.map((piece) => pieceSymbol(piece.player, style)).join(' ');
    lines.push(`${rankLabel} ${cells}${sep}${extras[i] ?? ''}`);
  });

  return lines.join('\n');
}

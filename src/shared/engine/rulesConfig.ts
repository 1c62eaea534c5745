import { config } from '../config';
import type { ResolvedRulesOptions, RulesOptions } from '../types/game';

/**
 * Fill unspecified rule switches from the configured defaults
 * (QUORUM_PARTIAL_MOVES / QUORUM_EMPTY_ORIGIN_JUMPS).
 */
export function resolveRulesOptions(
  options: RulesOptions = {},
  defaults: ResolvedRulesOptions = config.rules
): ResolvedRulesOptions {
  return Object.freeze({
    partialMoves: options.partialMoves ?? defaults.partialMoves,
    emptyOriginJumps: options.emptyOriginJumps ?? defaults.emptyOriginJumps,
  });
}

/** Both open rule questions decided the strict way. */
export const STRICT_RULES: ResolvedRulesOptions = Object.freeze({
  partialMoves: 'reject',
  emptyOriginJumps: 'reject',
});

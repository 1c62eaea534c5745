import { STRICT_RULES, resolveRulesOptions } from '../../src/shared/engine/rulesConfig';
import { config } from '../../src/shared/config';

describe('resolveRulesOptions', () => {
  it('falls back to the configured defaults', () => {
    expect(resolveRulesOptions()).toEqual(config.rules);
    expect(resolveRulesOptions()).toEqual({ partialMoves: 'pass', emptyOriginJumps: 'allow' });
  });

  it('lets explicit options override individual defaults', () => {
    expect(resolveRulesOptions({ partialMoves: 'reject' })).toEqual({
      partialMoves: 'reject',
      emptyOriginJumps: 'allow',
    });
    expect(resolveRulesOptions({ emptyOriginJumps: 'allow' }, STRICT_RULES)).toEqual({
      partialMoves: 'reject',
      emptyOriginJumps: 'allow',
    });
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(resolveRulesOptions())).toBe(true);
    expect(Object.isFrozen(STRICT_RULES)).toBe(true);
  });
});

import type { Mark } from '../types/game';
import { EngineErrorCode, RulesViolation } from './errors';

/**
 * Per-game rules.
 *
 * - `winLength`: cells in an unbroken line needed to win (first to five).
 * - `maxMoves`: optional move-count draw. When unset, a win is the only
 *   terminal condition and play may continue indefinitely.
 * - `startingMark`: mark that moves first.
 */
export interface RulesOptions {
  winLength: number;
  maxMoves?: number | undefined;
  startingMark: Mark;
}

export const DEFAULT_WIN_LENGTH = 5;
export const MIN_WIN_LENGTH = 3;
export const MAX_WIN_LENGTH = 10;

export const DEFAULT_RULES: Readonly<RulesOptions> = {
  winLength: DEFAULT_WIN_LENGTH,
  startingMark: 'player_one',
};

/**
 * Merge caller overrides onto {@link DEFAULT_RULES} and validate the
 * result. Throws {@link RulesViolation} with `RULES_INVALID_OPTIONS`.
 */
export function resolveRulesOptions(overrides: Partial<RulesOptions> = {}): RulesOptions {
  const rules: RulesOptions = {
    winLength: overrides.winLength ?? DEFAULT_RULES.winLength,
    maxMoves: overrides.maxMoves,
    startingMark: overrides.startingMark ?? DEFAULT_RULES.startingMark,
  };

  if (
    !Number.isInteger(rules.winLength) ||
    rules.winLength < MIN_WIN_LENGTH ||
    rules.winLength > MAX_WIN_LENGTH
  ) {
    throw new RulesViolation(
      EngineErrorCode.RULES_INVALID_OPTIONS,
      `winLength must be an integer between ${MIN_WIN_LENGTH} and ${MAX_WIN_LENGTH}`,
      { winLength: rules.winLength }
    );
  }

  if (rules.maxMoves !== undefined && (!Number.isInteger(rules.maxMoves) || rules.maxMoves < 1)) {
    throw new RulesViolation(
      EngineErrorCode.RULES_INVALID_OPTIONS,
      'maxMoves must be a positive integer',
      { maxMoves: rules.maxMoves }
    );
  }

  return rules;
}

/**
 * Half-direction scan radius for the win check. A run through the played
 * cell can only reach `winLength` if each side contributes at most
 * `winLength - 1` cells, so nothing further away can matter.
 */
export function getScanRadius(rules: Pick<RulesOptions, 'winLength'>): number {
  return rules.winLength - 1;
}

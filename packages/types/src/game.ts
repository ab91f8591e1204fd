/**
 * Round and game outcome definitions
 * Numeric values are the wire result codes; do not renumber.
 */

export enum RoundResult {
  Win = 0,
  Draw = 1,
  Lose = 2,
}

export const ROUND_RESULTS: readonly RoundResult[] = [RoundResult.Win, RoundResult.Draw, RoundResult.Lose];

export function isRoundResult(code: number): code is RoundResult {
  return ROUND_RESULTS.some((result) => result === code);
}

/**
 * Map a comparison (as returned by Card#compareTo) to the result for the
 * player whose card was on the left-hand side.
 */
export function roundResultFromComparison(comparison: number): RoundResult {
  if (comparison > 0) return RoundResult.Win;
  if (comparison < 0) return RoundResult.Lose;
  return RoundResult.Draw;
}

export type PlayerSeat = 'playerOne' | 'playerTwo';

export const PLAYER_SEATS: readonly PlayerSeat[] = ['playerOne', 'playerTwo'] as const;

export interface GameScore {
  playerOne: number;
  playerTwo: number;
  draws: number;
}

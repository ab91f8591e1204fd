/**
 * Round resolution
 *
 * Cards compare by rank only. Every round stands alone: a tie is a Draw for
 * both players and nothing is staked on the next round.
 */
import { roundResultFromComparison, type Card, type RoundResult } from '@war/types';

export interface RoundOutcome {
  playerOne: RoundResult;
  playerTwo: RoundResult;
}

export function resolveRound(playerOneCard: Card, playerTwoCard: Card): RoundOutcome {
  return {
    playerOne: roundResultFromComparison(playerOneCard.compareTo(playerTwoCard)),
    playerTwo: roundResultFromComparison(playerTwoCard.compareTo(playerOneCard)),
  };
}

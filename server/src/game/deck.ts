import { Card, DECK_SIZE, HAND_SIZE, type Hand } from '@war/types';
import type { RandomSource } from './random.js';

/**
 * The 52 cards of one session, in dealing order.
 */
export class Deck {
  readonly cards: readonly Card[];

  private constructor(cards: readonly Card[]) {
    this.cards = cards;
  }

  /** Every card value in ascending order */
  static ordered(): Deck {
    return new Deck(Array.from({ length: DECK_SIZE }, (_, value) => Card.fromValue(value)));
  }

  /**
   * A fresh deck in uniformly random order (Fisher-Yates driven by `rng`).
   */
  static freshShuffled(rng: RandomSource): Deck {
    const cards = Deck.ordered().cards.slice();
    for (let i = cards.length - 1; i > 0; i--) {
      const j = rng.nextInt(i + 1);
      [cards[i], cards[j]] = [cards[j], cards[i]];
    }
    return new Deck(cards);
  }

  /**
   * Split into two hands: the first 26 cards to player one, the rest to
   * player two, relative order kept.
   */
  dealTwo(): [Hand, Hand] {
    return [this.cards.slice(0, HAND_SIZE), this.cards.slice(HAND_SIZE)];
  }
}

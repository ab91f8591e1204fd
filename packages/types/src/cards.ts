/**
 * Canonical card representation
 *
 * A card is a single integer value in [0, 52). The wire format carries that
 * value as one byte, so nothing else about a card is ever serialized.
 *
 *   rank = value % 13   (0 = Two ... 12 = Ace)
 *   suit = value / 13   (0 = clubs, 1 = diamonds, 2 = hearts, 3 = spades)
 *
 * Comparison is by rank only. Two cards of the same rank in different suits
 * are equal, and suit never breaks a tie.
 */

export const CARDS_PER_SUIT = 13;
export const SUIT_COUNT = 4;
export const DECK_SIZE = CARDS_PER_SUIT * SUIT_COUNT;
export const HAND_SIZE = DECK_SIZE / 2;

export type Suit = 'clubs' | 'diamonds' | 'hearts' | 'spades';
export type Rank = '2' | '3' | '4' | '5' | '6' | '7' | '8' | '9' | '10' | 'J' | 'Q' | 'K' | 'A';

/** Suits in value order */
export const SUITS: readonly Suit[] = ['clubs', 'diamonds', 'hearts', 'spades'] as const;

/** Ranks in value order, lowest first */
export const RANKS: readonly Rank[] = ['2', '3', '4', '5', '6', '7', '8', '9', '10', 'J', 'Q', 'K', 'A'] as const;

const RANK_NAMES = {
  '2': 'Two',
  '3': 'Three',
  '4': 'Four',
  '5': 'Five',
  '6': 'Six',
  '7': 'Seven',
  '8': 'Eight',
  '9': 'Nine',
  '10': 'Ten',
  J: 'Jack',
  Q: 'Queen',
  K: 'King',
  A: 'Ace',
} as const satisfies Record<Rank, string>;

const SUIT_NAMES = {
  clubs: 'Clubs',
  diamonds: 'Diamonds',
  hearts: 'Hearts',
  spades: 'Spades',
} as const satisfies Record<Suit, string>;

/** Unicode symbols for display (derived from Suit) */
export const SUIT_SYMBOLS = {
  clubs: '♣',
  diamonds: '♦',
  hearts: '♥',
  spades: '♠',
} as const satisfies Record<Suit, string>;

/**
 * Thrown when a card is built from a value outside [0, DECK_SIZE).
 */
export class CardValueError extends RangeError {
  readonly value: number;
  readonly max: number;

  constructor(value: number) {
    const max = DECK_SIZE - 1;
    super(`Card's value was ${value}, the maximum is ${max}`);
    this.name = 'CardValueError';
    this.value = value;
    this.max = max;
  }
}

export class Card {
  readonly value: number;

  private constructor(value: number) {
    this.value = value;
  }

  static fromValue(value: number): Card {
    if (!Number.isInteger(value) || value < 0 || value >= DECK_SIZE) {
      throw new CardValueError(value);
    }
    return new Card(value);
  }

  /** Rank index, 0 (Two) through 12 (Ace) */
  get rankIndex(): number {
    return this.value % CARDS_PER_SUIT;
  }

  /** Suit index, 0 (clubs) through 3 (spades) */
  get suitIndex(): number {
    return Math.floor(this.value / CARDS_PER_SUIT);
  }

  get rank(): Rank {
    return RANKS[this.rankIndex];
  }

  get suit(): Suit {
    return SUITS[this.suitIndex];
  }

  /**
   * Negative if this card ranks below `other`, positive if above, 0 on equal rank.
   */
  compareTo(other: Card): number {
    return Math.sign(this.rankIndex - other.rankIndex);
  }

  equals(other: Card): boolean {
    return this.compareTo(other) === 0;
  }

  greaterThan(other: Card): boolean {
    return this.compareTo(other) > 0;
  }

  lessThan(other: Card): boolean {
    return this.compareTo(other) < 0;
  }

  /**
   * Identity check on the raw value. Only for bookkeeping (which physical card
   * is this?), never for deciding a round.
   */
  isSameCard(other: Card): boolean {
    return this.value === other.value;
  }

  /** Short label such as "Q♥" */
  get label(): string {
    return `${this.rank}${SUIT_SYMBOLS[this.suit]}`;
  }

  toString(): string {
    return `${RANK_NAMES[this.rank]} of ${SUIT_NAMES[this.suit]}`;
  }
}

/** The cards dealt to one player, consumed from the front */
export type Hand = readonly Card[];

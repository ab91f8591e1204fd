import { describe, it, expect } from 'vitest';
import {
  Card,
  CardValueError,
  CARDS_PER_SUIT,
  SUIT_COUNT,
  DECK_SIZE,
  HAND_SIZE,
} from '../src/cards.js';

const ALL_VALUES = Array.from({ length: DECK_SIZE }, (_, i) => i);

const TWO_OF_CLUBS = Card.fromValue(0);
const THREE_OF_CLUBS = Card.fromValue(1);
const FOUR_OF_CLUBS = Card.fromValue(2);
const KING_OF_CLUBS = Card.fromValue(11);
const ACE_OF_CLUBS = Card.fromValue(12);
const TWO_OF_DIAMONDS = Card.fromValue(13);
const THREE_OF_DIAMONDS = Card.fromValue(14);
const QUEEN_OF_HEARTS = Card.fromValue(36);
const KING_OF_HEARTS = Card.fromValue(37);
const QUEEN_OF_SPADES = Card.fromValue(49);
const KING_OF_SPADES = Card.fromValue(50);
const ACE_OF_SPADES = Card.fromValue(51);

describe('deck constants', () => {
  it('describes a standard 52-card deck', () => {
    expect(CARDS_PER_SUIT).toBe(13);
    expect(SUIT_COUNT).toBe(4);
    expect(DECK_SIZE).toBe(52);
    expect(HAND_SIZE).toBe(26);
  });
});

describe('Card.fromValue', () => {
  it('accepts every value in [0, 52)', () => {
    for (const value of ALL_VALUES) {
      expect(Card.fromValue(value).value).toBe(value);
    }
  });

  it('rejects every byte value from 52 upward', () => {
    for (let value = DECK_SIZE; value <= 255; value++) {
      expect(() => Card.fromValue(value)).toThrow(CardValueError);
    }
  });

  it('rejects negative and fractional values', () => {
    expect(() => Card.fromValue(-1)).toThrow(CardValueError);
    expect(() => Card.fromValue(1.5)).toThrow(CardValueError);
    expect(() => Card.fromValue(Number.NaN)).toThrow(CardValueError);
  });

  it('carries the offending value and the maximum', () => {
    try {
      Card.fromValue(52);
      expect.unreachable('fromValue should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(CardValueError);
      if (err instanceof CardValueError) {
        expect(err.value).toBe(52);
        expect(err.max).toBe(51);
        expect(err.message).toBe("Card's value was 52, the maximum is 51");
      }
    }
  });
});

describe('card layout', () => {
  it('maps values onto rank and suit', () => {
    expect(Card.fromValue(2 * CARDS_PER_SUIT + 10).toString()).toBe('Queen of Hearts');
    expect(Card.fromValue(2 * CARDS_PER_SUIT + 11).toString()).toBe('King of Hearts');
    expect(Card.fromValue(2 * CARDS_PER_SUIT + 12).toString()).toBe('Ace of Hearts');
    expect(TWO_OF_CLUBS.toString()).toBe('Two of Clubs');
    expect(ACE_OF_SPADES.toString()).toBe('Ace of Spades');
  });

  it('exposes rank and suit', () => {
    expect(QUEEN_OF_HEARTS.rank).toBe('Q');
    expect(QUEEN_OF_HEARTS.suit).toBe('hearts');
    expect(QUEEN_OF_HEARTS.rankIndex).toBe(10);
    expect(QUEEN_OF_HEARTS.suitIndex).toBe(2);
    expect(TWO_OF_DIAMONDS.label).toBe('2♦');
  });
});

describe('card comparison', () => {
  it('orders by rank within a suit', () => {
    expect(TWO_OF_CLUBS.lessThan(THREE_OF_CLUBS)).toBe(true);
    expect(THREE_OF_CLUBS.greaterThan(TWO_OF_CLUBS)).toBe(true);
    expect(TWO_OF_CLUBS.lessThan(FOUR_OF_CLUBS)).toBe(true);
    expect(FOUR_OF_CLUBS.greaterThan(THREE_OF_CLUBS)).toBe(true);
  });

  it('orders by rank across suits', () => {
    expect(THREE_OF_DIAMONDS.lessThan(QUEEN_OF_SPADES)).toBe(true);
    expect(QUEEN_OF_SPADES.greaterThan(THREE_OF_DIAMONDS)).toBe(true);
    expect(ACE_OF_CLUBS.greaterThan(KING_OF_SPADES)).toBe(true);
  });

  it('treats equal ranks in different suits as equal', () => {
    expect(KING_OF_CLUBS.equals(KING_OF_SPADES)).toBe(true);
    expect(KING_OF_SPADES.equals(KING_OF_CLUBS)).toBe(true);
    expect(KING_OF_CLUBS.equals(KING_OF_HEARTS)).toBe(true);
    expect(KING_OF_HEARTS.equals(KING_OF_SPADES)).toBe(true);
    expect(ACE_OF_CLUBS.equals(ACE_OF_SPADES)).toBe(true);
    expect(TWO_OF_CLUBS.equals(TWO_OF_DIAMONDS)).toBe(true);
    expect(TWO_OF_CLUBS.greaterThan(TWO_OF_DIAMONDS)).toBe(false);
    expect(TWO_OF_CLUBS.lessThan(TWO_OF_DIAMONDS)).toBe(false);
  });

  it('compares every pair by value mod 13 only', () => {
    for (const a of ALL_VALUES) {
      for (const b of ALL_VALUES) {
        const left = Card.fromValue(a);
        const right = Card.fromValue(b);
        expect(left.equals(right)).toBe(a % 13 === b % 13);
        expect(left.lessThan(right)).toBe(a % 13 < b % 13);
        expect(left.greaterThan(right)).toBe(a % 13 > b % 13);
      }
    }
  });

  it('keeps identity separate from rank equality', () => {
    expect(TWO_OF_CLUBS.isSameCard(TWO_OF_DIAMONDS)).toBe(false);
    expect(TWO_OF_CLUBS.isSameCard(Card.fromValue(0))).toBe(true);
  });
});

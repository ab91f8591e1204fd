import { describe, it, expect } from 'vitest';
import { RoundResult, isRoundResult, roundResultFromComparison } from '../src/game.js';
import { Card } from '../src/cards.js';

describe('RoundResult', () => {
  it('uses the wire result codes', () => {
    expect(RoundResult.Win).toBe(0);
    expect(RoundResult.Draw).toBe(1);
    expect(RoundResult.Lose).toBe(2);
  });

  it('recognises only known codes', () => {
    expect(isRoundResult(0)).toBe(true);
    expect(isRoundResult(2)).toBe(true);
    expect(isRoundResult(3)).toBe(false);
    expect(isRoundResult(-1)).toBe(false);
  });

  it('maps comparisons from the left-hand player view', () => {
    expect(roundResultFromComparison(1)).toBe(RoundResult.Win);
    expect(roundResultFromComparison(0)).toBe(RoundResult.Draw);
    expect(roundResultFromComparison(-1)).toBe(RoundResult.Lose);
  });

  it('resolves card comparisons', () => {
    const queen = Card.fromValue(10);
    const five = Card.fromValue(16);
    expect(roundResultFromComparison(queen.compareTo(five))).toBe(RoundResult.Win);
    expect(roundResultFromComparison(five.compareTo(queen))).toBe(RoundResult.Lose);
    expect(roundResultFromComparison(queen.compareTo(Card.fromValue(49)))).toBe(RoundResult.Draw);
  });
});

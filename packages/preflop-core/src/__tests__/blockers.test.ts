import { describe, it, expect } from 'vitest';
import { InvalidCardError, InvalidHandError, parseCards, PokerErrorCode } from '@preflop-advisor/poker-engine';
import { adjustmentFor, analyze, effectFor, foldEquityAdjustment, opponentProfileFor } from '../index.js';

const hand = (text: string) => parseCards(text.split(' '));
const targetOf = (text: string, notation: string) => analyze(hand(text)).targets.find((t) => t.notation === notation);

describe('analyze', () => {
  it('pocket aces leave no aces for the opponent', () => {
    const report = analyze(hand('As Ah'));
    expect(targetOf('As Ah', 'AA')).toEqual({
      notation: 'AA',
      blockedCards: 2,
      remainingCombos: 0,
      totalCombos: 6,
      remainingFraction: 0,
      weight: 30,
    });
    expect(report.score).toBe(35);
    expect(report.effect).toBe('strong');
  });

  it('ace-king suited blocks both pairs and the ace-king class', () => {
    const report = analyze(hand('As Ks'));
    expect(report.score).toBe(47);
    expect(report.effect).toBe('strong');
    expect(targetOf('As Ks', 'AA')?.remainingFraction).toBe(0.5);
    expect(targetOf('As Ks', 'KK')?.remainingFraction).toBe(0.5);
    expect(targetOf('As Ks', 'AK')).toMatchObject({ blockedCards: 2, remainingCombos: 9, totalCombos: 16, weight: 20 });
    expect(targetOf('As Ks', 'AQ')).toMatchObject({ remainingCombos: 12, weight: 0 });
    expect(report.descriptions[0]).toBe('Blocks AA: 3 of 6 combos remain (50%)');
  });

  it('reports nothing for a hand without premium ranks', () => {
    const report = analyze(hand('7d 2c'));
    expect(report.score).toBe(0);
    expect(report.effect).toBe('none');
    expect(report.descriptions).toEqual([]);
    expect(report.targets.every((t) => t.remainingFraction === 1)).toBe(true);
  });

  it('scores king-queen as moderate', () => {
    // KK 12 + QQ 10 + AK 5
    expect(analyze(hand('Kd Qd'))).toMatchObject({ score: 27, effect: 'moderate' });
  });

  it('scores a lone queen as weak', () => {
    expect(analyze(hand('Qh 7c'))).toMatchObject({ score: 10, effect: 'weak' });
  });
});

describe('analyze validation', () => {
  it('rejects a repeated card', () => {
    let caught: unknown;
    try {
      analyze(hand('As As'));
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidCardError);
    expect(caught).toMatchObject({ code: PokerErrorCode.DUPLICATE_CARD });
  });

  it.each(['As', 'As Kd Qh'])('rejects %s', (text) => {
    expect(() => analyze(hand(text))).toThrow(InvalidHandError);
  });

  it('guards the derived adjustments too', () => {
    expect(() => adjustmentFor(hand('Kd Kd'), 'raise')).toThrow(InvalidCardError);
    expect(() => foldEquityAdjustment(hand('Kd Kd'), 'nit')).toThrow(InvalidCardError);
  });
});

describe('effectFor', () => {
  it.each([
    [0, 'none'],
    [1, 'weak'],
    [14, 'weak'],
    [15, 'moderate'],
    [29, 'moderate'],
    [30, 'strong'],
  ])('%i -> %s', (score, effect) => {
    expect(effectFor(score)).toBe(effect);
  });
});

describe('adjustmentFor', () => {
  it.each([
    ['As Ah', 'raise', 10],
    ['As Ah', 'threebet', 10],
    ['As Ah', 'bluff', 15],
    ['As Ah', 'call', 5],
    ['Kd Qd', 'raise', 5],
    ['Kd Qd', 'bluff', 8],
    ['Kd Qd', 'call', 0],
    ['Qh 7c', 'bluff', 0],
    ['7d 2c', 'bluff', -10],
    ['7d 2c', 'raise', 0],
  ] as const)('%s %s -> %i', (cards, kind, expected) => {
    expect(adjustmentFor(hand(cards), kind)).toBe(expected);
  });
});

describe('foldEquityAdjustment', () => {
  it('scales the blocker score by how much the opponent notices', () => {
    expect(foldEquityAdjustment(hand('As Ah'), 'unknown')).toBe(7);
    expect(foldEquityAdjustment(hand('As Ah'), 'nit')).toBe(10.5);
    expect(foldEquityAdjustment(hand('As Ah'), opponentProfileFor('fish'))).toBe(2.1);
    expect(foldEquityAdjustment(hand('7d 2c'), 'maniac')).toBe(0);
  });

  it('treats an unknown archetype as the default profile', () => {
    expect(foldEquityAdjustment(hand('As Ah'), 'whale')).toBe(7);
  });
});

import { describe, it, expect } from 'vitest';
import {
  parseCard,
  parseHoleCards,
  cardIndex,
  cardKey,
  formatCards,
  assertDistinct,
  InvalidCardError,
  PokerErrorCode,
} from '../index.js';

describe('parseCard', () => {
  it('parses rank and suit tokens', () => {
    expect(parseCard('As')).toEqual({ rank: 'A', suit: 's' });
    expect(parseCard('td')).toEqual({ rank: 'T', suit: 'd' });
    expect(parseCard(' 9C ')).toEqual({ rank: '9', suit: 'c' });
  });

  it('accepts "10" for ten and suit symbols', () => {
    expect(parseCard('10h')).toEqual({ rank: 'T', suit: 'h' });
    expect(parseCard('K♠')).toEqual({ rank: 'K', suit: 's' });
    expect(parseCard('Q♦')).toEqual({ rank: 'Q', suit: 'd' });
  });

  it.each(['', 'A', 'Ax', '1s', 'AKs', 'Zh'])('rejects malformed token %j', (token) => {
    expect(() => parseCard(token)).toThrow(InvalidCardError);
  });

  it('reports INVALID_CARD for malformed tokens', () => {
    try {
      parseCard('Xy');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidCardError);
      expect(err).toMatchObject({ code: PokerErrorCode.INVALID_CARD });
    }
  });
});

describe('parseHoleCards', () => {
  it('returns a pair of cards', () => {
    expect(parseHoleCards(['Ah', 'Kd'])).toEqual([
      { rank: 'A', suit: 'h' },
      { rank: 'K', suit: 'd' },
    ]);
  });

  it('rejects anything but two cards', () => {
    expect(() => parseHoleCards(['Ah'])).toThrow(InvalidCardError);
    expect(() => parseHoleCards(['Ah', 'Kd', 'Qc'])).toThrow(InvalidCardError);
  });

  it('rejects the same card twice with DUPLICATE_CARD', () => {
    try {
      parseHoleCards(['As', 'as']);
      expect.unreachable();
    } catch (err) {
      expect(err).toMatchObject({ code: PokerErrorCode.DUPLICATE_CARD, name: 'InvalidCardError' });
    }
  });
});

describe('card helpers', () => {
  it('indexes the deck rank-major from the deuce of hearts', () => {
    expect(cardIndex({ rank: '2', suit: 'h' })).toBe(0);
    expect(cardIndex({ rank: '2', suit: 's' })).toBe(3);
    expect(cardIndex({ rank: 'A', suit: 's' })).toBe(51);
  });

  it('formats with or without suit symbols', () => {
    const cards = [parseCard('As'), parseCard('Th')];
    expect(cards.map(cardKey)).toEqual(['As', 'Th']);
    expect(formatCards(cards)).toBe('As Th');
    expect(formatCards(cards, { symbols: true })).toBe('A♠ T♥');
  });

  it('assertDistinct accepts distinct cards', () => {
    expect(() => assertDistinct([parseCard('As'), parseCard('Ah'), parseCard('Ks')])).not.toThrow();
  });
});

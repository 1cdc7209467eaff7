import {
  type Card,
  type HoleCards,
  InvalidCardError,
  PokerErrorCode,
  type Rank,
  RANKS,
  type Suit,
  SUITS,
} from './types.js';

const SUIT_SYMBOLS: Record<Suit, string> = { s: '♠', h: '♥', d: '♦', c: '♣' };

const SYMBOL_TO_SUIT: Record<string, Suit> = { '♠': 's', '♥': 'h', '♦': 'd', '♣': 'c' };

const RANK_VALUE: Record<Rank, number> = {
  '2': 2, '3': 3, '4': 4, '5': 5, '6': 6, '7': 7, '8': 8,
  '9': 9, 'T': 10, 'J': 11, 'Q': 12, 'K': 13, 'A': 14,
};

/** Numeric rank, 2 (deuce) to 14 (ace). */
export function rankValue(rank: Rank): number {
  return RANK_VALUE[rank];
}

export function parseRank(token: string): Rank | undefined {
  const normalized = token === '10' ? 'T' : token.toUpperCase();
  return RANKS.find((r) => r === normalized);
}

export function parseSuit(token: string): Suit | undefined {
  const symbol = SYMBOL_TO_SUIT[token];
  if (symbol) return symbol;
  const normalized = token.toLowerCase();
  return SUITS.find((s) => s === normalized);
}

/**
 * Parse a card token such as "As", "td", "10h" or "K♠".
 * Throws InvalidCardError for anything else.
 */
export function parseCard(text: string): Card {
  const token = text.trim();
  if (token.length < 2 || token.length > 3) {
    throw new InvalidCardError(`Malformed card "${text}"`);
  }
  const rank = parseRank(token.slice(0, -1));
  const suit = parseSuit(token.slice(-1));
  if (!rank || !suit) {
    throw new InvalidCardError(`Malformed card "${text}"`);
  }
  return { rank, suit };
}

export function parseCards(tokens: readonly string[]): Card[] {
  return tokens.map(parseCard);
}

/** Parse exactly two distinct hole cards. */
export function parseHoleCards(tokens: readonly string[]): HoleCards {
  const cards = parseCards(tokens);
  const [first, second] = cards;
  if (cards.length !== 2 || !first || !second) {
    throw new InvalidCardError(`Expected 2 hole cards, got ${cards.length}`);
  }
  assertDistinct(cards);
  return [first, second];
}

/** Canonical text form, e.g. "As". */
export function cardKey(card: Card): string {
  return `${card.rank}${card.suit}`;
}

export function formatCard(card: Card, opts: { symbols?: boolean } = {}): string {
  return opts.symbols ? `${card.rank}${SUIT_SYMBOLS[card.suit]}` : cardKey(card);
}

export function formatCards(cards: readonly Card[], opts: { symbols?: boolean } = {}): string {
  return cards.map((c) => formatCard(c, opts)).join(' ');
}

/** Dense index 0..51, rank-major. */
export function cardIndex(card: Card): number {
  return RANKS.indexOf(card.rank) * 4 + SUITS.indexOf(card.suit);
}

export function sameCard(a: Card, b: Card): boolean {
  return a.rank === b.rank && a.suit === b.suit;
}

/** Throws InvalidCardError (DUPLICATE_CARD) if any card appears twice. */
export function assertDistinct(cards: readonly Card[]): void {
  const seen = new Set<number>();
  for (const card of cards) {
    const idx = cardIndex(card);
    if (seen.has(idx)) {
      throw new InvalidCardError(`Duplicate card ${cardKey(card)}`, PokerErrorCode.DUPLICATE_CARD);
    }
    seen.add(idx);
  }
}

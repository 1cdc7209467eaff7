import { cardIndex } from './cards.js';
import { type Card, PokerError, PokerErrorCode, RANKS, SUITS, type RngFn } from './types.js';

/** Build a fresh 52-card deck in canonical order. */
export function createDeck(): Card[] {
  const deck: Card[] = [];
  for (const rank of RANKS) {
    for (const suit of SUITS) {
      deck.push({ rank, suit });
    }
  }
  return deck;
}

/** Deck minus every card in `dead`. Order is preserved. */
export function remainingDeck(dead: readonly Card[]): Card[] {
  const excluded = new Set(dead.map(cardIndex));
  return createDeck().filter((c) => !excluded.has(cardIndex(c)));
}

/**
 * Fisher-Yates shuffle using injected RNG for determinism.
 * Returns a new array (does not mutate input).
 */
export function shuffleDeck(deck: readonly Card[], rng: RngFn): Card[] {
  const shuffled = [...deck];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    const tmp = shuffled[i];
    shuffled[i] = shuffled[j];
    shuffled[j] = tmp;
  }
  return shuffled;
}

/**
 * Draw `count` distinct cards without replacement (partial Fisher-Yates).
 * Does not mutate `deck`.
 */
export function sampleCards(deck: readonly Card[], count: number, rng: RngFn): Card[] {
  if (count > deck.length) {
    throw new PokerError(PokerErrorCode.DECK_EXHAUSTED, `Cannot draw ${count} from ${deck.length} cards`);
  }
  const pool = [...deck];
  const drawn: Card[] = [];
  for (let i = 0; i < count; i++) {
    const j = i + Math.floor(rng() * (pool.length - i));
    const picked = pool[j];
    pool[j] = pool[i];
    pool[i] = picked;
    drawn.push(picked);
  }
  return drawn;
}

/** Deal `count` cards from the top of the deck. Mutates deck (pops from end). */
export function dealCards(deck: Card[], count: number): Card[] {
  const cards: Card[] = [];
  for (let i = 0; i < count; i++) {
    const card = deck.pop();
    if (!card) throw new PokerError(PokerErrorCode.DECK_EXHAUSTED, 'Deck exhausted');
    cards.push(card);
  }
  return cards;
}

/** Deterministic seeded RNG (mulberry32). */
export function createSeededRng(seed: number): RngFn {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Sub-seed for substream `index` of `seed`. Stateless, so any worker can
 * reproduce the stream of any trial without sharing a generator.
 */
export function deriveSeed(seed: number, index: number): number {
  let h = (seed ^ Math.imul(index + 1, 0x9e3779b9)) | 0;
  h = Math.imul(h ^ (h >>> 16), 0x85ebca6b);
  h = Math.imul(h ^ (h >>> 13), 0xc2b2ae35);
  return (h ^ (h >>> 16)) >>> 0;
}

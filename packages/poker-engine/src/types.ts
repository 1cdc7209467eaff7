// ── Card types ──────────────────────────────────────────────
export const SUITS = ['h', 'd', 'c', 's'] as const;
export type Suit = (typeof SUITS)[number];

/** Ascending: index 0 is the deuce, index 12 the ace. */
export const RANKS = ['2', '3', '4', '5', '6', '7', '8', '9', 'T', 'J', 'Q', 'K', 'A'] as const;
export type Rank = (typeof RANKS)[number];

export interface Card {
  readonly rank: Rank;
  readonly suit: Suit;
}

/** Two hole cards. Order carries no meaning. */
export type HoleCards = readonly [Card, Card];

// ── Hand categories ─────────────────────────────────────────
export enum HandCategory {
  HIGH_CARD = 0,
  PAIR = 1,
  TWO_PAIR = 2,
  THREE_OF_A_KIND = 3,
  STRAIGHT = 4,
  FLUSH = 5,
  FULL_HOUSE = 6,
  FOUR_OF_A_KIND = 7,
  STRAIGHT_FLUSH = 8,
}

/** Number of distinct 5-card hand values; scores run 1 (royal flush) to this. */
export const WORST_SCORE = 7462;

export interface HandEvaluation {
  category: HandCategory;
  /** 1..7462, lower is stronger */
  score: number;
  description: string;
  bestCards: Card[];
}

// ── Errors ──────────────────────────────────────────────────
export enum PokerErrorCode {
  INVALID_CARD = 'INVALID_CARD',
  DUPLICATE_CARD = 'DUPLICATE_CARD',
  CARD_OVERLAP = 'CARD_OVERLAP',
  INVALID_HAND = 'INVALID_HAND',
  DECK_EXHAUSTED = 'DECK_EXHAUSTED',
}

export class PokerError extends Error {
  constructor(
    public readonly code: PokerErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'PokerError';
  }
}

/** Malformed card token, a card repeated within a hand, or hole cards overlapping the board. */
export class InvalidCardError extends PokerError {
  constructor(message: string, code: PokerErrorCode = PokerErrorCode.INVALID_CARD) {
    super(code, message);
    this.name = 'InvalidCardError';
  }
}

/** Wrong number of hole or board cards handed to an evaluator. */
export class InvalidHandError extends InvalidCardError {
  constructor(message: string, code: PokerErrorCode = PokerErrorCode.INVALID_HAND) {
    super(message, code);
    this.name = 'InvalidHandError';
  }
}

// ── RNG interface (injected for determinism) ────────────────
export type RngFn = () => number; // returns [0, 1)

export {
  type Card,
  type Suit,
  type Rank,
  type HoleCards,
  SUITS,
  RANKS,
  HandCategory,
  type HandEvaluation,
  WORST_SCORE,
  PokerErrorCode,
  PokerError,
  InvalidCardError,
  InvalidHandError,
  type RngFn,
} from './types.js';

export {
  parseCard,
  parseCards,
  parseHoleCards,
  parseRank,
  parseSuit,
  cardKey,
  cardIndex,
  formatCard,
  formatCards,
  rankValue,
  sameCard,
  assertDistinct,
} from './cards.js';
export {
  createDeck,
  remainingDeck,
  shuffleDeck,
  sampleCards,
  dealCards,
  createSeededRng,
  deriveSeed,
} from './deck.js';
export {
  scoreHand,
  evaluateBestHand,
  categoryForScore,
  compareEvaluations,
  listScoreClasses,
} from './evaluate.js';

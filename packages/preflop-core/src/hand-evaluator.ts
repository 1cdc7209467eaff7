import {
  type Card,
  cardIndex,
  createDeck,
  type HoleCards,
  InvalidHandError,
  PokerErrorCode,
  rankValue,
  scoreHand,
  WORST_SCORE,
} from '@preflop-advisor/poker-engine';
import {
  type ExternalHandRank,
  type HandRank,
  type HandStrength,
  type Outs,
  Showdown,
  type StrengthBucket,
} from './types.js';

/** Default ranking collaborator: the engine's 7462-class evaluator. */
export const engineHandRank: ExternalHandRank = (hole, board) => scoreHand([...hole, ...board]);

// ── Preflop heuristic ───────────────────────────────────────

interface PreflopCategory {
  rankClass: number;
  base: number;
  label: string;
  matches: (high: number, low: number, suited: boolean) => boolean;
}

const isBroadway = (high: number, low: number): boolean => high >= 11 && low >= 10;

/** Strongest first. A hand belongs to the first category that matches. */
const PREFLOP_CATEGORIES: readonly PreflopCategory[] = [
  { rankClass: 1, base: 100, label: 'Premium pair', matches: (h, l) => h === l && h >= 13 },
  { rankClass: 2, base: 300, label: 'High pair', matches: (h, l) => h === l && h >= 11 },
  { rankClass: 2, base: 400, label: 'Suited broadway', matches: (h, l, s) => s && isBroadway(h, l) },
  { rankClass: 3, base: 600, label: 'Medium pair', matches: (h, l) => h === l && h >= 9 },
  { rankClass: 3, base: 700, label: 'Offsuit broadway', matches: (h, l, s) => !s && isBroadway(h, l) },
  { rankClass: 4, base: 1000, label: 'Small pair', matches: (h, l) => h === l },
  { rankClass: 4, base: 1200, label: 'Suited connector', matches: (h, l, s) => s && h - l <= 2 },
  { rankClass: 5, base: 1500, label: 'Suited ace', matches: (h, _l, s) => s && h === 14 },
  { rankClass: 6, base: 2000, label: 'Offsuit ace', matches: (h) => h === 14 },
  { rankClass: 7, base: 3000, label: 'Suited', matches: (_h, _l, s) => s },
  { rankClass: 8, base: 5000, label: 'Offsuit', matches: () => true },
];

function rankPreflop(hole: HoleCards): HandRank {
  const [a, b] = hole.map((c) => rankValue(c.rank));
  const high = Math.max(a, b);
  const low = Math.min(a, b);
  const suited = hole[0].suit === hole[1].suit;
  const category = PREFLOP_CATEGORIES.find((c) => c.matches(high, low, suited)) ?? PREFLOP_CATEGORIES[PREFLOP_CATEGORIES.length - 1];
  return {
    rankClass: category.rankClass,
    score: category.base + (14 - high) * 13 + (14 - low),
    label: category.label,
  };
}

// ── Board-present classes ───────────────────────────────────

/** Upper score bound per class, class 1 (royal flush) first. */
const POSTFLOP_CLASSES: ReadonlyArray<[bound: number, label: string]> = [
  [1, 'Royal Flush'],
  [10, 'Straight Flush'],
  [166, 'Four of a Kind'],
  [322, 'Full House'],
  [1599, 'Flush'],
  [1609, 'Straight'],
  [2467, 'Three of a Kind'],
  [3325, 'Two Pair'],
  [6185, 'Pair'],
  [WORST_SCORE, 'High Card'],
];

function classifyScore(score: number): HandRank {
  const index = POSTFLOP_CLASSES.findIndex(([bound]) => score <= bound);
  if (!Number.isInteger(score) || score < 1 || index < 0) {
    throw new RangeError(`Hand rank ${score} outside 1..${WORST_SCORE}`);
  }
  return { rankClass: index + 1, score, label: POSTFLOP_CLASSES[index][1] };
}

// ── Validation ──────────────────────────────────────────────

function toHole(cards: readonly Card[]): HoleCards {
  const [first, second] = cards;
  if (cards.length !== 2 || !first || !second) {
    throw new InvalidHandError(`Expected 2 hole cards, got ${cards.length}`);
  }
  return [first, second];
}

function checkHand(holeCards: readonly Card[], board: readonly Card[]): HoleCards {
  const hole = toHole(holeCards);
  if (board.length > 5) {
    throw new InvalidHandError(`Board holds at most 5 cards, got ${board.length}`);
  }
  if (hole[0].rank === hole[1].rank && hole[0].suit === hole[1].suit) {
    throw new InvalidHandError('Hole cards repeat a card', PokerErrorCode.DUPLICATE_CARD);
  }
  const onBoard = new Set(board.map(cardIndex));
  if (onBoard.size !== board.length) {
    throw new InvalidHandError('Board repeats a card', PokerErrorCode.DUPLICATE_CARD);
  }
  if (hole.some((c) => onBoard.has(cardIndex(c)))) {
    throw new InvalidHandError('Hole cards overlap the board', PokerErrorCode.CARD_OVERLAP);
  }
  return hole;
}

// ── Evaluator ───────────────────────────────────────────────

export interface HandEvaluator {
  rank(holeCards: readonly Card[], board?: readonly Card[]): HandRank;
  compareHands(handA: readonly Card[], handB: readonly Card[], board?: readonly Card[]): Showdown;
  describeHandStrength(holeCards: readonly Card[], board?: readonly Card[]): HandStrength;
  countOuts(holeCards: readonly Card[], board: readonly Card[]): Outs;
}

const MAX_LISTED_OUTS = 10;

export function createHandEvaluator(externalRank: ExternalHandRank = engineHandRank): HandEvaluator {
  const rank = (holeCards: readonly Card[], board: readonly Card[] = []): HandRank => {
    const hole = checkHand(holeCards, board);
    if (board.length < 3) return rankPreflop(hole);
    return classifyScore(externalRank(hole, board));
  };

  const compareHands = (handA: readonly Card[], handB: readonly Card[], board: readonly Card[] = []): Showdown => {
    const a = rank(handA, board);
    const b = rank(handB, board);
    const held = new Set(handA.map(cardIndex));
    if (handB.some((c) => held.has(cardIndex(c)))) {
      throw new InvalidHandError('Both hands hold the same card', PokerErrorCode.CARD_OVERLAP);
    }
    if (a.score < b.score) return Showdown.A_WINS;
    if (a.score > b.score) return Showdown.B_WINS;
    return Showdown.TIE;
  };

  const describeHandStrength = (holeCards: readonly Card[], board: readonly Card[] = []): HandStrength => {
    const { rankClass, label } = rank(holeCards, board);
    let strength: StrengthBucket;
    if (board.length >= 3) {
      if (rankClass <= 2) strength = 'very-strong';
      else if (rankClass <= 4) strength = 'strong';
      else if (rankClass <= 6) strength = 'medium';
      else if (rankClass <= 8) strength = 'weak';
      else strength = 'very-weak';
    } else {
      if (rankClass <= 2) strength = 'very-strong';
      else if (rankClass <= 4) strength = 'strong';
      else if (rankClass <= 6) strength = 'medium';
      else strength = 'weak';
    }
    return { rankClass, label, strength };
  };

  /** Cards whose arrival moves the hand into a better class. Needs a flop or turn. */
  const countOuts = (holeCards: readonly Card[], board: readonly Card[]): Outs => {
    const current = rank(holeCards, board);
    if (board.length < 3 || board.length > 4) return { count: 0, cards: [] };
    const known = new Set([...holeCards, ...board].map(cardIndex));
    const improving: Card[] = [];
    for (const card of createDeck()) {
      if (known.has(cardIndex(card))) continue;
      if (rank(holeCards, [...board, card]).rankClass < current.rankClass) improving.push(card);
    }
    return { count: improving.length, cards: improving.slice(0, MAX_LISTED_OUTS) };
  };

  return { rank, compareHands, describeHandStrength, countOuts };
}

const defaultEvaluator = createHandEvaluator();

/** Rank two hole cards, optionally against a 0-5 card board. Lower is stronger. */
export function rank(holeCards: readonly Card[], board: readonly Card[] = []): HandRank {
  return defaultEvaluator.rank(holeCards, board);
}

export function compareHands(handA: readonly Card[], handB: readonly Card[], board: readonly Card[] = []): Showdown {
  return defaultEvaluator.compareHands(handA, handB, board);
}

export function describeHandStrength(holeCards: readonly Card[], board: readonly Card[] = []): HandStrength {
  return defaultEvaluator.describeHandStrength(holeCards, board);
}

export function countOuts(holeCards: readonly Card[], board: readonly Card[]): Outs {
  return defaultEvaluator.countOuts(holeCards, board);
}

import {
  assertDistinct,
  type Card,
  cardIndex,
  createSeededRng,
  deriveSeed,
  type HoleCards,
  InvalidHandError,
  PokerErrorCode,
  remainingDeck,
  sampleCards,
} from '@preflop-advisor/poker-engine';
import { createHandEvaluator, type HandEvaluator } from './hand-evaluator.js';
import { filterDeadCards, percentileOf } from './ranges.js';
import type { EquityResult, EquityTally, Range } from './types.js';

/** Returned when no trial could be completed, e.g. every opponent hand was dead. */
export const NEUTRAL_EQUITY = 50;

export const DEFAULT_MAX_ENUMERATION = 250_000;

export interface EquityOptions {
  /** 0-5 known community cards */
  board?: readonly Card[];
  /** Largest |range| x C(deck, missing board cards) still enumerated exactly */
  maxEnumeration?: number;
  /** Number of independent trial blocks; any value gives the same result for a seed */
  partitions?: number;
  evaluator?: HandEvaluator;
}

const defaultEvaluator = createHandEvaluator();

function emptyTally(): EquityTally {
  return { wins: 0, ties: 0, losses: 0, skipped: 0 };
}

function addTallies(a: EquityTally, b: EquityTally): EquityTally {
  return { wins: a.wins + b.wins, ties: a.ties + b.ties, losses: a.losses + b.losses, skipped: a.skipped + b.skipped };
}

function choose(n: number, k: number): number {
  if (k < 0 || k > n) return 0;
  let result = 1;
  for (let i = 0; i < k; i++) result = (result * (n - i)) / (i + 1);
  return Math.round(result);
}

/** Every k-subset of `cards`, in lexicographic index order. */
function* combinations(cards: readonly Card[], k: number, start = 0, picked: Card[] = []): Generator<Card[]> {
  if (picked.length === k) {
    yield picked;
    return;
  }
  for (let i = start; i <= cards.length - (k - picked.length); i++) {
    yield* combinations(cards, k, i + 1, [...picked, cards[i]]);
  }
}

function validateSpot(heroCards: readonly Card[], board: readonly Card[]): HoleCards {
  const [first, second] = heroCards;
  if (heroCards.length !== 2 || !first || !second) {
    throw new InvalidHandError(`Expected 2 hole cards, got ${heroCards.length}`);
  }
  if (board.length > 5) {
    throw new InvalidHandError(`Board holds at most 5 cards, got ${board.length}`);
  }
  assertDistinct(heroCards);
  assertDistinct(board);
  const onBoard = new Set(board.map(cardIndex));
  if (heroCards.some((c) => onBoard.has(cardIndex(c)))) {
    throw new InvalidHandError('Hole cards overlap the board', PokerErrorCode.CARD_OVERLAP);
  }
  return [first, second];
}

function conflicts(hand: HoleCards, dead: ReadonlySet<number>): boolean {
  return dead.has(cardIndex(hand[0])) || dead.has(cardIndex(hand[1]));
}

function score(tally: EquityTally, hero: HoleCards, villain: HoleCards, board: readonly Card[], evaluator: HandEvaluator): void {
  const ours = evaluator.rank(hero, board).score;
  const theirs = evaluator.rank(villain, board).score;
  if (ours < theirs) tally.wins++;
  else if (ours > theirs) tally.losses++;
  else tally.ties++;
}

function finish(tally: EquityTally, method: EquityResult['method'], liveHands: number): EquityResult {
  const completed = tally.wins + tally.ties + tally.losses;
  if (completed === 0) {
    return { ...tally, equity: NEUTRAL_EQUITY, completed, method: 'neutral', liveHands };
  }
  return { ...tally, equity: ((tally.wins + tally.ties / 2) / completed) * 100, completed, method, liveHands };
}

/**
 * Hero's showdown equity against a range, with the full tally.
 *
 * Small spots (range size times the number of possible runouts within
 * `maxEnumeration`) are enumerated exactly and ignore `trials`. Otherwise
 * trial `i` samples with its own generator seeded by `deriveSeed(seed, i)`,
 * so the result depends only on the inputs and never on `partitions`.
 */
export function simulateEquity(
  heroCards: readonly Card[],
  range: Range,
  trials: number,
  seed: number,
  options: EquityOptions = {},
): EquityResult {
  const board = options.board ?? [];
  const hero = validateSpot(heroCards, board);
  if (!Number.isInteger(trials) || trials < 0) {
    throw new RangeError(`trials must be a non-negative integer, got ${trials}`);
  }
  const partitions = options.partitions ?? 1;
  if (!Number.isInteger(partitions) || partitions < 1) {
    throw new RangeError(`partitions must be a positive integer, got ${partitions}`);
  }
  const maxEnumeration = options.maxEnumeration ?? DEFAULT_MAX_ENUMERATION;
  const evaluator = options.evaluator ?? defaultEvaluator;

  const known = [...hero, ...board];
  const live = filterDeadCards(range, known);
  if (live.length === 0) return finish(emptyTally(), 'neutral', 0);

  const missing = 5 - board.length;
  const runouts = choose(52 - known.length - 2, missing);
  if (live.length * runouts <= maxEnumeration) {
    const tally = emptyTally();
    for (const villain of live) {
      const deck = remainingDeck([...known, ...villain]);
      for (const runout of combinations(deck, missing)) {
        score(tally, hero, villain, [...board, ...runout], evaluator);
      }
    }
    return finish(tally, 'exact', live.length);
  }

  const dead = new Set(known.map(cardIndex));
  const runBlock = (from: number, to: number): EquityTally => {
    const tally = emptyTally();
    for (let trial = from; trial < to; trial++) {
      const rng = createSeededRng(deriveSeed(seed, trial));
      const villain = live[Math.floor(rng() * live.length)];
      if (conflicts(villain, dead)) {
        tally.skipped++;
        continue;
      }
      const runout = sampleCards(remainingDeck([...known, ...villain]), missing, rng);
      score(tally, hero, villain, [...board, ...runout], evaluator);
    }
    return tally;
  };

  const blockSize = Math.ceil(trials / partitions);
  const blocks: EquityTally[] = [];
  for (let p = 0; p < partitions; p++) {
    blocks.push(runBlock(p * blockSize, Math.min(trials, (p + 1) * blockSize)));
  }
  return finish(blocks.reduce(addTallies, emptyTally()), 'monte-carlo', live.length);
}

/** Hero's equity against `range` in percent, 0..100. */
export function estimateEquity(
  heroCards: readonly Card[],
  range: Range,
  trials: number,
  seed: number,
  options: EquityOptions = {},
): number {
  return simulateEquity(heroCards, range, trials, seed, options).equity;
}

/**
 * Equity from the starting-hand chart alone, no simulation: 50 plus 0.8 of
 * the percentile's distance from 50, scaled down by 15% per extra opponent.
 */
export function quickEquityEstimate(heroCards: readonly Card[], opponents = 1): number {
  if (!Number.isInteger(opponents) || opponents < 1) {
    throw new RangeError(`opponents must be a positive integer, got ${opponents}`);
  }
  const hero = validateSpot(heroCards, []);
  const base = 50 + (percentileOf(hero) - 50) * 0.8;
  return base / (1 + 0.15 * (opponents - 1));
}

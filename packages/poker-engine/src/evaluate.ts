import { cardKey, rankValue } from './cards.js';
import {
  type Card,
  HandCategory,
  type HandEvaluation,
  InvalidHandError,
  WORST_SCORE,
} from './types.js';

/**
 * One prime per rank value (index = value - 2). The product of five primes
 * identifies a rank multiset regardless of card order.
 */
const RANK_PRIMES = [2, 3, 5, 7, 11, 13, 17, 19, 23, 29, 31, 37, 41];

interface ScoreClass {
  score: number;
  category: HandCategory;
  /** Tiebreaker values (descending priority) */
  values: number[];
}

/** Upper score bound of each category, strongest first. */
const CATEGORY_BOUNDS: ReadonlyArray<[number, HandCategory]> = [
  [10, HandCategory.STRAIGHT_FLUSH],
  [166, HandCategory.FOUR_OF_A_KIND],
  [322, HandCategory.FULL_HOUSE],
  [1599, HandCategory.FLUSH],
  [1609, HandCategory.STRAIGHT],
  [2467, HandCategory.THREE_OF_A_KIND],
  [3325, HandCategory.TWO_PAIR],
  [6185, HandCategory.PAIR],
  [WORST_SCORE, HandCategory.HIGH_CARD],
];

let scoreTable: Map<number, ScoreClass> | null = null;

function tableKey(primeProduct: number, flush: boolean): number {
  return primeProduct * 2 + (flush ? 1 : 0);
}

/** Category and tiebreakers for five rank values sorted descending. */
function classify(values: number[], isFlush: boolean): { category: HandCategory; values: number[] } {
  const counts = new Map<number, number>();
  for (const v of values) {
    counts.set(v, (counts.get(v) ?? 0) + 1);
  }
  const groups = [...counts.entries()].sort((a, b) => b[1] - a[1] || b[0] - a[0]);
  const shape = groups.map((g) => g[1]).join('');
  const ranked = groups.map((g) => g[0]);

  let straightHigh = 0;
  if (groups.length === 5) {
    if (values[0] - values[4] === 4) straightHigh = values[0];
    // Wheel: A-2-3-4-5
    else if (values[0] === 14 && values[1] === 5) straightHigh = 5;
  }

  if (straightHigh && isFlush) return { category: HandCategory.STRAIGHT_FLUSH, values: [straightHigh] };
  if (shape === '41') return { category: HandCategory.FOUR_OF_A_KIND, values: ranked };
  if (shape === '32') return { category: HandCategory.FULL_HOUSE, values: ranked };
  if (isFlush) return { category: HandCategory.FLUSH, values };
  if (straightHigh) return { category: HandCategory.STRAIGHT, values: [straightHigh] };
  if (shape === '311') return { category: HandCategory.THREE_OF_A_KIND, values: ranked };
  if (shape === '221') return { category: HandCategory.TWO_PAIR, values: ranked };
  if (shape === '2111') return { category: HandCategory.PAIR, values: ranked };
  return { category: HandCategory.HIGH_CARD, values };
}

function compareClasses(a: { category: HandCategory; values: number[] }, b: { category: HandCategory; values: number[] }): number {
  if (a.category !== b.category) return b.category - a.category;
  for (let i = 0; i < Math.max(a.values.length, b.values.length); i++) {
    const diff = (b.values[i] ?? 0) - (a.values[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

/**
 * Enumerate every 5-card rank multiset (at most four of a rank), plus the
 * flush variant of each five-distinct-rank set, and number them strongest
 * first. Yields exactly 7462 classes.
 */
function buildScoreTable(): Map<number, ScoreClass> {
  const pending: Array<{ key: number; category: HandCategory; values: number[] }> = [];

  const visit = (values: number[]): void => {
    const counts = new Map<number, number>();
    for (const v of values) counts.set(v, (counts.get(v) ?? 0) + 1);
    if ([...counts.values()].some((c) => c > 4)) return;

    const product = values.reduce((p, v) => p * RANK_PRIMES[v - 2], 1);
    pending.push({ key: tableKey(product, false), ...classify(values, false) });
    if (counts.size === 5) {
      pending.push({ key: tableKey(product, true), ...classify(values, true) });
    }
  };

  const walk = (values: number[], maxValue: number): void => {
    if (values.length === 5) {
      visit(values);
      return;
    }
    for (let v = maxValue; v >= 2; v--) {
      walk([...values, v], v);
    }
  };
  walk([], 14);

  pending.sort(compareClasses);
  const table = new Map<number, ScoreClass>();
  pending.forEach((entry, i) => {
    table.set(entry.key, { score: i + 1, category: entry.category, values: entry.values });
  });
  return table;
}

function getScoreTable(): Map<number, ScoreClass> {
  scoreTable ??= buildScoreTable();
  return scoreTable;
}

function lookup5(cards: readonly Card[]): ScoreClass {
  let product = 1;
  let flush = true;
  for (const card of cards) {
    product *= RANK_PRIMES[rankValue(card.rank) - 2];
    if (card.suit !== cards[0].suit) flush = false;
  }
  const entry = getScoreTable().get(tableKey(product, flush));
  if (!entry) {
    throw new InvalidHandError(`Not a valid 5-card hand: ${cards.map(cardKey).join(' ')}`);
  }
  return entry;
}

function rankName(v: number): string {
  const names: Record<number, string> = { 14: 'Ace', 13: 'King', 12: 'Queen', 11: 'Jack', 10: 'Ten', 9: 'Nine', 8: 'Eight', 7: 'Seven', 6: 'Six', 5: 'Five', 4: 'Four', 3: 'Three', 2: 'Two' };
  return names[v] ?? String(v);
}

function describe(entry: ScoreClass): string {
  const [first, second] = entry.values;
  switch (entry.category) {
    case HandCategory.STRAIGHT_FLUSH:
      return first === 14 ? 'Royal Flush' : `Straight Flush, ${rankName(first)} high`;
    case HandCategory.FOUR_OF_A_KIND:
      return `Four of a Kind, ${rankName(first)}s`;
    case HandCategory.FULL_HOUSE:
      return `Full House, ${rankName(first)}s full of ${rankName(second)}s`;
    case HandCategory.FLUSH:
      return `Flush, ${rankName(first)} high`;
    case HandCategory.STRAIGHT:
      return `Straight, ${rankName(first)} high`;
    case HandCategory.THREE_OF_A_KIND:
      return `Three of a Kind, ${rankName(first)}s`;
    case HandCategory.TWO_PAIR:
      return `Two Pair, ${rankName(first)}s and ${rankName(second)}s`;
    case HandCategory.PAIR:
      return `Pair of ${rankName(first)}s`;
    default:
      return `High Card, ${rankName(first)}`;
  }
}

function* fiveCardHands(cards: readonly Card[]): Generator<Card[]> {
  const n = cards.length;
  if (n < 5 || n > 7) {
    throw new InvalidHandError(`Need 5-7 cards to evaluate, got ${n}`);
  }
  // Iterative C(n, 5) — 5 nested loops avoid recursive allocation overhead
  for (let a = 0; a < n - 4; a++) {
    for (let b = a + 1; b < n - 3; b++) {
      for (let c = b + 1; c < n - 2; c++) {
        for (let d = c + 1; d < n - 1; d++) {
          for (let e = d + 1; e < n; e++) {
            yield [cards[a], cards[b], cards[c], cards[d], cards[e]];
          }
        }
      }
    }
  }
}

/**
 * Score of the best 5-card hand among 5-7 cards: 1 (royal flush) to 7462
 * (seven-five high). Lower is stronger; equal scores tie.
 */
export function scoreHand(cards: readonly Card[]): number {
  let best = WORST_SCORE + 1;
  for (const five of fiveCardHands(cards)) {
    const { score } = lookup5(five);
    if (score < best) best = score;
  }
  return best;
}

/** Evaluate the best 5-card hand from 5-7 cards (e.g. 2 hole + 5 community). */
export function evaluateBestHand(cards: readonly Card[]): HandEvaluation {
  let bestEntry: ScoreClass | null = null;
  let bestFive: Card[] = [];
  for (const five of fiveCardHands(cards)) {
    const entry = lookup5(five);
    if (!bestEntry || entry.score < bestEntry.score) {
      bestEntry = entry;
      bestFive = five;
    }
  }
  if (!bestEntry) {
    throw new InvalidHandError('No 5-card hand could be formed');
  }
  const sorted = [...bestFive].sort((x, y) => rankValue(y.rank) - rankValue(x.rank));
  return { category: bestEntry.category, score: bestEntry.score, description: describe(bestEntry), bestCards: sorted };
}

export function categoryForScore(score: number): HandCategory {
  for (const [bound, category] of CATEGORY_BOUNDS) {
    if (score <= bound) return category;
  }
  return HandCategory.HIGH_CARD;
}

/**
 * Compare two hand evaluations.
 * Returns positive if a is stronger, negative if b is stronger, 0 if tie.
 */
export function compareEvaluations(a: HandEvaluation, b: HandEvaluation): number {
  return b.score - a.score;
}

/** Every distinct hand value as (score, category), ordered strongest first. */
export function listScoreClasses(): Array<{ score: number; category: HandCategory }> {
  return [...getScoreTable().values()]
    .map(({ score, category }) => ({ score, category }))
    .sort((a, b) => a.score - b.score);
}

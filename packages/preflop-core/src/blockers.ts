import { assertDistinct, type Card, InvalidHandError, type Rank } from '@preflop-advisor/poker-engine';
import { opponentProfileFor } from './profiles.js';
import type { BlockerEffect, BlockerKind, BlockerReport, BlockerTarget, OpponentProfile } from './types.js';

interface WatchedClass {
  notation: string;
  ranks: readonly [Rank, Rank];
  /** Score contribution given how many of each rank hero holds */
  weigh: (held: readonly [number, number]) => number;
}

const WATCH_LIST: readonly WatchedClass[] = [
  { notation: 'AA', ranks: ['A', 'A'], weigh: ([n]) => 15 * n },
  { notation: 'KK', ranks: ['K', 'K'], weigh: ([n]) => 12 * n },
  { notation: 'QQ', ranks: ['Q', 'Q'], weigh: ([n]) => 10 * n },
  { notation: 'AK', ranks: ['A', 'K'], weigh: ([a, k]) => (a > 0 && k > 0 ? 20 : a > 0 || k > 0 ? 5 : 0) },
  { notation: 'AQ', ranks: ['A', 'Q'], weigh: ([a, q]) => (a > 0 && q > 0 ? 15 : 0) },
];

const EFFECT_THRESHOLDS: ReadonlyArray<[minScore: number, effect: BlockerEffect]> = [
  [30, 'strong'],
  [15, 'moderate'],
  [1, 'weak'],
];

/** Percentage nudge per action kind: first step whose minimum the score reaches, else `otherwise`. */
const ADJUSTMENTS: Record<BlockerKind, { steps: ReadonlyArray<[minScore: number, adjustment: number]>; otherwise: number }> = {
  raise: { steps: [[30, 10], [15, 5]], otherwise: 0 },
  threebet: { steps: [[30, 10], [15, 5]], otherwise: 0 },
  bluff: { steps: [[30, 15], [15, 8], [1, 0]], otherwise: -10 },
  call: { steps: [[30, 5]], otherwise: 0 },
};

function choose(n: number, k: number): number {
  if (k < 0 || k > n) return 0;
  let result = 1;
  for (let i = 0; i < k; i++) result = (result * (n - i)) / (i + 1);
  return Math.round(result);
}

function target(watched: WatchedClass, cards: readonly Card[]): BlockerTarget {
  const count = (rank: Rank): number => cards.filter((c) => c.rank === rank).length;
  const [r1, r2] = watched.ranks;
  const held: [number, number] = [count(r1), count(r2)];
  const paired = r1 === r2;
  const totalCombos = paired ? 6 : 16;
  const remainingCombos = paired ? choose(4 - held[0], 2) : (4 - held[0]) * (4 - held[1]);
  return {
    notation: watched.notation,
    blockedCards: paired ? held[0] : held[0] + held[1],
    remainingCombos,
    totalCombos,
    remainingFraction: remainingCombos / totalCombos,
    weight: watched.weigh(held),
  };
}

export function effectFor(score: number): BlockerEffect {
  return EFFECT_THRESHOLDS.find(([min]) => score >= min)?.[1] ?? 'none';
}

/**
 * Card-removal effect of hero's hand on the premium classes an opponent might hold.
 * Throws InvalidHandError unless given two cards, InvalidCardError if they repeat.
 */
export function analyze(heroCards: readonly Card[]): BlockerReport {
  if (heroCards.length !== 2) {
    throw new InvalidHandError(`Expected 2 hole cards, got ${heroCards.length}`);
  }
  assertDistinct(heroCards);

  const targets: BlockerTarget[] = [];
  const descriptions: string[] = [];
  let score = 0;

  for (const watched of WATCH_LIST) {
    const entry = target(watched, heroCards);
    score += entry.weight;
    targets.push(entry);
    if (entry.blockedCards > 0) {
      const pct = Math.round(entry.remainingFraction * 1000) / 10;
      descriptions.push(
        `Blocks ${entry.notation}: ${entry.remainingCombos} of ${entry.totalCombos} combos remain (${pct}%)`,
      );
    }
  }

  return { effect: effectFor(score), score, targets, descriptions };
}

export function adjustmentFor(heroCards: readonly Card[], kind: BlockerKind): number {
  const { score } = analyze(heroCards);
  const { steps, otherwise } = ADJUSTMENTS[kind];
  return steps.find(([min]) => score >= min)?.[1] ?? otherwise;
}

/**
 * Extra fold equity, in percentage points, from hero's blockers against an
 * opponent who notices them. Profile names resolve through the archetype table.
 */
export function foldEquityAdjustment(heroCards: readonly Card[], profile: OpponentProfile | string): number {
  const resolved = typeof profile === 'string' ? opponentProfileFor(profile) : profile;
  const { score } = analyze(heroCards);
  return Math.round((score / 5) * resolved.blockerAwareness * 100) / 100;
}

import {
  type Card,
  type HoleCards,
  InvalidHandError,
  parseRank,
  type Rank,
  RANKS,
  rankValue,
  SUITS,
} from '@preflop-advisor/poker-engine';
import type { HandClass, HandKind } from './types.js';

const RANK_NAMES: Record<Rank, [singular: string, plural: string]> = {
  A: ['Ace', 'Aces'],
  K: ['King', 'Kings'],
  Q: ['Queen', 'Queens'],
  J: ['Jack', 'Jacks'],
  T: ['Ten', 'Tens'],
  '9': ['Nine', 'Nines'],
  '8': ['Eight', 'Eights'],
  '7': ['Seven', 'Sevens'],
  '6': ['Six', 'Sixes'],
  '5': ['Five', 'Fives'],
  '4': ['Four', 'Fours'],
  '3': ['Three', 'Threes'],
  '2': ['Two', 'Twos'],
};

const COMBOS: Record<HandKind, number> = { paired: 6, suited: 4, offsuit: 12 };

/** Number of concrete two-card combos in the deck for all 169 classes together. */
export const TOTAL_COMBOS = 1326;

/** Parse "AA", "AKs", "KAo" and the like. Returns undefined for anything else. */
export function tryParseHandClass(notation: string): HandClass | undefined {
  const text = notation.trim();
  if (text.length !== 2 && text.length !== 3) return undefined;
  const a = parseRank(text[0]);
  const b = parseRank(text[1]);
  if (!a || !b) return undefined;
  const [high, low] = rankValue(a) >= rankValue(b) ? [a, b] : [b, a];

  if (text.length === 2) {
    return high === low ? { high, low, kind: 'paired' } : undefined;
  }
  if (high === low) return undefined;
  const suffix = text[2].toLowerCase();
  if (suffix === 's') return { high, low, kind: 'suited' };
  if (suffix === 'o') return { high, low, kind: 'offsuit' };
  return undefined;
}

export function parseHandClass(notation: string): HandClass {
  const parsed = tryParseHandClass(notation);
  if (!parsed) throw new InvalidHandError(`Unknown starting hand "${notation}"`);
  return parsed;
}

export function notationOf(handClass: HandClass): string {
  const suffix = handClass.kind === 'paired' ? '' : handClass.kind === 'suited' ? 's' : 'o';
  return `${handClass.high}${handClass.low}${suffix}`;
}

/** Class of two hole cards, e.g. As Kd -> AKo. */
export function handClassOf(hole: HoleCards): HandClass {
  const [a, b] = hole;
  const [high, low] = rankValue(a.rank) >= rankValue(b.rank) ? [a.rank, b.rank] : [b.rank, a.rank];
  if (high === low) return { high, low, kind: 'paired' };
  return { high, low, kind: a.suit === b.suit ? 'suited' : 'offsuit' };
}

/** All 169 classes, aces first; within a pair of ranks suited precedes offsuit. */
export function allHandClasses(): HandClass[] {
  const classes: HandClass[] = [];
  const descending = [...RANKS].reverse();
  descending.forEach((high, i) => {
    for (const low of descending.slice(i)) {
      if (high === low) {
        classes.push({ high, low, kind: 'paired' });
      } else {
        classes.push({ high, low, kind: 'suited' });
        classes.push({ high, low, kind: 'offsuit' });
      }
    }
  });
  return classes;
}

export function comboCount(handClass: HandClass): number {
  return COMBOS[handClass.kind];
}

/** Every concrete hand of a class: 6 for a pair, 4 suited, 12 offsuit. High card first. */
export function expandClass(handClass: HandClass): HoleCards[] {
  const { high, low, kind } = handClass;
  const hands: HoleCards[] = [];
  const card = (rank: Rank, suit: (typeof SUITS)[number]): Card => ({ rank, suit });

  if (kind === 'paired') {
    for (let i = 0; i < SUITS.length; i++) {
      for (let j = i + 1; j < SUITS.length; j++) {
        hands.push([card(high, SUITS[i]), card(low, SUITS[j])]);
      }
    }
  } else if (kind === 'suited') {
    for (const suit of SUITS) hands.push([card(high, suit), card(low, suit)]);
  } else {
    for (const s1 of SUITS) {
      for (const s2 of SUITS) {
        if (s1 !== s2) hands.push([card(high, s1), card(low, s2)]);
      }
    }
  }
  return hands;
}

/** "Pocket Aces", "Ace-King suited", "Seven-Two offsuit". */
export function describeHandClass(handClass: HandClass): string {
  if (handClass.kind === 'paired') return `Pocket ${RANK_NAMES[handClass.high][1]}`;
  return `${RANK_NAMES[handClass.high][0]}-${RANK_NAMES[handClass.low][0]} ${handClass.kind}`;
}

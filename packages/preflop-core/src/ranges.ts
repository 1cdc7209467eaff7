import { type Card, cardIndex, type HoleCards } from '@preflop-advisor/poker-engine';
import { expandClass, handClassOf, notationOf, TOTAL_COMBOS } from './hand-notation.js';
import { getTables } from './tables.js';
import type { HandClass, Position, Range, RangeAction } from './types.js';

/** 9-max and alternative seat names folded onto the six seats. */
const SEAT_ALIASES: Record<string, Position> = {
  UTG: 'UTG',
  'UTG+1': 'UTG',
  'UTG+2': 'UTG',
  UTG1: 'UTG',
  UTG2: 'UTG',
  EP: 'UTG',
  MP: 'MP',
  'MP+1': 'MP',
  'MP+2': 'MP',
  MP1: 'MP',
  MP2: 'MP',
  LJ: 'MP',
  HJ: 'MP',
  CO: 'CO',
  BTN: 'BTN',
  BU: 'BTN',
  BUTTON: 'BTN',
  D: 'BTN',
  SB: 'SB',
  BB: 'BB',
};

/** Seat for a position name. Unknown names resolve to the table's default seat. */
export function normalizePosition(text: string): Position {
  return SEAT_ALIASES[text.trim().toUpperCase().replace(/\s+/g, '')] ?? getTables().positions.defaultPosition;
}

function handKey(hand: HoleCards): number {
  const a = cardIndex(hand[0]);
  const b = cardIndex(hand[1]);
  return a < b ? a * 52 + b : b * 52 + a;
}

/** Union of the expansions of `classes`, each concrete hand once. */
export function rangeFromClasses(classes: readonly HandClass[]): Range {
  const seen = new Set<number>();
  const range: HoleCards[] = [];
  for (const handClass of classes) {
    for (const hand of expandClass(handClass)) {
      const key = handKey(hand);
      if (seen.has(key)) continue;
      seen.add(key);
      range.push(hand);
    }
  }
  return range;
}

/** Classes listed for a seat and action; falls back to the seat's open list, then its defend list. */
export function classesFor(position: string, action: RangeAction): HandClass[] {
  const { actions } = getTables().positions.positions[normalizePosition(position)];
  return actions[action] ?? actions.open ?? actions.defend ?? [];
}

export function rangeFor(position: string, action: RangeAction): Range {
  return rangeFromClasses(classesFor(position, action));
}

export function rangePercentFor(position: string): number {
  return getTables().positions.positions[normalizePosition(position)].rangePercent;
}

/** Share of all 1326 starting combos a range covers, one decimal. */
export function rangeCoverage(range: Range): number {
  return Math.round((1000 * range.length) / TOTAL_COMBOS) / 10;
}

/** Drop every hand that holds one of `dead`. */
export function filterDeadCards(range: Range, dead: readonly Card[]): Range {
  const blocked = new Set(dead.map(cardIndex));
  return range.filter(([a, b]) => !blocked.has(cardIndex(a)) && !blocked.has(cardIndex(b)));
}

/** Chart percentile of a starting hand: AA is 100, unlisted classes take the chart default. */
export function percentileOf(hand: HoleCards | HandClass): number {
  const handClass = 'kind' in hand ? hand : handClassOf(hand);
  const { percentiles, defaultPercentile } = getTables().startingHands;
  return percentiles.get(notationOf(handClass)) ?? defaultPercentile;
}

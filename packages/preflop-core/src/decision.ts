import { formatCards, type HoleCards, InvalidHandError, PokerErrorCode } from '@preflop-advisor/poker-engine';
import { adjustmentFor, analyze, foldEquityAdjustment } from './blockers.js';
import { simulateEquity } from './equity.js';
import { describeHandClass, handClassOf, notationOf } from './hand-notation.js';
import { opponentProfileFor } from './profiles.js';
import { normalizePosition, percentileOf, rangeCoverage, rangeFor, rangePercentFor } from './ranges.js';
import { getTables } from './tables.js';
import {
  type Action,
  type DecisionInput,
  type DecisionOptions,
  type Frequencies,
  type FrequencyRow,
  LINE_TYPES,
  type LineTable,
  type LineType,
  type Position,
  type Recommendation,
} from './types.js';

export const DEFAULT_TRIALS = 1000;

/** Tie order for the primary action. */
const ACTION_PRIORITY: readonly Action[] = ['raise', 'call', 'fold'];

const BLINDS_BB = 1.5;

const LINE_ALIASES: Record<string, LineType> = {
  rfi: 'open',
  vs_open: 'facing-open',
  vs_3bet: 'facing-3bet',
  vs_4bet: 'facing-4bet',
};

const round = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

/** Line type for a name such as "facing-3bet", "vs_3bet" or "rfi". */
export function parseLineType(text: string): LineType | undefined {
  const key = text.trim().toLowerCase();
  return LINE_TYPES.find((line) => line === key) ?? LINE_ALIASES[key];
}

/** Strictly highest frequency; ties go to raise, then call, then fold. */
export function primaryActionOf(frequencies: Frequencies): Action {
  const top = Math.max(frequencies.raise, frequencies.call, frequencies.fold);
  return ACTION_PRIORITY.find((action) => frequencies[action] === top) ?? 'fold';
}

/** First row whose threshold, moved by `shift`, the percentile reaches; else the last row. */
export function selectRow(rows: readonly FrequencyRow[], percentile: number, shift: number): FrequencyRow {
  return rows.find((row) => percentile >= row.minPercentile + shift) ?? rows[rows.length - 1];
}

function raiseTo(line: LineTable, facingBet: number, stackBB: number): number {
  switch (line.raiseSizing.kind) {
    case 'fixed':
      return line.raiseSizing.bb;
    case 'multiple':
      return facingBet * line.raiseSizing.factor;
    case 'all-in':
      return stackBB;
  }
}

function toHole(input: DecisionInput): HoleCards {
  const [first, second] = input.heroCards;
  if (input.heroCards.length !== 2 || !first || !second) {
    throw new InvalidHandError(`Expected 2 hole cards, got ${input.heroCards.length}`);
  }
  if (first.rank === second.rank && first.suit === second.suit) {
    throw new InvalidHandError('Hole cards repeat a card', PokerErrorCode.DUPLICATE_CARD);
  }
  return [first, second];
}

/**
 * Preflop recommendation for one spot. Deterministic for a given seed:
 * the only randomness is the equity simulation on facing lines.
 */
export function decide(input: DecisionInput, options: DecisionOptions): Recommendation {
  if (!Number.isFinite(input.stackBB) || input.stackBB <= 0) {
    throw new RangeError(`stackBB must be positive, got ${input.stackBB}`);
  }
  const hero = toHole(input);
  const tables = getTables();
  const line = tables.lines[input.lineType];
  const position = normalizePosition(input.position);

  // (a) starting hand
  const handClass = handClassOf(hero);
  const notation = notationOf(handClass);
  const percentile = percentileOf(handClass);

  // (b) blockers, (c) opponent
  const blockers = analyze(hero);
  const profile = opponentProfileFor(input.opponentProfile);

  // (d) pot and stack depth
  const facingBet =
    input.lineType === 'open' ? 0 : input.facingBet && input.facingBet > 0 ? input.facingBet : line.defaultFacingBet;
  const pot = BLINDS_BB + line.heroInvested + facingBet;
  const toCall = Math.max(0, facingBet - line.heroInvested);
  const spr = round(input.stackBB / pot, 2);
  const potOdds = toCall > 0 ? round((toCall / (pot + toCall)) * 100, 1) : 0;

  // (e) equity
  let aggressor: Position | null = null;
  let equity = percentile;
  let equityMethod: Recommendation['equityMethod'] = 'percentile';
  let opponentRangePercent: number | null = null;
  let declaredRangePercent: number | null = null;
  if (line.aggressorAction) {
    aggressor = input.aggressorPosition ? normalizePosition(input.aggressorPosition) : tables.positions.defaultPosition;
    const range = rangeFor(aggressor, line.aggressorAction);
    opponentRangePercent = rangeCoverage(range);
    declaredRangePercent = rangePercentFor(aggressor);
    const result = simulateEquity(hero, range, options.trials ?? DEFAULT_TRIALS, options.seed, {
      maxEnumeration: options.maxEnumeration,
      partitions: options.partitions,
    });
    equity = round(result.equity, 1);
    equityMethod = result.method;
  }

  // (f) frequencies
  const blockerAdjustment = adjustmentFor(hero, line.blockerKind);
  const foldShift = Math.round((profile.foldToThreeBet - 50) / 5);
  const shift =
    line.positionShift[position] +
    (aggressor ? line.aggressorShift[aggressor] : 0) -
    foldShift -
    blockerAdjustment * line.blockerWeight;
  const row = selectRow(line.rows, percentile, shift);
  const frequencies: Frequencies = { raise: row.raise, call: row.call, fold: row.fold };

  // (g) primary action
  const primaryAction = primaryActionOf(frequencies);

  // (h) confidence
  const pure = ACTION_PRIORITY.some((action) => frequencies[action] === 100);
  const confidence = round(
    clamp(
      0.5 + 0.35 * (percentile / 100) + line.confidenceBonus + (pure ? 0.05 : 0) - (profile.name === 'unknown' ? 0.1 : 0),
      0.3,
      0.95,
    ),
    2,
  );

  // (i) EV in big blinds
  const raiseCost = Math.max(0, raiseTo(line, facingBet, input.stackBB) - line.heroInvested);
  const foldProbability = clamp(
    (profile.foldToThreeBet / 100) * line.foldEquityScale + foldEquityAdjustment(hero, profile) / 100,
    0,
    0.95,
  );
  const share = equity / 100;
  const raiseEv =
    foldProbability * pot + (1 - foldProbability) * (share * (pot + 2 * raiseCost) - raiseCost);
  const callEv = share * (pot + toCall) - toCall;
  const ev = round((frequencies.raise * raiseEv + frequencies.call * callEv) / 100, 2);

  const reasons = [
    `${notation} (${formatCards(hero)}) ranks at the ${percentile} percentile of starting hands`,
    `Blockers: ${blockers.effect} (score ${blockers.score})`,
    `${profile.label} folds to 3-bets ${profile.foldToThreeBet}% of the time`,
  ];
  if (aggressor && line.aggressorAction) {
    reasons.push(`Equity ${equity}% against the ${aggressor} ${line.aggressorAction} range (${opponentRangePercent}% of hands)`);
  }
  if (toCall > 0) {
    reasons.push(`Calling ${round(toCall, 2)}bb needs ${potOdds}% equity`);
  }

  return {
    notation,
    description: describeHandClass(handClass),
    position,
    lineType: input.lineType,
    opponentProfile: profile.name,
    aggressorPosition: aggressor,
    percentile,
    primaryAction,
    frequencies,
    confidence,
    equity,
    equityMethod,
    opponentRangePercent,
    declaredRangePercent,
    potOdds,
    spr,
    ev,
    blockers,
    reasons,
  };
}

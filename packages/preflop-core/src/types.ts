import type { Card, HoleCards, Rank } from '@preflop-advisor/poker-engine';

// ── Seats, lines, archetypes ────────────────────────────────
export const POSITIONS = ['UTG', 'MP', 'CO', 'BTN', 'SB', 'BB'] as const;
export type Position = (typeof POSITIONS)[number];

export const RANGE_ACTIONS = ['open', 'defend', 'threebet', 'fourbet'] as const;
export type RangeAction = (typeof RANGE_ACTIONS)[number];

export const LINE_TYPES = ['open', 'facing-open', 'facing-3bet', 'facing-4bet'] as const;
export type LineType = (typeof LINE_TYPES)[number];

export const PROFILE_NAMES = ['unknown', 'fish', 'nit', 'tag', 'reg', 'lag', 'maniac'] as const;
export type ProfileName = (typeof PROFILE_NAMES)[number];

// ── Starting hands ──────────────────────────────────────────
export type HandKind = 'paired' | 'suited' | 'offsuit';

/** Suit-free starting hand such as AA, AKs or AKo. `high` never ranks below `low`. */
export interface HandClass {
  readonly high: Rank;
  readonly low: Rank;
  readonly kind: HandKind;
}

/** Concrete opponent holdings, no hand listed twice. */
export type Range = readonly HoleCards[];

// ── Hand ranking ────────────────────────────────────────────
/** Lower is stronger: class 1 is the best bucket, score breaks ties inside it. */
export interface HandRank {
  rankClass: number;
  score: number;
  label: string;
}

export enum Showdown {
  A_WINS = 'A_WINS',
  B_WINS = 'B_WINS',
  TIE = 'TIE',
}

/** Board-present ranking supplied from outside the core: 1 (royal flush) to 7462. */
export type ExternalHandRank = (hole: HoleCards, board: readonly Card[]) => number;

export type StrengthBucket = 'very-strong' | 'strong' | 'medium' | 'weak' | 'very-weak';

export interface HandStrength {
  rankClass: number;
  label: string;
  strength: StrengthBucket;
}

export interface Outs {
  count: number;
  /** First ten improving cards in deck order */
  cards: Card[];
}

// ── Blockers ────────────────────────────────────────────────
export type BlockerEffect = 'none' | 'weak' | 'moderate' | 'strong';
export type BlockerKind = 'raise' | 'threebet' | 'bluff' | 'call';

export interface BlockerTarget {
  notation: string;
  blockedCards: number;
  remainingCombos: number;
  totalCombos: number;
  /** 0..1 */
  remainingFraction: number;
  weight: number;
}

export interface BlockerReport {
  effect: BlockerEffect;
  score: number;
  targets: BlockerTarget[];
  descriptions: string[];
}

// ── Equity ──────────────────────────────────────────────────
export type EquityMethod = 'exact' | 'monte-carlo' | 'neutral';

export interface EquityTally {
  wins: number;
  ties: number;
  losses: number;
  skipped: number;
}

export interface EquityResult extends EquityTally {
  /** 0..100 */
  equity: number;
  completed: number;
  method: EquityMethod;
  /** Opponent hands left after removing dead cards */
  liveHands: number;
}

// ── Tables ──────────────────────────────────────────────────
export interface PositionProfile {
  position: Position;
  rangePercent: number;
  actions: Partial<Record<RangeAction, HandClass[]>>;
}

export interface OpponentProfile {
  name: ProfileName;
  label: string;
  openRangeWidth: number;
  foldToThreeBet: number;
  fourBetFrequency: number;
  blockerAwareness: number;
}

export interface Frequencies {
  raise: number;
  call: number;
  fold: number;
}

export interface FrequencyRow extends Frequencies {
  minPercentile: number;
}

export type RaiseSizing =
  | { kind: 'fixed'; bb: number }
  | { kind: 'multiple'; factor: number }
  | { kind: 'all-in' };

export interface LineTable {
  /** Action whose range the aggressor is assumed to hold; null when nobody has acted */
  aggressorAction: RangeAction | null;
  blockerKind: BlockerKind;
  blockerWeight: number;
  confidenceBonus: number;
  heroInvested: number;
  defaultFacingBet: number;
  raiseSizing: RaiseSizing;
  foldEquityScale: number;
  positionShift: Record<Position, number>;
  aggressorShift: Record<Position, number>;
  rows: FrequencyRow[];
}

// ── Decisions ───────────────────────────────────────────────
export type Action = keyof Frequencies;

export interface DecisionInput {
  heroCards: readonly Card[];
  /** Seat name; 9-max names and unknown values are folded to the six seats */
  position: string;
  stackBB: number;
  lineType: LineType;
  /** Archetype name; unknown names use the `unknown` profile */
  opponentProfile: string;
  facingBet?: number;
  aggressorPosition?: string;
}

export interface DecisionOptions {
  seed: number;
  trials?: number;
  maxEnumeration?: number;
  partitions?: number;
}

export interface Recommendation {
  notation: string;
  description: string;
  position: Position;
  lineType: LineType;
  opponentProfile: ProfileName;
  aggressorPosition: Position | null;
  percentile: number;
  primaryAction: Action;
  frequencies: Frequencies;
  confidence: number;
  equity: number;
  equityMethod: EquityMethod | 'percentile';
  /** Share of all 1326 combos in the aggressor's range; null on an open */
  opponentRangePercent: number | null;
  /** The aggressor seat's nominal range percent from the position table; null on an open */
  declaredRangePercent: number | null;
  potOdds: number;
  spr: number;
  ev: number;
  blockers: BlockerReport;
  reasons: string[];
}

export * from './types.js';

export {
  TOTAL_COMBOS,
  tryParseHandClass,
  parseHandClass,
  notationOf,
  handClassOf,
  allHandClasses,
  comboCount,
  expandClass,
  describeHandClass,
} from './hand-notation.js';
export {
  TableDataError,
  type StartingHandTable,
  type PositionTable,
  type Tables,
  parseStartingHands,
  parsePositionRanges,
  parseOpponentProfiles,
  parseFrequencyTables,
  loadTables,
  getTables,
  validateTables,
} from './tables.js';
export {
  normalizePosition,
  rangeFromClasses,
  classesFor,
  rangeFor,
  rangePercentFor,
  rangeCoverage,
  filterDeadCards,
  percentileOf,
} from './ranges.js';
export {
  engineHandRank,
  type HandEvaluator,
  createHandEvaluator,
  rank,
  compareHands,
  describeHandStrength,
  countOuts,
} from './hand-evaluator.js';
export { isProfileName, opponentProfileFor, listOpponentProfiles } from './profiles.js';
export { effectFor, analyze, adjustmentFor, foldEquityAdjustment } from './blockers.js';
export {
  NEUTRAL_EQUITY,
  DEFAULT_MAX_ENUMERATION,
  type EquityOptions,
  simulateEquity,
  estimateEquity,
  quickEquityEstimate,
} from './equity.js';
export { DEFAULT_TRIALS, parseLineType, primaryActionOf, selectRow, decide } from './decision.js';

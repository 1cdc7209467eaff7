import { describe, it, expect } from 'vitest';
import {
  getTables,
  LINE_TYPES,
  parseFrequencyTables,
  parseOpponentProfiles,
  parsePositionRanges,
  parseStartingHands,
  POSITIONS,
  TableDataError,
  validateTables,
} from '../index.js';

const row = (minPercentile: number, raise: number, call: number, fold: number) => ({ minPercentile, raise, call, fold });

function lineWith(rows: unknown[]) {
  const seats = { UTG: 0, MP: 0, CO: 0, BTN: 0, SB: 0, BB: 0 };
  return {
    aggressorAction: null,
    blockerKind: 'raise',
    blockerWeight: 0.3,
    confidenceBonus: 0,
    heroInvested: 0,
    defaultFacingBet: 0,
    raiseSizing: { kind: 'fixed', bb: 2.5 },
    foldEquityScale: 1,
    positionShift: seats,
    aggressorShift: seats,
    rows,
  };
}

function frequencyTables(rows: unknown[]) {
  const line = lineWith(rows);
  return { version: 1, lines: { open: line, 'facing-open': line, 'facing-3bet': line, 'facing-4bet': line } };
}

describe('shipped tables', () => {
  it('load and validate', () => {
    const tables = validateTables();
    expect(tables.startingHands.percentiles.size).toBe(100);
    expect(tables.startingHands.defaultPercentile).toBe(5);
    expect(tables.positions.defaultPosition).toBe('CO');
    expect(Object.keys(tables.profiles)).toHaveLength(7);
  });

  it('carry the hand-tuned chart values', () => {
    const { percentiles } = getTables().startingHands;
    expect(percentiles.get('AA')).toBe(100);
    expect(percentiles.get('KK')).toBe(99);
    expect(percentiles.get('QQ')).toBe(98);
    expect(percentiles.get('AKs')).toBe(97);
    expect(percentiles.get('JJ')).toBe(96);
    expect(percentiles.get('AKo')).toBe(95);
    expect(percentiles.get('TT')).toBe(93);
    expect(percentiles.get('53s')).toBe(5);
    expect(percentiles.get('T3s')).toBe(1);
    expect(percentiles.has('72o')).toBe(false);
  });

  it('every frequency row of every line sums to 100 and the last row starts at 0', () => {
    const { lines } = getTables();
    for (const lineType of LINE_TYPES) {
      const { rows } = lines[lineType];
      for (const r of rows) {
        expect(r.raise + r.call + r.fold).toBe(100);
      }
      expect(rows[rows.length - 1].minPercentile).toBe(0);
    }
  });

  it('gives every seat a range percent and at least one list', () => {
    const { positions } = getTables().positions;
    for (const seat of POSITIONS) {
      expect(positions[seat].rangePercent).toBeGreaterThan(0);
      expect(positions[seat].actions.open ?? positions[seat].actions.defend).toBeDefined();
    }
  });
});

describe('table validation', () => {
  it('rejects a row that does not sum to 100', () => {
    const raw = frequencyTables([row(50, 60, 0, 39), row(0, 0, 0, 100)]);
    expect(() => parseFrequencyTables(raw)).toThrow(TableDataError);
    expect(() => parseFrequencyTables(raw)).toThrow(/sums to 99/);
  });

  it('rejects thresholds out of order', () => {
    const raw = frequencyTables([row(50, 100, 0, 0), row(60, 0, 0, 100), row(0, 0, 0, 100)]);
    expect(() => parseFrequencyTables(raw)).toThrow(/strictly descend/);
  });

  it('rejects a table without a catch-all row', () => {
    const raw = frequencyTables([row(50, 100, 0, 0), row(10, 0, 0, 100)]);
    expect(() => parseFrequencyTables(raw)).toThrow(/start at 0/);
  });

  it('rejects a chart that spells the same class twice', () => {
    const raw = { version: 1, source: 'test', defaultPercentile: 5, percentiles: { AKs: 97, KAs: 90 } };
    expect(() => parseStartingHands(raw)).toThrow(/AKs listed twice/);
  });

  it('rejects a percentile above 100', () => {
    const raw = { version: 1, source: 'test', defaultPercentile: 5, percentiles: { AA: 101 } };
    expect(() => parseStartingHands(raw)).toThrow(TableDataError);
  });

  it('rejects a chart without a default', () => {
    expect(() => parseStartingHands({ version: 1, source: 'test', percentiles: { AA: 100 } })).toThrow(/defaultPercentile/);
  });

  it('rejects an unknown starting hand in a position list', () => {
    const seat = { rangePercent: 10, actions: { open: ['AA', 'AXs'] } };
    const raw = {
      version: 1,
      defaultPosition: 'CO',
      positions: { UTG: seat, MP: seat, CO: seat, BTN: seat, SB: seat, BB: seat },
    };
    expect(() => parsePositionRanges(raw)).toThrow(/Unknown starting hand "AXs"/);
  });

  it('rejects a missing archetype', () => {
    const profile = { label: 'x', openRangeWidth: 20, foldToThreeBet: 50, fourBetFrequency: 5, blockerAwareness: 1 };
    const raw = { version: 1, profiles: { unknown: profile, fish: profile, nit: profile, tag: profile, reg: profile, lag: profile } };
    expect(() => parseOpponentProfiles(raw)).toThrow(TableDataError);
  });

  it('carries the table name and zod issues', () => {
    let caught: unknown;
    try {
      parseFrequencyTables({ version: 1 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(TableDataError);
    expect(caught).toMatchObject({ table: 'frequency-tables' });
    expect(caught).toHaveProperty('issues.0.path', ['lines']);
  });
});

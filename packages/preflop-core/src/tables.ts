/**
 * Constant tables: starting-hand ranking, position ranges, opponent
 * archetypes and per-line frequency thresholds. Read from ../data once and
 * validated with zod; a table that fails validation throws TableDataError.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { notationOf, tryParseHandClass } from './hand-notation.js';
import {
  type LineTable,
  type LineType,
  type OpponentProfile,
  type Position,
  type PositionProfile,
  POSITIONS,
  type ProfileName,
  RANGE_ACTIONS,
} from './types.js';

export class TableDataError extends Error {
  constructor(
    public readonly table: string,
    message: string,
    public readonly issues: z.ZodIssue[] = [],
  ) {
    super(message);
    this.name = 'TableDataError';
  }
}

// ── Schemas ─────────────────────────────────────────────────

const HandClassSchema = z.string().transform((text, ctx) => {
  const parsed = tryParseHandClass(text);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown starting hand "${text}"` });
    return z.NEVER;
  }
  return parsed;
});

function byPosition<T extends z.ZodTypeAny>(value: T) {
  return z.object({ UTG: value, MP: value, CO: value, BTN: value, SB: value, BB: value });
}

const PercentileSchema = z.number().min(0).max(100);

export const StartingHandsSchema = z
  .object({
    version: z.number().int().positive(),
    source: z.string(),
    defaultPercentile: PercentileSchema,
    percentiles: z.record(PercentileSchema),
  })
  .superRefine((table, ctx) => {
    const seen = new Set<string>();
    for (const text of Object.keys(table.percentiles)) {
      const parsed = tryParseHandClass(text);
      if (!parsed) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['percentiles', text], message: `Unknown starting hand "${text}"` });
        continue;
      }
      const notation = notationOf(parsed);
      if (seen.has(notation)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['percentiles', text], message: `${notation} listed twice` });
      }
      seen.add(notation);
    }
  });

const ActionListsSchema = z
  .object({
    open: z.array(HandClassSchema).optional(),
    defend: z.array(HandClassSchema).optional(),
    threebet: z.array(HandClassSchema).optional(),
    fourbet: z.array(HandClassSchema).optional(),
  })
  .refine((actions) => actions.open !== undefined || actions.defend !== undefined, {
    message: 'A position needs an open or defend list',
  });

export const PositionRangesSchema = z.object({
  version: z.number().int().positive(),
  defaultPosition: z.enum(POSITIONS),
  positions: byPosition(
    z.object({
      rangePercent: z.number().min(0).max(100),
      actions: ActionListsSchema,
    }),
  ),
});

const ProfileSchema = z.object({
  label: z.string().min(1),
  openRangeWidth: z.number().min(0).max(100),
  foldToThreeBet: z.number().min(0).max(100),
  fourBetFrequency: z.number().min(0).max(100),
  blockerAwareness: z.number().min(0),
});

export const OpponentProfilesSchema = z.object({
  version: z.number().int().positive(),
  profiles: z.object({
    unknown: ProfileSchema,
    fish: ProfileSchema,
    nit: ProfileSchema,
    tag: ProfileSchema,
    reg: ProfileSchema,
    lag: ProfileSchema,
    maniac: ProfileSchema,
  }),
});

const Percent = z.number().int().min(0).max(100);

const FrequencyRowSchema = z
  .object({
    minPercentile: z.number().min(0).max(100),
    raise: Percent,
    call: Percent,
    fold: Percent,
  })
  .refine((row) => row.raise + row.call + row.fold === 100, (row) => ({
    message: `Row at ${row.minPercentile} sums to ${row.raise + row.call + row.fold}, expected 100`,
  }));

const RaiseSizingSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('fixed'), bb: z.number().positive() }),
  z.object({ kind: z.literal('multiple'), factor: z.number().positive() }),
  z.object({ kind: z.literal('all-in') }),
]);

const LineTableSchema = z.object({
  aggressorAction: z.enum(RANGE_ACTIONS).nullable(),
  blockerKind: z.enum(['raise', 'threebet', 'bluff', 'call']),
  blockerWeight: z.number().min(0),
  confidenceBonus: z.number().min(-0.5).max(0.5),
  heroInvested: z.number().min(0),
  defaultFacingBet: z.number().min(0),
  raiseSizing: RaiseSizingSchema,
  foldEquityScale: z.number().min(0),
  positionShift: byPosition(z.number()),
  aggressorShift: byPosition(z.number()),
  rows: z
    .array(FrequencyRowSchema)
    .min(1)
    .superRefine((rows, ctx) => {
      for (let i = 1; i < rows.length; i++) {
        if (rows[i].minPercentile >= rows[i - 1].minPercentile) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i], message: 'Thresholds must strictly descend' });
        }
      }
      if (rows.length > 0 && rows[rows.length - 1].minPercentile !== 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [rows.length - 1], message: 'Last row must start at 0' });
      }
    }),
});

export const FrequencyTablesSchema = z.object({
  version: z.number().int().positive(),
  lines: z.object({
    open: LineTableSchema,
    'facing-open': LineTableSchema,
    'facing-3bet': LineTableSchema,
    'facing-4bet': LineTableSchema,
  }),
});

// ── Parsed shapes ───────────────────────────────────────────

export interface StartingHandTable {
  version: number;
  source: string;
  /** Percentile of every class the chart does not list */
  defaultPercentile: number;
  /** Canonical notation to percentile, AA = 100 */
  percentiles: ReadonlyMap<string, number>;
}

export interface PositionTable {
  version: number;
  defaultPosition: Position;
  positions: Record<Position, PositionProfile>;
}

export interface Tables {
  startingHands: StartingHandTable;
  positions: PositionTable;
  profiles: Record<ProfileName, OpponentProfile>;
  lines: Record<LineType, LineTable>;
}

function parseWith<T extends z.ZodTypeAny>(table: string, schema: T, raw: unknown): z.output<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new TableDataError(table, `Invalid ${table} table: ${detail}`, result.error.issues);
  }
  return result.data;
}

export function parseStartingHands(raw: unknown): StartingHandTable {
  const table = parseWith('starting-hands', StartingHandsSchema, raw);
  const percentiles = new Map<string, number>();
  for (const [text, percentile] of Object.entries(table.percentiles)) {
    const handClass = tryParseHandClass(text);
    if (handClass) percentiles.set(notationOf(handClass), percentile);
  }
  return { version: table.version, source: table.source, defaultPercentile: table.defaultPercentile, percentiles };
}

export function parsePositionRanges(raw: unknown): PositionTable {
  const table = parseWith('position-ranges', PositionRangesSchema, raw);
  const seat = (position: Position): PositionProfile => ({ position, ...table.positions[position] });
  return {
    version: table.version,
    defaultPosition: table.defaultPosition,
    positions: { UTG: seat('UTG'), MP: seat('MP'), CO: seat('CO'), BTN: seat('BTN'), SB: seat('SB'), BB: seat('BB') },
  };
}

export function parseOpponentProfiles(raw: unknown): Record<ProfileName, OpponentProfile> {
  const { profiles } = parseWith('opponent-profiles', OpponentProfilesSchema, raw);
  return {
    unknown: { name: 'unknown', ...profiles.unknown },
    fish: { name: 'fish', ...profiles.fish },
    nit: { name: 'nit', ...profiles.nit },
    tag: { name: 'tag', ...profiles.tag },
    reg: { name: 'reg', ...profiles.reg },
    lag: { name: 'lag', ...profiles.lag },
    maniac: { name: 'maniac', ...profiles.maniac },
  };
}

export function parseFrequencyTables(raw: unknown): Record<LineType, LineTable> {
  return parseWith('frequency-tables', FrequencyTablesSchema, raw).lines;
}

// ── Loading ─────────────────────────────────────────────────

function readTable(file: string): unknown {
  const url = new URL(`../data/${file}`, import.meta.url);
  let text: string;
  try {
    text = readFileSync(url, 'utf8');
  } catch (err) {
    throw new TableDataError(file, `Cannot read ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new TableDataError(file, `${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function loadTables(): Tables {
  return {
    startingHands: parseStartingHands(readTable('starting-hands.json')),
    positions: parsePositionRanges(readTable('position-ranges.json')),
    profiles: parseOpponentProfiles(readTable('opponent-profiles.json')),
    lines: parseFrequencyTables(readTable('frequency-tables.json')),
  };
}

let cached: Tables | null = null;

/** Tables loaded on first use and shared afterwards. */
export function getTables(): Tables {
  cached ??= loadTables();
  return cached;
}

/** Re-read and re-validate every table from disk. */
export function validateTables(): Tables {
  cached = loadTables();
  return cached;
}

/**
 * Zod schemas for advisor-api request validation.
 */

import { z } from 'zod';
import { parseLineType, RANGE_ACTIONS } from '@preflop-advisor/preflop-core';

const CardToken = z.string().min(2).max(3);

const HoleCardsSchema = z.array(CardToken).length(2);

const BoardSchema = z.array(CardToken).max(5);

const SeedSchema = z.number().int().min(0).max(0xffffffff);

const Bets = z.number().positive().max(10_000);

const LineTypeSchema = z.string().transform((text, ctx) => {
  const line = parseLineType(text);
  if (!line) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Expected open, facing-open, facing-3bet or facing-4bet',
    });
    return z.NEVER;
  }
  return line;
});

export const RecommendationBodySchema = z.object({
  heroCards: HoleCardsSchema,
  position: z.string().min(1).max(16),
  stackBB: Bets,
  lineType: LineTypeSchema,
  opponentProfile: z.string().min(1).max(32).default('unknown'),
  facingBet: Bets.optional(),
  aggressorPosition: z.string().min(1).max(16).optional(),
  seed: SeedSchema.optional(),
  trials: z.number().int().positive().optional(),
});

const RangeSpecSchema = z.union([
  z.object({
    position: z.string().min(1).max(16),
    action: z.enum(RANGE_ACTIONS).default('open'),
  }),
  z.object({
    hands: z.array(z.string().min(2).max(3)).min(1).max(169),
  }),
]);

export const EquityBodySchema = z.object({
  heroCards: HoleCardsSchema,
  range: RangeSpecSchema,
  board: BoardSchema.default([]),
  seed: SeedSchema.optional(),
  trials: z.number().int().positive().optional(),
  partitions: z.number().int().min(1).max(64).optional(),
});

export const BlockersBodySchema = z.object({
  heroCards: HoleCardsSchema,
  opponentProfile: z.string().min(1).max(32).optional(),
});

export const RankBodySchema = z.object({
  heroCards: HoleCardsSchema,
  board: BoardSchema.default([]),
  versus: HoleCardsSchema.optional(),
});

export const RangeQuerySchema = z.object({
  action: z.enum(RANGE_ACTIONS).default('open'),
});

/**
 * Format zod errors into a structured error response.
 */
export function formatZodError(error: z.ZodError): { error: string; details: z.ZodIssue[] } {
  return {
    error: 'VALIDATION_ERROR',
    details: error.issues,
  };
}

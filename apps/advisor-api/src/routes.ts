import type { FastifyInstance, FastifyReply } from 'fastify';
import { randomInt } from 'node:crypto';
import { cardKey, parseCards, PokerError } from '@preflop-advisor/poker-engine';
import {
  adjustmentFor,
  analyze,
  classesFor,
  countOuts,
  decide,
  describeHandStrength,
  foldEquityAdjustment,
  listOpponentProfiles,
  normalizePosition,
  notationOf,
  parseHandClass,
  rangeCoverage,
  rangeFor,
  rangeFromClasses,
  rangePercentFor,
  rank,
  compareHands,
  simulateEquity,
  type Range,
} from '@preflop-advisor/preflop-core';
import type { SimulationLimits } from './config.js';
import { logger } from './logger.js';
import {
  BlockersBodySchema,
  EquityBodySchema,
  formatZodError,
  RangeQuerySchema,
  RankBodySchema,
  RecommendationBodySchema,
} from './schemas.js';

export interface Deps {
  limits: SimulationLimits;
  /** Seed for requests that carry none */
  drawSeed?: () => number;
}

const round = (value: number, digits: number): number => Math.round(value * 10 ** digits) / 10 ** digits;

function sendPokerError(reply: FastifyReply, err: unknown): FastifyReply {
  if (err instanceof PokerError) {
    return reply.status(400).send({ error: err.code, message: err.message });
  }
  throw err;
}

export function registerRoutes(app: FastifyInstance, deps: Deps): void {
  const { limits } = deps;
  const drawSeed = deps.drawSeed ?? (() => randomInt(0, 0x100000000));
  const trialsFor = (requested: number | undefined): number => Math.min(requested ?? limits.defaultTrials, limits.maxTrials);

  // Liveness probe
  app.get('/healthz', async () => ({ status: 'ok' }));

  // ── Recommendations ───────────────────────────────────

  app.post('/api/recommendations', async (req, reply) => {
    const parseResult = RecommendationBodySchema.safeParse(req.body);
    if (!parseResult.success) {
      return reply.status(400).send(formatZodError(parseResult.error));
    }
    const { heroCards, seed = drawSeed(), trials, ...spot } = parseResult.data;
    const trialCount = trialsFor(trials);

    try {
      const started = performance.now();
      const recommendation = decide(
        { ...spot, heroCards: parseCards(heroCards) },
        { seed, trials: trialCount, maxEnumeration: limits.maxEnumeration },
      );
      logger.info(
        {
          hand: recommendation.notation,
          line: recommendation.lineType,
          action: recommendation.primaryAction,
          method: recommendation.equityMethod,
          ms: round(performance.now() - started, 1),
        },
        'Recommendation computed',
      );
      return { ...recommendation, seed, trials: trialCount };
    } catch (err) {
      return sendPokerError(reply, err);
    }
  });

  // ── Equity ────────────────────────────────────────────

  app.post('/api/equity', async (req, reply) => {
    const parseResult = EquityBodySchema.safeParse(req.body);
    if (!parseResult.success) {
      return reply.status(400).send(formatZodError(parseResult.error));
    }
    const body = parseResult.data;
    const seed = body.seed ?? drawSeed();
    const trials = trialsFor(body.trials);

    try {
      const range: Range =
        'hands' in body.range
          ? rangeFromClasses(body.range.hands.map(parseHandClass))
          : rangeFor(body.range.position, body.range.action);
      const result = simulateEquity(parseCards(body.heroCards), range, trials, seed, {
        board: parseCards(body.board),
        maxEnumeration: limits.maxEnumeration,
        partitions: body.partitions,
      });
      return { ...result, equity: round(result.equity, 2), rangeCombos: range.length, seed, trials };
    } catch (err) {
      return sendPokerError(reply, err);
    }
  });

  // ── Blockers ──────────────────────────────────────────

  app.post('/api/blockers', async (req, reply) => {
    const parseResult = BlockersBodySchema.safeParse(req.body);
    if (!parseResult.success) {
      return reply.status(400).send(formatZodError(parseResult.error));
    }
    const { heroCards, opponentProfile } = parseResult.data;

    try {
      const cards = parseCards(heroCards);
      return {
        ...analyze(cards),
        adjustments: {
          raise: adjustmentFor(cards, 'raise'),
          threebet: adjustmentFor(cards, 'threebet'),
          bluff: adjustmentFor(cards, 'bluff'),
          call: adjustmentFor(cards, 'call'),
        },
        foldEquityAdjustment: opponentProfile ? foldEquityAdjustment(cards, opponentProfile) : null,
      };
    } catch (err) {
      return sendPokerError(reply, err);
    }
  });

  // ── Hand ranking ──────────────────────────────────────

  app.post('/api/hands/rank', async (req, reply) => {
    const parseResult = RankBodySchema.safeParse(req.body);
    if (!parseResult.success) {
      return reply.status(400).send(formatZodError(parseResult.error));
    }
    const body = parseResult.data;

    try {
      const hole = parseCards(body.heroCards);
      const board = parseCards(body.board);
      const outs = board.length >= 3 && board.length <= 4 ? countOuts(hole, board) : null;
      return {
        rank: rank(hole, board),
        strength: describeHandStrength(hole, board).strength,
        outs: outs && { count: outs.count, cards: outs.cards.map(cardKey) },
        showdown: body.versus ? compareHands(hole, parseCards(body.versus), board) : null,
      };
    } catch (err) {
      return sendPokerError(reply, err);
    }
  });

  // ── Ranges and profiles ───────────────────────────────

  app.get<{ Params: { position: string }; Querystring: Record<string, string | undefined> }>(
    '/api/ranges/:position',
    async (req, reply) => {
      const parseResult = RangeQuerySchema.safeParse(req.query);
      if (!parseResult.success) {
        return reply.status(400).send(formatZodError(parseResult.error));
      }
      const { action } = parseResult.data;
      const position = normalizePosition(req.params.position);
      const range = rangeFor(position, action);
      return {
        position,
        action,
        rangePercent: rangePercentFor(position),
        classes: classesFor(position, action).map(notationOf),
        combos: range.length,
        coverage: rangeCoverage(range),
      };
    },
  );

  app.get('/api/profiles', async () => ({ profiles: listOpponentProfiles() }));
}

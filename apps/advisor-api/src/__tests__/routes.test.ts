import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { registerRoutes } from '../routes.js';
import { formatZodError, RecommendationBodySchema } from '../schemas.js';

// ══════════════════════════════════════════════════════════════
// Advisor API route tests (light-my-request style via Fastify inject)
// ══════════════════════════════════════════════════════════════

describe('Advisor API Routes', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = Fastify({ logger: false });
    registerRoutes(app, {
      limits: { defaultTrials: 200, maxTrials: 1000, maxEnumeration: 250_000 },
      drawSeed: () => 1234,
    });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  const post = (url: string, payload: object) => app.inject({ method: 'POST', url, payload });

  // ── Health ───────────────────────────────────────────────

  it('GET /healthz returns ok', async () => {
    const res = await app.inject({ method: 'GET', url: '/healthz' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok' });
  });

  // ── Recommendations ──────────────────────────────────────

  describe('POST /api/recommendations', () => {
    it('raises pocket aces on the button', async () => {
      const res = await post('/api/recommendations', {
        heroCards: ['As', 'Ah'],
        position: 'BTN',
        stackBB: 100,
        lineType: 'open',
      });
      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.primaryAction).toBe('raise');
      expect(body.frequencies).toEqual({ raise: 100, call: 0, fold: 0 });
      expect(body.confidence).toBe(0.9);
      expect(body.opponentProfile).toBe('unknown');
      expect(body.seed).toBe(1234);
      expect(body.trials).toBe(200);
    });

    it('accepts line aliases and caps the trial count', async () => {
      const res = await post('/api/recommendations', {
        heroCards: ['Ks', 'Kd'],
        position: 'CO',
        stackBB: 100,
        lineType: 'vs_3bet',
        opponentProfile: 'lag',
        aggressorPosition: 'BTN',
        seed: 77,
        trials: 50_000,
      });
      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.lineType).toBe('facing-3bet');
      expect(body.aggressorPosition).toBe('BTN');
      expect(body.equityMethod).toBe('monte-carlo');
      expect(body.seed).toBe(77);
      expect(body.trials).toBe(1000);
      expect(body.frequencies.raise + body.frequencies.call + body.frequencies.fold).toBe(100);
    });

    it('returns the same recommendation for the same seed', async () => {
      const payload = {
        heroCards: ['Qh', 'Jh'],
        position: 'BB',
        stackBB: 60,
        lineType: 'facing-open',
        aggressorPosition: 'CO',
        seed: 5,
      };
      const first = await post('/api/recommendations', payload);
      const second = await post('/api/recommendations', payload);
      expect(second.json()).toEqual(first.json());
    });

    it('rejects a body without hole cards', async () => {
      const res = await post('/api/recommendations', { position: 'BTN', stackBB: 100, lineType: 'open' });
      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe('VALIDATION_ERROR');
    });

    it('rejects an unknown line type', async () => {
      const res = await post('/api/recommendations', {
        heroCards: ['As', 'Ah'],
        position: 'BTN',
        stackBB: 100,
        lineType: 'limp',
      });
      expect(res.statusCode).toBe(400);
      expect(res.json().details[0].path).toEqual(['lineType']);
    });

    it('maps a malformed card to INVALID_CARD', async () => {
      const res = await post('/api/recommendations', {
        heroCards: ['Zz', 'Ah'],
        position: 'BTN',
        stackBB: 100,
        lineType: 'open',
      });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: 'INVALID_CARD', message: 'Malformed card "Zz"' });
    });

    it('maps a repeated card to DUPLICATE_CARD', async () => {
      const res = await post('/api/recommendations', {
        heroCards: ['As', 'As'],
        position: 'BTN',
        stackBB: 100,
        lineType: 'open',
      });
      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe('DUPLICATE_CARD');
    });
  });

  // ── Equity ───────────────────────────────────────────────

  describe('POST /api/equity', () => {
    it('enumerates a complete board exactly', async () => {
      const res = await post('/api/equity', {
        heroCards: ['2c', '3d'],
        range: { hands: ['AA'] },
        board: ['As', 'Ks', 'Qs', 'Js', 'Ts'],
      });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({ equity: 50, method: 'exact', rangeCombos: 6, liveHands: 3, ties: 3 });
    });

    it('samples a position range with the default trial count', async () => {
      const res = await post('/api/equity', {
        heroCards: ['As', 'Ks'],
        range: { position: 'UTG', action: 'open' },
        seed: 42,
      });
      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body).toMatchObject({ method: 'monte-carlo', completed: 200, trials: 200, seed: 42, rangeCombos: 124 });
      expect(body.equity).toBeGreaterThan(30);
      expect(body.equity).toBeLessThan(80);
    });

    it('returns neutral equity when the range is dead', async () => {
      const res = await post('/api/equity', { heroCards: ['Ah', 'Ad'], range: { hands: ['AA'] }, board: ['Ac'] });
      expect(res.json()).toMatchObject({ equity: 50, method: 'neutral', liveHands: 0 });
    });

    it('maps board overlap to CARD_OVERLAP', async () => {
      const res = await post('/api/equity', {
        heroCards: ['As', 'Ks'],
        range: { hands: ['QQ'] },
        board: ['As', '2c', '3d'],
      });
      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe('CARD_OVERLAP');
    });

    it('maps an unknown starting hand to INVALID_HAND', async () => {
      const res = await post('/api/equity', { heroCards: ['As', 'Ks'], range: { hands: ['AX'] } });
      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe('INVALID_HAND');
    });
  });

  // ── Blockers ─────────────────────────────────────────────

  describe('POST /api/blockers', () => {
    it('reports blockers, adjustments and fold equity', async () => {
      const res = await post('/api/blockers', { heroCards: ['As', 'Ah'], opponentProfile: 'nit' });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({
        score: 35,
        effect: 'strong',
        adjustments: { raise: 10, threebet: 10, bluff: 15, call: 5 },
        foldEquityAdjustment: 10.5,
      });
    });

    it('leaves fold equity out without a profile', async () => {
      const res = await post('/api/blockers', { heroCards: ['7d', '2c'] });
      expect(res.json()).toMatchObject({ score: 0, effect: 'none', foldEquityAdjustment: null });
    });

    it('rejects a repeated card', async () => {
      const res = await post('/api/blockers', { heroCards: ['As', 'As'] });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: 'DUPLICATE_CARD', message: 'Duplicate card As' });
    });
  });

  // ── Hand ranking ─────────────────────────────────────────

  describe('POST /api/hands/rank', () => {
    it('ranks a made hand on the flop', async () => {
      const res = await post('/api/hands/rank', { heroCards: ['As', 'Ks'], board: ['Qs', 'Js', 'Ts'] });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        rank: { rankClass: 1, score: 1, label: 'Royal Flush' },
        strength: 'very-strong',
        outs: { count: 0, cards: [] },
        showdown: null,
      });
    });

    it('counts outs for a draw', async () => {
      const res = await post('/api/hands/rank', { heroCards: ['Ah', 'Kh'], board: ['2h', '7h', '9c'] });
      expect(res.json().outs.count).toBe(23);
    });

    it('compares two hands preflop', async () => {
      const res = await post('/api/hands/rank', { heroCards: ['Ah', 'Ad'], versus: ['Kc', 'Kd'] });
      expect(res.json()).toMatchObject({
        rank: { rankClass: 1, score: 100, label: 'Premium pair' },
        outs: null,
        showdown: 'A_WINS',
      });
    });
  });

  // ── Ranges and profiles ──────────────────────────────────

  describe('GET /api/ranges/:position', () => {
    it('returns the open range by default', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/ranges/UTG' });
      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body).toMatchObject({ position: 'UTG', action: 'open', rangePercent: 15, combos: 124, coverage: 9.4 });
      expect(body.classes[0]).toBe('AA');
    });

    it('folds seat aliases and reads other actions', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/ranges/hj?action=threebet' });
      expect(res.json()).toMatchObject({
        position: 'MP',
        action: 'threebet',
        classes: ['AA', 'KK', 'QQ', 'JJ', 'AKs', 'AQs', 'A5s', 'AKo'],
      });
    });

    it('rejects an unknown action', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/ranges/UTG?action=limp' });
      expect(res.statusCode).toBe(400);
    });
  });

  it('GET /api/profiles lists every archetype', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/profiles' });
    const { profiles } = res.json();
    expect(profiles).toHaveLength(7);
    expect(profiles[0]).toMatchObject({ name: 'unknown', foldToThreeBet: 55 });
  });
});

// ── Schema validation ────────────────────────────────────────

describe('RecommendationBodySchema', () => {
  it('defaults the opponent profile', () => {
    const result = RecommendationBodySchema.safeParse({
      heroCards: ['As', 'Ah'],
      position: 'BTN',
      stackBB: 100,
      lineType: 'rfi',
    });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.opponentProfile).toBe('unknown');
      expect(result.data.lineType).toBe('open');
    }
  });

  it('rejects three hole cards and a negative stack', () => {
    const result = RecommendationBodySchema.safeParse({
      heroCards: ['As', 'Ah', 'Kd'],
      position: 'BTN',
      stackBB: -5,
      lineType: 'open',
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      const formatted = formatZodError(result.error);
      expect(formatted.error).toBe('VALIDATION_ERROR');
      expect(formatted.details.map((d) => d.path[0]).sort()).toEqual(['heroCards', 'stackBB']);
    }
  });
});

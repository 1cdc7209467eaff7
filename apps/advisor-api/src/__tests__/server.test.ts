import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildAdvisorApi, loadConfig, logger } from '../index.js';

describe('buildAdvisorApi', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await buildAdvisorApi(loadConfig({ NODE_ENV: 'test', DEFAULT_TRIALS: '100' }), { drawSeed: () => 1 });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('sets security headers', async () => {
    const res = await app.inject({ method: 'GET', url: '/healthz' });
    expect(res.statusCode).toBe(200);
    expect(res.headers['x-content-type-options']).toBe('nosniff');
  });

  it('allows the configured CORS origin', async () => {
    const res = await app.inject({ method: 'GET', url: '/healthz', headers: { origin: 'http://localhost:3000' } });
    expect(res.headers['access-control-allow-origin']).toBe('http://localhost:3000');
  });

  it('answers malformed JSON through the error handler', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/recommendations',
      headers: { 'content-type': 'application/json' },
      payload: '{"heroCards":',
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().statusCode).toBe(400);
  });

  it('uses the configured default trial count', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/equity',
      payload: { heroCards: ['As', 'Ks'], range: { position: 'BTN' } },
    });
    expect(res.json()).toMatchObject({ trials: 100, seed: 1, completed: 100 });
  });
});

describe('buildAdvisorApi logging', () => {
  afterAll(() => {
    logger.level = 'silent';
  });

  it('applies the configured log level', async () => {
    const app = await buildAdvisorApi(loadConfig({ NODE_ENV: 'test', LOG_LEVEL: 'error' }));
    expect(logger.level).toBe('error');
    await app.close();
  });
});

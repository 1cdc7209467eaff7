import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { validateTables } from '@preflop-advisor/preflop-core';
import { type AdvisorConfig, loadConfig } from './config.js';
import { logger } from './logger.js';
import { type Deps, registerRoutes } from './routes.js';

export { registerRoutes } from './routes.js';
export { loadConfig, type AdvisorConfig, type LogLevel } from './config.js';
export { logger } from './logger.js';

export async function buildAdvisorApi(
  config: AdvisorConfig,
  deps: Partial<Omit<Deps, 'limits'>> = {},
): Promise<FastifyInstance> {
  logger.level = config.logLevel;
  const app = Fastify({ logger: false });

  // Security headers
  await app.register(helmet, {
    contentSecurityPolicy: false, // JSON API, no HTML
  });

  // Rate limiting
  await app.register(rateLimit, {
    max: config.rateLimit.max,
    timeWindow: config.rateLimit.windowMs,
    allowList: ['127.0.0.1', '::1'], // Allow localhost (health checks)
  });

  await app.register(cors, { origin: config.corsOrigins });

  // Global error handler: return structured errors, never leak stack traces
  app.setErrorHandler((error: Error & { statusCode?: number }, _request, reply) => {
    const statusCode = error.statusCode ?? 500;
    logger.error({ err: error, statusCode }, 'Request error');

    if (statusCode >= 500) {
      return reply.status(statusCode).send({
        error: 'Internal Server Error',
        message: config.env === 'production' ? 'An unexpected error occurred' : error.message,
        statusCode,
      });
    }

    return reply.status(statusCode).send({
      error: error.name,
      message: error.message,
      statusCode,
    });
  });

  registerRoutes(app, {
    ...deps,
    limits: {
      defaultTrials: config.defaultTrials,
      maxTrials: config.maxTrials,
      maxEnumeration: config.maxEnumeration,
    },
  });

  return app;
}

export async function startAdvisorApi(config: AdvisorConfig = loadConfig()): Promise<FastifyInstance> {
  // Fail at boot, not on the first request, if the tables are malformed
  validateTables();
  const app = await buildAdvisorApi(config);
  await app.listen({ port: config.port, host: '0.0.0.0' });
  logger.info({ port: config.port, maxTrials: config.maxTrials }, 'Advisor API started');
  return app;
}

if (process.argv[1] && import.meta.url.endsWith(process.argv[1])) {
  (async () => {
    const app = await startAdvisorApi();

    const shutdown = async (signal: string) => {
      logger.info({ signal }, 'Received signal, shutting down');
      await app.close();
      process.exit(0);
    };
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
  })().catch((err) => {
    logger.error({ err }, 'Failed to start advisor API');
    process.exit(1);
  });
}

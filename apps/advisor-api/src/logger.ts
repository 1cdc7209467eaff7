import pino from 'pino';

// Level is reset from the validated config when the API is built
function options(): pino.LoggerOptions {
  switch (process.env['NODE_ENV']) {
    case 'test':
      return { level: 'silent' };
    case 'production':
      return { level: 'info', base: { service: 'advisor-api' } };
    default:
      return {
        level: 'info',
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
          },
        },
      };
  }
}

export const logger = pino(options());

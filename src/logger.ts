import pino from 'pino';

const pretty = process.env.NODE_ENV !== 'test' && process.env.LOG_PRETTY !== 'false';

// Logs go to stderr so `render --print` can own stdout.
const logger = pino(
  {
    level: process.env.LOG_LEVEL || 'info',
    ...(pretty
      ? {
          transport: {
            target: 'pino-pretty', // human-readable logs
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss',
              destination: 2,
            },
          },
        }
      : {}),
  },
  pretty ? undefined : pino.destination(2),
);

export default logger;

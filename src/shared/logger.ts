import pino from 'pino';

export const logger = pino({
  level: process.env['LOG_LEVEL'] ?? 'info',
  transport:
    process.env['NODE_ENV'] !== 'production' && process.env['NODE_ENV'] !== 'test'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
  redact: {
    paths: ['app_token', 'user_key', 'smtp_pass', '*.app_token', '*.user_key', '*.smtp_pass'],
    censor: '***REDACTED***',
  },
});

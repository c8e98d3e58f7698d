import pino from 'pino';

export type { Logger } from 'pino';

// Read directly from process.env so the logger can be imported before the
// full configuration has been validated (and by tests without credentials).
const level = process.env.LOG_LEVEL ?? 'info';
const isDevelopment = (process.env.NODE_ENV ?? 'development') === 'development';

export const logger = pino({
  name: 'guest-texter',
  level,
  transport: isDevelopment
    ? { target: 'pino-pretty', options: { colorize: true } }
    : undefined,
});

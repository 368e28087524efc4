import { pino, type Logger } from 'pino';

export type { Logger };

export function createLogger(level = 'info'): Logger {
  return pino({
    level,
    base: { service: 'report-batch-service' },
    redact: ['req.body', 'reply.body', 'payload', 'params', 'data'],
  });
}

// Handy for tests and library use where nothing should be printed.
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

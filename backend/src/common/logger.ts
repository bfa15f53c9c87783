import { pino, type Logger as PinoLogger } from 'pino';

/**
 * Logging surface used outside of request handlers (boot, model loading).
 * Narrow enough to stub with spies in tests.
 */
export type Logger = Pick<PinoLogger, 'info' | 'warn' | 'error' | 'debug'>;

export function createLogger(level: string, name = 'prognosis'): Logger {
  return pino({ name, level });
}

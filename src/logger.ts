import { pino, type Logger } from 'pino';

export type { Logger };

/** Root logger; the HTTP app takes it as-is, TCP components take a child. */
export function createLogger(level: string): Logger {
  return pino({
    level,
    base: { service: 'kv-gate' },
  });
}

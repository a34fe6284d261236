// packages/core/src/logger.ts
import pino, { type Logger } from 'pino';

/** a known pino level name, or `info` */
export function resolveLevel(value: string | undefined): string {
  if (value === undefined) return 'info';
  return value === 'silent' || Object.hasOwn(pino.levels.values, value) ? value : 'info';
}

export const logger: Logger = pino({
  name: 'recset',
  level: resolveLevel(process.env.LOG_LEVEL)
});

export function childLogger(component: string): Logger {
  return logger.child({ component });
}

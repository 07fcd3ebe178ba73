import pino, { Logger } from 'pino';

export type { Logger };

export function createLogger(level: string = 'info'): Logger {
  return pino({ name: 'dexscreener', level });
}

export const logger: Logger = createLogger();

export function createChildLogger(module: string, parent: Logger = logger): Logger {
  return parent.child({ module });
}

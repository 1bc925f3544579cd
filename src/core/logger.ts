import type { Logger } from './types.js';

const DEBUG_NAMESPACE = 'okta-origin-report';

export const isDebugEnabled = (env: Readonly<Record<string, string | undefined>>): boolean => {
  const raw = env.DEBUG ?? '';
  return raw
    .split(',')
    .map((part) => part.trim())
    .some((part) => part === '*' || part === DEBUG_NAMESPACE);
};

export const createConsoleLogger = (tag: string, debug = false): Logger => {
  const prefix = `[${tag}]`;
  return {
    info: (msg, ...rest) => console.log(`${prefix} ${msg}`, ...rest),
    warn: (msg, ...rest) => console.warn(`${prefix} ${msg}`, ...rest),
    error: (msg, ...rest) => console.error(`${prefix} ${msg}`, ...rest),
    debug: (msg, ...rest) => {
      if (debug) console.debug(`${prefix} ${msg}`, ...rest);
    },
  };
};

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};

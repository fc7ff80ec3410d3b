import { env } from 'node:process';

let debugEnabled = Boolean(env.DEBUG);

export const setDebugEnabled = (enabled: boolean): void => {
  debugEnabled = enabled;
};

export const isDebugEnabled = (): boolean => debugEnabled;

export const debug = (...args: unknown[]): void => {
  if (debugEnabled) {
    console.debug('[debug]', ...args);
  }
};

export const warn = (message: string, details?: Record<string, unknown>): void => {
  if (details) {
    console.warn('[warn]', message, details);
    return;
  }
  console.warn('[warn]', message);
};

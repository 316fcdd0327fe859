import { SERVICE } from './config.js';

let debugEnabled = false;

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

const prefix = `[${SERVICE}]`;

export const log = {
  debug(...args: unknown[]): void {
    if (debugEnabled) console.debug(prefix, ...args);
  },
  info(...args: unknown[]): void {
    console.log(prefix, ...args);
  },
  warn(...args: unknown[]): void {
    console.warn(prefix, ...args);
  },
  error(...args: unknown[]): void {
    console.error(prefix, ...args);
  },
};

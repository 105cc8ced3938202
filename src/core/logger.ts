/**
 * Console logger with a fixed tag so paint messages are easy to filter
 * in devtools.
 */
const TAG = "[paint]";

export const logger = {
  log(...args: unknown[]) {
    console.log(TAG, ...args);
  },
  warn(...args: unknown[]) {
    console.warn(TAG, ...args);
  },
  error(...args: unknown[]) {
    console.error(TAG, ...args);
  },
};

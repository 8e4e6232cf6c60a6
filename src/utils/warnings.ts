import { config } from '../config';

// Keys already reported during this process.
const seen = new Set<string>();

/**
 * Print `message` through `console.warn` the first time `key` is seen, provided
 * `config.warnings` is enabled. Later calls with the same key are silent.
 *
 * @returns true when the warning was emitted by this call.
 */
export function onceWarn(key: string, message: string): boolean {
  if (!config.warnings || seen.has(key)) return false;
  // eslint-disable-next-line no-console
  console.warn(message);
  seen.add(key);
  return true;
}

/** Forget every key reported so far (tests use this to observe warnings again). */
export function resetWarnings(): void {
  seen.clear();
}

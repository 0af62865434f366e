/**
 * Optional Accessor
 *
 * Reads a host property that some clip types do not support. An
 * unsupported read becomes an "unknown" result the caller can inspect;
 * any other failure still propagates.
 */

import { HostPropertyError } from './errors/index.js';

export type Probe<T> =
  | { known: true; value: T }
  | { known: false; reason: string };

export function known<T>(value: T): Probe<T> {
  return { known: true, value };
}

export function unknown<T>(reason: string): Probe<T> {
  return { known: false, reason };
}

export function probe<T>(read: () => T): Probe<T> {
  try {
    return known(read());
  } catch (error) {
    if (error instanceof HostPropertyError) {
      return unknown(error.message);
    }
    throw error;
  }
}

/**
 * True only when the probe is known and its value satisfies the predicate.
 */
export function probeIs<T>(result: Probe<T>, predicate: (value: T) => boolean): boolean {
  return result.known && predicate(result.value);
}

import { constants } from 'node:os';
import stripAnsiSequences from 'strip-ansi';

/**
 * Current wall-clock time in (fractional) seconds
 */
export function nowSeconds(): number {
  return Date.now() / 1000;
}

/**
 * Remove ANSI escape sequences. Idempotent.
 */
export function stripAnsi(text: string): string {
  return stripAnsiSequences(text);
}

/**
 * Decode bytes as UTF-8, replacing invalid sequences with U+FFFD
 */
export function decodeUtf8(bytes: Uint8Array): string {
  return new TextDecoder('utf-8', { fatal: false }).decode(bytes);
}

/**
 * UTF-8 byte length of a string
 */
export function byteLength(text: string): number {
  return Buffer.byteLength(text, 'utf8');
}

/**
 * Resolve a signal number to its name (e.g. 9 -> 'SIGKILL')
 */
export function signalName(signal: number | string): string {
  if (typeof signal === 'string') return signal;
  for (const [name, value] of Object.entries(constants.signals)) {
    if (value === signal) return name;
  }
  return `SIG${signal}`;
}

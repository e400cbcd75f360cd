/**
 * Configuration
 *
 * The CLI hands raw option values to `parseConfig`, which applies defaults,
 * validates every field and either returns a `TtyframeConfig` or throws a
 * `ConfigurationError` naming the fields that failed.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { compilePromptPatterns } from './session.js';
import type { CompressionMode, SessionOptions, TokenMode } from './types.js';

export const DEFAULTS = {
  cols: 120,
  rows: 40,
  idleMs: 200,
  tokenMode: 'raw',
  bufferBytes: 8 * 1024 * 1024,
  overflowTimeoutMs: 5000,
  compress: 'none',
} as const satisfies {
  cols: number;
  rows: number;
  idleMs: number;
  tokenMode: TokenMode;
  bufferBytes: number;
  overflowTimeoutMs: number;
  compress: CompressionMode;
};

/** Wrapper that runs the target inside a sandbox */
export const CAPSULE_COMMAND = 'capsule-run';

const integerOption = (name: string) =>
  z.coerce.number({ invalid_type_error: `${name} must be a number` }).int(`${name} must be an integer`);

const bindAddress = z
  .string()
  .regex(/^.+:\d{1,5}$/, 'bind must be HOST:PORT')
  .transform(value => {
    const idx = value.lastIndexOf(':');
    return { host: value.slice(0, idx), port: Number(value.slice(idx + 1)) };
  })
  .refine(({ port }) => port >= 1 && port <= 65535, 'bind port must be in 1..65535');

export const configSchema = z
  .object({
    json: z.boolean().default(false),
    socket: z.string().min(1).optional(),
    bind: bindAddress.optional(),
    cols: integerOption('cols').min(1, 'cols must be at least 1').max(0xffff).default(DEFAULTS.cols),
    rows: integerOption('rows').min(1, 'rows must be at least 1').max(0xffff).default(DEFAULTS.rows),
    idle: integerOption('idle').positive('idle must be greater than 0').default(DEFAULTS.idleMs),
    tokenMode: z.enum(['raw', 'compact', 'parsed']).default(DEFAULTS.tokenMode),
    promptRegex: z.array(z.string()).default([]),
    buffer: integerOption('buffer').positive('buffer must be greater than 0').default(DEFAULTS.bufferBytes),
    overflowTimeout: integerOption('overflow-timeout')
      .nonnegative('overflow-timeout must not be negative')
      .default(DEFAULTS.overflowTimeoutMs),
    record: z.string().min(1).optional(),
    capsule: z.boolean().default(false),
    sandboxProfile: z.string().min(1).optional(),
    stateDir: z.string().min(1).optional(),
    compress: z.enum(['none', 'gzip', 'deflate']).default(DEFAULTS.compress),
    verbose: z.boolean().default(false),
    command: z.string().min(1, 'a command is required'),
    args: z.array(z.string()).default([]),
  })
  .refine(config => !(config.socket && config.bind), {
    message: 'socket and bind are mutually exclusive',
    path: ['socket'],
  });

export type TtyframeConfig = z.output<typeof configSchema>;

export type RawConfig = z.input<typeof configSchema>;

/**
 * Validate raw option values
 *
 * @throws ConfigurationError listing every invalid field, or naming the
 *   first prompt pattern that does not compile
 */
export function parseConfig(raw: RawConfig): TtyframeConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  compilePromptPatterns(result.data.promptRegex);
  return result.data;
}

/**
 * Command line actually spawned, accounting for the capsule wrapper
 */
export function resolveLaunch(config: TtyframeConfig): { command: string; args: string[] } {
  if (!config.capsule) {
    return { command: config.command, args: config.args };
  }

  const profile = config.sandboxProfile ? ['--profile', config.sandboxProfile] : [];
  return {
    command: CAPSULE_COMMAND,
    args: [...profile, '--', config.command, ...config.args],
  };
}

/**
 * Session options derived from a validated configuration
 */
export function toSessionOptions(config: TtyframeConfig): SessionOptions {
  const { command, args } = resolveLaunch(config);
  return {
    command,
    args,
    cols: config.cols,
    rows: config.rows,
    promptPatterns: config.promptRegex,
    idleTimeoutMs: config.idle,
    maxBufferBytes: config.buffer,
    overflowGraceMs: config.overflowTimeout,
  };
}

/**
 * Command line as shown in the recording header
 */
export function describeCommand(config: TtyframeConfig): string {
  return [config.command, ...config.args].join(' ');
}

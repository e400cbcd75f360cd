/**
 * Frame protocol
 *
 * Frames are built through an immutable builder and serialized as one JSON
 * object per line. Absent fields are omitted, never written as null.
 *
 * @example
 * ```typescript
 * import { frame, encodeFrame, decodeFrame } from 'ttyframe';
 *
 * const f = frame('exit').withExitCode(0).build();
 * const line = encodeFrame(f); // {"ts":1700000000.123,"type":"exit","code":0}
 * const back = decodeFrame(line);
 * ```
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { SerializationError } from './errors.js';
import type { Frame, FrameType } from './types.js';
import { byteLength, decodeUtf8, nowSeconds } from './utils.js';

export const FRAME_TYPES = [
  'stdout',
  'stdin',
  'stderr',
  'cursor',
  'resize',
  'resize_ack',
  'prompt',
  'idle',
  'line_update',
  'overflow',
  'signal',
  'exit',
  'stopped',
  'continued',
  'capsule_kill',
  'ping',
  'pong',
] as const satisfies readonly FrameType[];

// Wire order of fields
const FIELD_ORDER = [
  'ts',
  'type',
  'data',
  'binary',
  'cols',
  'rows',
  'code',
  'signal',
  'regex',
  'dur_ms',
  'reason',
] as const;

type MutableFrame = { -readonly [K in keyof Frame]: Frame[K] };

// ═══════════════════════════════════════════════════════════════════════════════
// Builder
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Immutable frame builder. Every `with*` call returns a new builder;
 * `build()` collapses to a frozen Frame.
 */
export class FrameBuilder {
  private constructor(private readonly _fields: Readonly<MutableFrame>) {}

  /**
   * Start a frame of the given type, timestamped now
   */
  static of(type: FrameType, ts: number = nowSeconds()): FrameBuilder {
    return new FrameBuilder({ ts, type });
  }

  /**
   * Start from an existing frame, keeping its timestamp
   */
  static from(source: Frame): FrameBuilder {
    return new FrameBuilder({ ...source });
  }

  private with(patch: Partial<MutableFrame>): FrameBuilder {
    return new FrameBuilder({ ...this._fields, ...patch });
  }

  withType(type: FrameType): FrameBuilder {
    return this.with({ type });
  }

  withTimestamp(ts: number): FrameBuilder {
    return this.with({ ts });
  }

  /** Text payload; clears any binary flag */
  withData(data: string): FrameBuilder {
    return this.with({ data, binary: undefined });
  }

  /** Binary payload, stored base64 */
  withBinaryData(bytes: Uint8Array): FrameBuilder {
    return this.with({ data: Buffer.from(bytes).toString('base64'), binary: true });
  }

  withSize(cols: number, rows: number): FrameBuilder {
    return this.with({ cols, rows });
  }

  withExitCode(code: number): FrameBuilder {
    return this.with({ code });
  }

  withSignal(signal: string): FrameBuilder {
    return this.with({ signal });
  }

  withRegex(regex: string): FrameBuilder {
    return this.with({ regex });
  }

  withDuration(durMs: number): FrameBuilder {
    return this.with({ dur_ms: Math.max(0, Math.round(durMs)) });
  }

  withReason(reason: string): FrameBuilder {
    return this.with({ reason });
  }

  build(): Frame {
    const out: MutableFrame = { ts: this._fields.ts, type: this._fields.type };
    for (const key of FIELD_ORDER) {
      const value = this._fields[key];
      if (value !== undefined) {
        Object.assign(out, { [key]: value });
      }
    }
    return Object.freeze(out);
  }
}

/**
 * Shorthand for `FrameBuilder.of(type)`
 */
export function frame(type: FrameType): FrameBuilder {
  return FrameBuilder.of(type);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Payload helpers
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Payload bytes of a frame as carried in memory
 */
export function payloadBytes(f: Frame): Uint8Array {
  if (f.data === undefined) return new Uint8Array(0);
  return f.binary ? Buffer.from(f.data, 'base64') : Buffer.from(f.data, 'utf8');
}

/**
 * Payload as text; binary payloads are decoded lossily as UTF-8
 */
export function frameText(f: Frame): string {
  if (f.data === undefined) return '';
  return f.binary ? decodeUtf8(Buffer.from(f.data, 'base64')) : f.data;
}

/**
 * Size a frame counts against the back-pressure budget
 */
export function frameSize(f: Frame): number {
  return f.data === undefined ? 0 : byteLength(f.data);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Wire codec
// ═══════════════════════════════════════════════════════════════════════════════

const u16 = z.number().int().min(0).max(0xffff);

export const frameSchema = z.object({
  ts: z.number().finite(),
  type: z.enum(FRAME_TYPES),
  data: z.string().optional(),
  binary: z.boolean().optional(),
  cols: u16.optional(),
  rows: u16.optional(),
  code: z.number().int().min(-0x80000000).max(0x7fffffff).optional(),
  signal: z.string().optional(),
  regex: z.string().optional(),
  dur_ms: z.number().int().nonnegative().optional(),
  reason: z.string().optional(),
});

/**
 * Serialize a frame to its single-line JSON wire form
 */
export function encodeFrame(f: Frame): string {
  const result = frameSchema.safeParse(f);
  if (!result.success) {
    throw new SerializationError(`Cannot encode ${f.type} frame: ${formatIssues(result.error)}`);
  }
  return JSON.stringify(FrameBuilder.from(result.data).build());
}

/**
 * Parse one JSON line into a frame
 */
export function decodeFrame(line: string): Frame {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (err) {
    throw new SerializationError('Frame is not valid JSON', { cause: err });
  }

  const result = frameSchema.safeParse(parsed);
  if (!result.success) {
    throw new SerializationError(`Invalid frame: ${formatIssues(result.error)}`);
  }
  return FrameBuilder.from(result.data).build();
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

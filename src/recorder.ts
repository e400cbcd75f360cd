/**
 * Session recording
 *
 * Persists frames as an asciinema v2 cast: a header line, then one
 * `[elapsedSeconds, "o" | "i", payload]` line per event. Every line is
 * written synchronously so a crash loses at most the event in flight.
 *
 * @example
 * ```typescript
 * import { RecordingManager } from 'ttyframe';
 *
 * const recording = new RecordingManager();
 * recording.startRecording('session.cast', 120, 40, 'bash');
 * recording.recordFrame(frame);
 * recording.stopRecording();
 * ```
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs';
import { RecordingError } from './errors.js';
import { frameText } from './frame.js';
import { createLogger } from './logger.js';
import type { Frame } from './types.js';

const log = createLogger('recorder');

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * asciinema v2 header
 */
export interface AsciicastHeader {
  version: 2;
  width: number;
  height: number;
  /** Start time, whole seconds since epoch */
  timestamp: number;
  title?: string;
  command?: string;
  env: {
    SHELL: string;
    TERM: string;
  };
}

export type AsciicastEventCode = 'o' | 'i';

export type AsciicastEvent = [elapsed: number, code: AsciicastEventCode, data: string];

export interface RecorderOptions {
  width: number;
  height: number;
  title?: string;
  command?: string;
  /** Environment the SHELL/TERM descriptor is read from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Monotonic clock in ms (default: performance.now) */
  clock?: () => number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Event mapping
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Map a frame to its cast event code and payload, or null if the frame
 * is not recorded
 */
export function toAsciicastEvent(f: Frame): [AsciicastEventCode, string] | null {
  switch (f.type) {
    case 'stdout':
    case 'stderr':
      return ['o', frameText(f)];
    case 'stdin':
      return ['i', frameText(f)];
    case 'resize':
      // No resize event in v2; leave a marker in the output
      if (f.cols === undefined || f.rows === undefined) return null;
      return ['o', `# Terminal resized to ${f.cols}x${f.rows}\r\n`];
    default:
      return null;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Recorder
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Writes one cast file. The header goes out at construction; `finish`
 * closes the file once, and later calls do nothing.
 */
export class AsciicastRecorder {
  readonly path: string;
  readonly header: AsciicastHeader;

  private _fd: number | null;
  private readonly _clock: () => number;
  private readonly _startedAt: number;
  private _lastElapsed = 0;
  private _events = 0;

  /**
   * @throws RecordingError if the file cannot be created or written
   */
  constructor(path: string, options: RecorderOptions) {
    const env = options.env ?? process.env;
    this.path = path;
    this._clock = options.clock ?? (() => performance.now());

    this.header = {
      version: 2,
      width: options.width,
      height: options.height,
      timestamp: Math.floor(Date.now() / 1000),
      ...(options.title !== undefined && { title: options.title }),
      ...(options.command !== undefined && { command: options.command }),
      env: {
        SHELL: env.SHELL || '/bin/sh',
        TERM: env.TERM || 'xterm-256color',
      },
    };

    try {
      this._fd = fs.openSync(path, 'w');
    } catch (err) {
      throw new RecordingError(`Cannot create recording at ${path}`, { cause: err });
    }

    this._startedAt = this._clock();
    this.writeLine(JSON.stringify(this.header));
  }

  get finished(): boolean {
    return this._fd === null;
  }

  /** Event lines written so far */
  get eventCount(): number {
    return this._events;
  }

  /**
   * Append a frame if its type is recorded
   *
   * @returns whether a line was written
   */
  recordFrame(f: Frame): boolean {
    if (this._fd === null) return false;

    const event = toAsciicastEvent(f);
    if (!event) return false;

    const elapsed = Math.max(this._lastElapsed, (this._clock() - this._startedAt) / 1000);
    const rounded = Math.round(elapsed * 1e6) / 1e6;
    this._lastElapsed = rounded;

    const line: AsciicastEvent = [rounded, event[0], event[1]];
    this.writeLine(JSON.stringify(line));
    this._events++;
    return true;
  }

  /**
   * Flush and close. Idempotent.
   */
  finish(): void {
    if (this._fd === null) return;
    const fd = this._fd;
    this._fd = null;

    try {
      fs.fsyncSync(fd);
    } catch (err) {
      log.debug('fsync failed', err);
    }
    try {
      fs.closeSync(fd);
    } catch (err) {
      throw new RecordingError(`Failed to close recording at ${this.path}`, { cause: err });
    }
  }

  private writeLine(line: string): void {
    if (this._fd === null) return;
    try {
      fs.writeSync(this._fd, line + '\n');
    } catch (err) {
      const fd = this._fd;
      this._fd = null;
      try {
        fs.closeSync(fd);
      } catch (closeErr) {
        log.debug('close after failed write also failed', closeErr);
      }
      throw new RecordingError(`Failed to write recording at ${this.path}`, { cause: err });
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Manager
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Holds at most one active recorder for a session
 */
export class RecordingManager {
  private _recorder: AsciicastRecorder | null = null;

  get isRecording(): boolean {
    return this._recorder !== null;
  }

  get recorder(): AsciicastRecorder | null {
    return this._recorder;
  }

  /**
   * Open a new recording. An active one is finished first.
   *
   * @throws RecordingError if the destination cannot be created
   */
  startRecording(
    path: string,
    width: number,
    height: number,
    command?: string,
    options: Omit<RecorderOptions, 'width' | 'height' | 'command'> = {}
  ): void {
    this.stopRecording();
    this._recorder = new AsciicastRecorder(path, { ...options, width, height, command });
    log.info(`Recording to: ${path}`);
  }

  /**
   * Record a frame on the active recorder. A write failure deactivates
   * recording and is rethrown.
   */
  recordFrame(f: Frame): void {
    if (!this._recorder) return;
    try {
      this._recorder.recordFrame(f);
    } catch (err) {
      this._recorder = null;
      throw err;
    }
  }

  /**
   * Finish the active recording, if any. Idempotent.
   */
  stopRecording(): void {
    const recorder = this._recorder;
    if (!recorder) return;
    this._recorder = null;
    recorder.finish();
    log.info(`Recording stopped after ${recorder.eventCount} events`);
  }
}

/**
 * PTY session
 *
 * Owns one child process on a pseudo-terminal and turns everything that
 * happens to it into frames on a single channel: output, echoed input,
 * resizes, idle periods, exit, and back-pressure escalation.
 *
 * @example
 * ```typescript
 * import { PtySession } from 'ttyframe';
 *
 * const session = await PtySession.spawn({
 *   command: 'bash',
 *   cols: 120,
 *   rows: 40,
 *   idleTimeoutMs: 200,
 * });
 *
 * session.writeInput('echo hi\n');
 * for await (const frame of session) {
 *   console.log(frame.type, frame.data);
 * }
 * ```
 *
 * @packageDocumentation
 */

import { EventEmitter } from 'node:events';
import { spawnNodePty, type BackendFactory, type Disposable, type PtyBackend } from './backend.js';
import { FrameChannel } from './channel.js';
import { ConfigurationError, PtyIoError } from './errors.js';
import { frame } from './frame.js';
import { createLogger } from './logger.js';
import type {
  ExitStatus,
  Frame,
  SessionControl,
  SessionEvents,
  SessionOptions,
} from './types.js';
import { decodeUtf8 } from './utils.js';

const log = createLogger('session');

export const DEFAULT_MAX_BUFFER_BYTES = 8 * 1024 * 1024;
export const DEFAULT_OVERFLOW_GRACE_MS = 5000;
export const DEFAULT_POLL_INTERVAL_MS = 100;

// ═══════════════════════════════════════════════════════════════════════════════
// Validation
// ═══════════════════════════════════════════════════════════════════════════════

function isWindowDimension(value: number): boolean {
  return Number.isInteger(value) && value >= 1 && value <= 0xffff;
}

/**
 * Check a window size; both dimensions must be integers in 1..65535
 */
export function validateWindowSize(cols: number, rows: number): void {
  if (!isWindowDimension(cols) || !isWindowDimension(rows)) {
    throw new ConfigurationError(`Window size must be at least 1x1, got ${cols}x${rows}`);
  }
}

/**
 * Compile prompt patterns. An invalid pattern is a configuration error.
 */
export function compilePromptPatterns(patterns: readonly string[]): RegExp[] {
  return patterns.map(pattern => {
    try {
      return new RegExp(pattern);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigurationError(`Invalid prompt regex '${pattern}': ${reason}`, { cause: err });
    }
  });
}

function validateOptions(options: SessionOptions): void {
  validateWindowSize(options.cols, options.rows);
  if (!(options.idleTimeoutMs > 0)) {
    throw new ConfigurationError(`Idle timeout must be greater than 0, got ${options.idleTimeoutMs}`);
  }
  if (options.maxBufferBytes !== undefined && !(options.maxBufferBytes > 0)) {
    throw new ConfigurationError(`Buffer size must be greater than 0, got ${options.maxBufferBytes}`);
  }
  if (options.overflowGraceMs !== undefined && !(options.overflowGraceMs >= 0)) {
    throw new ConfigurationError(`Overflow grace must not be negative, got ${options.overflowGraceMs}`);
  }
  if (options.pollIntervalMs !== undefined && !(options.pollIntervalMs > 0)) {
    throw new ConfigurationError(`Poll interval must be greater than 0, got ${options.pollIntervalMs}`);
  }
}

function childEnv(overrides: Record<string, string> = {}): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) env[key] = value;
  }
  return { ...env, ...overrides };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Session
// ═══════════════════════════════════════════════════════════════════════════════

export class PtySession extends EventEmitter implements SessionControl, AsyncIterable<Frame> {
  readonly promptPatterns: readonly RegExp[];
  readonly idleTimeoutMs: number;
  readonly maxBufferBytes: number;
  readonly overflowGraceMs: number;

  /** Resolves once the session stopped producing frames */
  readonly done: Promise<void>;

  private readonly _channel = new FrameChannel();
  private readonly _subscriptions: Disposable[] = [];
  private readonly _backlogSources: Array<() => number> = [];
  private readonly _resolveDone: () => void;
  private _cols: number;
  private _rows: number;
  private _lastActivity = Date.now();
  private _idleEmitted = false;
  private _idleTimer: ReturnType<typeof setTimeout> | null = null;
  private _pollTimer: ReturnType<typeof setInterval> | null = null;
  private _overflowSince: number | null = null;
  private _overflowKilled = false;
  private _exited = false;
  private _finished = false;

  private constructor(
    private readonly _backend: PtyBackend,
    options: SessionOptions,
    promptPatterns: RegExp[]
  ) {
    super();

    this.promptPatterns = promptPatterns;
    this.idleTimeoutMs = options.idleTimeoutMs;
    this.maxBufferBytes = options.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES;
    this.overflowGraceMs = options.overflowGraceMs ?? DEFAULT_OVERFLOW_GRACE_MS;
    this._cols = options.cols;
    this._rows = options.rows;

    let resolveDone = (): void => {};
    this.done = new Promise<void>(resolve => {
      resolveDone = resolve;
    });
    this._resolveDone = resolveDone;

    this._subscriptions.push(
      _backend.onData(chunk => this.handleOutput(chunk)),
      _backend.onEnd(() => {
        log.debug('PTY output stream closed');
        this.emit('eof');
      })
    );

    this._pollTimer = setInterval(
      () => this.poll(),
      options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS
    );
    this.armIdleTimer();
  }

  /**
   * Validate options, compile prompt patterns and spawn the child
   *
   * @throws ConfigurationError for invalid options
   * @throws SpawnError if the PTY or the child cannot be created
   */
  static async spawn(
    options: SessionOptions,
    createBackend: BackendFactory = spawnNodePty
  ): Promise<PtySession> {
    validateOptions(options);
    const patterns = compilePromptPatterns(options.promptPatterns ?? []);
    const env = childEnv(options.env);

    const backend = await createBackend({
      command: options.command,
      args: options.args ?? [],
      cols: options.cols,
      rows: options.rows,
      cwd: options.cwd ?? process.cwd(),
      env,
      term: env.TERM,
    });

    log.info(`PTY session started with PID: ${backend.pid}`);
    return new PtySession(backend, options, patterns);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Getters
  // ═══════════════════════════════════════════════════════════════════════════

  get pid(): number {
    return this._backend.pid;
  }

  get cols(): number {
    return this._cols;
  }

  get rows(): number {
    return this._rows;
  }

  /** Payload bytes produced but not yet taken from the frame stream */
  get pendingBytes(): number {
    return this._channel.pendingBytes;
  }

  /**
   * Count bytes held further down the pipeline, such as a sink's unflushed
   * writes, against the back-pressure budget
   */
  watchBacklog(source: () => number): void {
    this._backlogSources.push(source);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Frame stream
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Take the next frame; `done` once the session finished and the
   * backlog is drained
   */
  nextFrame(): Promise<IteratorResult<Frame>> {
    return this._channel.next();
  }

  [Symbol.asyncIterator](): AsyncIterator<Frame> {
    return this._channel[Symbol.asyncIterator]();
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Control
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Write bytes to the child verbatim and mirror them as a `stdin` frame
   *
   * @throws PtyIoError if the write fails or the child has exited
   */
  writeInput(data: string | Uint8Array): void {
    if (!this.isAlive()) {
      throw new PtyIoError('Cannot write: child process has exited');
    }

    try {
      this._backend.write(typeof data === 'string' ? data : Buffer.from(data));
    } catch (err) {
      throw new PtyIoError('Failed to write to PTY', { cause: err });
    }

    this.markActivity();
    // Only the mirror is lossy; the child got the exact bytes
    const text = typeof data === 'string' ? data : decodeUtf8(data);
    this.push(frame('stdin').withData(text).build());
  }

  /**
   * Resize the terminal and emit a `resize` frame
   *
   * @throws ConfigurationError for a dimension below 1
   * @throws PtyIoError if the resize call fails or the child has exited
   */
  resize(cols: number, rows: number): void {
    validateWindowSize(cols, rows);
    if (!this.isAlive()) {
      throw new PtyIoError('Cannot resize: child process has exited');
    }

    try {
      this._backend.resize(cols, rows);
    } catch (err) {
      throw new PtyIoError(`Failed to resize PTY to ${cols}x${rows}`, { cause: err });
    }

    this._cols = cols;
    this._rows = rows;
    this.markActivity();
    this.push(frame('resize').withSize(cols, rows).build());
    log.debug(`Resized: ${cols}x${rows}`);
  }

  /**
   * Record that a client finished redrawing at the given size
   */
  acknowledgeResize(cols: number, rows: number): void {
    this.push(frame('resize_ack').withSize(cols, rows).build());
  }

  /**
   * Whether the child has not yet been observed to exit
   */
  isAlive(): boolean {
    return !this._exited && !this._finished && this._backend.pollExit() === null;
  }

  /**
   * Stop producing frames and kill the child if it is still running.
   * Frames already queued remain readable.
   */
  cancel(): void {
    if (this._finished) return;

    if (this.isAlive()) {
      log.debug(`Killing child ${this._backend.pid}`);
      this._backend.kill('SIGKILL');
    }
    this.shutdown();
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Internal
  // ═══════════════════════════════════════════════════════════════════════════

  private push(f: Frame): void {
    this._channel.push(f);
  }

  private handleOutput(chunk: string): void {
    if (this._finished) return;
    this.markActivity();
    this.push(frame('stdout').withData(chunk).build());
  }

  private markActivity(): void {
    this._lastActivity = Date.now();
    this._idleEmitted = false;
    this.armIdleTimer();
  }

  /**
   * Arm the idle timer relative to the latest activity
   */
  private armIdleTimer(): void {
    if (this._idleTimer) clearTimeout(this._idleTimer);
    if (this._finished) return;

    const elapsed = Date.now() - this._lastActivity;
    const delay = Math.max(0, this.idleTimeoutMs - elapsed);
    this._idleTimer = setTimeout(() => this.onIdleTimer(), delay);
  }

  private onIdleTimer(): void {
    this._idleTimer = null;
    if (this._finished || this._idleEmitted) return;

    const elapsed = Date.now() - this._lastActivity;
    if (elapsed < this.idleTimeoutMs) {
      this.armIdleTimer();
      return;
    }

    // One idle frame per crossing; re-armed only by new activity
    this._idleEmitted = true;
    this.push(frame('idle').withDuration(elapsed).build());
  }

  private poll(): void {
    if (this._finished) return;

    const status = this._backend.pollExit();
    if (status) {
      this.finish(status);
      return;
    }

    this.checkBackPressure();
  }

  private undeliveredBytes(): number {
    let total = this._channel.pendingBytes;
    for (const source of this._backlogSources) total += source();
    return total;
  }

  private checkBackPressure(): void {
    const pending = this.undeliveredBytes();

    if (pending <= this.maxBufferBytes) {
      if (this._overflowSince !== null) {
        log.info(`Backlog drained to ${pending} bytes`);
      }
      this._overflowSince = null;
      return;
    }

    const now = Date.now();
    if (this._overflowSince === null) {
      this._overflowSince = now;
      log.warn(`Frame backlog ${pending} bytes exceeds budget of ${this.maxBufferBytes} bytes`);
      this.push(
        frame('overflow')
          .withReason(`${pending} bytes pending exceeds buffer budget of ${this.maxBufferBytes} bytes`)
          .build()
      );
      return;
    }

    if (!this._overflowKilled && now - this._overflowSince >= this.overflowGraceMs) {
      this._overflowKilled = true;
      log.error(`Consumer stalled for ${this.overflowGraceMs}ms, killing child ${this._backend.pid}`);
      this._backend.kill('SIGKILL');
      this.push(
        frame('capsule_kill')
          .withReason(
            `backlog of ${pending} bytes not drained within ${this.overflowGraceMs}ms grace period`
          )
          .build()
      );
    }
  }

  private finish(status: ExitStatus): void {
    this._exited = true;

    if (status.signal) {
      this.push(frame('signal').withSignal(status.signal).build());
      log.info(`Child process terminated by signal: ${status.signal}`);
    } else {
      this.push(frame('exit').withExitCode(status.code).build());
      log.info(`Child process exited with code: ${status.code}`);
    }

    this.emit('exit', status);
    this.shutdown();
  }

  private shutdown(): void {
    if (this._finished) return;
    this._finished = true;

    if (this._idleTimer) {
      clearTimeout(this._idleTimer);
      this._idleTimer = null;
    }
    if (this._pollTimer) {
      clearInterval(this._pollTimer);
      this._pollTimer = null;
    }
    for (const sub of this._subscriptions) sub.dispose();
    this._subscriptions.length = 0;

    this._channel.close();
    this._resolveDone();
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Event emitter overrides for type safety
  // ═══════════════════════════════════════════════════════════════════════════

  override on<K extends keyof SessionEvents>(
    event: K,
    listener: SessionEvents[K]
  ): this {
    return super.on(event, listener);
  }

  override off<K extends keyof SessionEvents>(
    event: K,
    listener: SessionEvents[K]
  ): this {
    return super.off(event, listener);
  }

  override once<K extends keyof SessionEvents>(
    event: K,
    listener: SessionEvents[K]
  ): this {
    return super.once(event, listener);
  }

  override emit<K extends keyof SessionEvents>(
    event: K,
    ...args: Parameters<SessionEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }
}

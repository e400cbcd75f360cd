/**
 * Test doubles
 *
 * In-process stand-ins for the PTY, the sink and OS signals, so sessions
 * and the orchestrator can be driven without spawning anything.
 *
 * @packageDocumentation
 */

import type { BackendFactory, Disposable, LaunchSpec, PtyBackend } from './backend.js';
import type { SignalSource } from './orchestrator.js';
import type { ControlHandler, FrameSink } from './sinks.js';
import type { ExitStatus, Frame } from './types.js';

let nextPid = 4000;

/**
 * Scripted PTY backend. Output, end of stream and exit are triggered by
 * the test; writes, resizes and kills are recorded.
 */
export class FakeBackend implements PtyBackend {
  readonly pid = nextPid++;
  readonly writes: Array<string | Buffer> = [];
  readonly resizes: Array<[cols: number, rows: number]> = [];
  readonly kills: string[] = [];

  /** Make `write` throw */
  failWrites = false;
  /** Make `resize` throw */
  failResizes = false;
  /** Whether `kill` makes the child exit with that signal right away */
  exitOnKill = true;

  private _exit: ExitStatus | null = null;
  private readonly _dataListeners = new Set<(chunk: string) => void>();
  private readonly _endListeners = new Set<() => void>();

  onData(listener: (chunk: string) => void): Disposable {
    this._dataListeners.add(listener);
    return { dispose: () => this._dataListeners.delete(listener) };
  }

  onEnd(listener: () => void): Disposable {
    this._endListeners.add(listener);
    return { dispose: () => this._endListeners.delete(listener) };
  }

  write(data: string | Buffer): void {
    if (this.failWrites) throw new Error('EIO: write failed');
    this.writes.push(data);
  }

  resize(cols: number, rows: number): void {
    if (this.failResizes) throw new Error('EBADF: resize failed');
    this.resizes.push([cols, rows]);
  }

  pollExit(): ExitStatus | null {
    return this._exit;
  }

  kill(signal = 'SIGTERM'): void {
    this.kills.push(signal);
    if (this.exitOnKill && !this._exit) {
      this.exit(-1, signal);
    }
  }

  /** Child writes output */
  emit(chunk: string): void {
    for (const listener of this._dataListeners) listener(chunk);
  }

  /** Output stream closes */
  end(): void {
    for (const listener of this._endListeners) listener();
  }

  /** Child exits; output ends with it */
  exit(code: number, signal?: string): void {
    this._exit = signal ? { code, signal } : { code };
    this.end();
  }
}

/**
 * Factory that hands out one prepared backend and remembers the launch spec
 */
export function fakeBackendFactory(backend: FakeBackend = new FakeBackend()): {
  backend: FakeBackend;
  factory: BackendFactory;
  launched: LaunchSpec[];
} {
  const launched: LaunchSpec[] = [];
  return {
    backend,
    launched,
    factory: spec => {
      launched.push(spec);
      return backend;
    },
  };
}

/**
 * Sink that keeps frames in memory
 */
export class MemorySink implements FrameSink {
  readonly name = 'memory';
  readonly frames: Frame[] = [];
  started = false;
  closed = false;
  /** What the sink reports as not yet delivered */
  pendingBytes = 0;

  private _handler: ControlHandler | null = null;

  async start(): Promise<void> {
    this.started = true;
  }

  send(frame: Frame): void {
    this.frames.push(frame);
  }

  onControl(handler: ControlHandler): void {
    this._handler = handler;
  }

  /** Deliver a control frame as if the client sent it */
  control(frame: Frame): void {
    this._handler?.(frame);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  get types(): string[] {
    return this.frames.map(f => f.type);
  }
}

/**
 * Signal source the test raises by hand
 */
export class ManualSignals implements SignalSource {
  disposed = false;

  private _raise: (signal: string) => void = () => {};
  private readonly _received = new Promise<string>(resolve => {
    this._raise = resolve;
  });

  wait(): Promise<string> {
    return this._received;
  }

  raise(signal: string): void {
    this._raise(signal);
  }

  dispose(): void {
    this.disposed = true;
  }
}

/**
 * Orchestrator
 *
 * The top-level loop. It races the next session frame against termination
 * signals and session completion, threads every frame through the output
 * processor, records it, and hands it to the sink. Processing of one frame
 * finishes before the next is taken.
 *
 * @packageDocumentation
 */

import { frame, payloadBytes } from './frame.js';
import { toError } from './errors.js';
import { createLogger } from './logger.js';
import type { OutputProcessor } from './processor.js';
import type { RecordingManager } from './recorder.js';
import type { FrameSink } from './sinks.js';
import type { ExitStatus, Frame, SessionControl } from './types.js';

const log = createLogger('orchestrator');

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * What the orchestrator needs from a session
 */
export interface ManagedSession extends SessionControl {
  nextFrame(): Promise<IteratorResult<Frame>>;
  readonly done: Promise<void>;
  cancel(): void;
  /** Add downstream bytes to the session's back-pressure check */
  watchBacklog(source: () => number): void;
}

/**
 * Source of OS termination signals
 */
export interface SignalSource {
  /** Resolves with the first signal received */
  wait(): Promise<string>;
  dispose(): void;
}

export type ShutdownReason = 'signal' | 'stream-end' | 'session-done';

export interface OrchestratorResult {
  reason: ShutdownReason;
  /** Signal that stopped the loop, when reason is 'signal' */
  signal?: string;
  /** How the child ended, if an exit or signal frame was seen */
  childExit?: ExitStatus;
  /** Frames handed to the sink */
  framesEmitted: number;
}

export interface OrchestratorOptions {
  session: ManagedSession;
  processor: OutputProcessor;
  sink: FrameSink;
  recording?: RecordingManager;
  signals?: SignalSource;
}

type LoopEvent =
  | { kind: 'frame'; result: IteratorResult<Frame> }
  | { kind: 'signal'; signal: string }
  | { kind: 'done' };

// ═══════════════════════════════════════════════════════════════════════════════
// Signals
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Listen for process termination signals
 */
export function processSignals(
  signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']
): SignalSource {
  const handlers: Array<[NodeJS.Signals, () => void]> = [];

  const received = new Promise<string>(resolve => {
    for (const signal of signals) {
      const handler = (): void => resolve(signal);
      handlers.push([signal, handler]);
      process.on(signal, handler);
    }
  });

  return {
    wait: () => received,
    dispose: () => {
      for (const [signal, handler] of handlers) {
        process.off(signal, handler);
      }
      handlers.length = 0;
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Control
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Route a control frame from the client into the session.
 * Failures are logged; they never stop the loop.
 */
export function handleControlFrame(
  control: Frame,
  session: SessionControl,
  reply: (f: Frame) => void
): void {
  try {
    switch (control.type) {
      case 'stdin':
        session.writeInput(control.binary ? payloadBytes(control) : control.data ?? '');
        break;

      case 'resize':
        if (control.cols === undefined || control.rows === undefined) {
          log.warn('Ignoring resize without cols/rows');
          break;
        }
        session.resize(control.cols, control.rows);
        break;

      case 'resize_ack':
        if (control.cols === undefined || control.rows === undefined) {
          log.warn('Ignoring resize_ack without cols/rows');
          break;
        }
        session.acknowledgeResize(control.cols, control.rows);
        break;

      case 'ping':
        reply(frame('pong').build());
        break;

      default:
        log.warn(`Ignoring unsupported control frame: ${control.type}`);
    }
  } catch (err) {
    log.warn(`Control frame ${control.type} failed`, toError(err));
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Orchestrator
// ═══════════════════════════════════════════════════════════════════════════════

export class Orchestrator {
  private readonly _session: ManagedSession;
  private readonly _processor: OutputProcessor;
  private readonly _sink: FrameSink;
  private readonly _recording: RecordingManager | null;
  private readonly _signals: SignalSource;
  private _framesEmitted = 0;
  private _childExit: ExitStatus | undefined;
  private _running = false;
  private _stopEvent: LoopEvent | null = null;
  private _interrupt: ((event: LoopEvent) => void) | null = null;

  constructor(options: OrchestratorOptions) {
    this._session = options.session;
    this._processor = options.processor;
    this._sink = options.sink;
    this._recording = options.recording ?? null;
    this._signals = options.signals ?? processSignals();
  }

  /**
   * Run until a termination signal, the end of the frame stream or
   * session completion, then shut everything down
   */
  async run(): Promise<OrchestratorResult> {
    if (this._running) {
      throw new Error('Orchestrator is already running');
    }
    this._running = true;

    this._sink.onControl(control =>
      handleControlFrame(control, this._session, f => this.emitFrame(f))
    );
    this._session.watchBacklog(() => this._sink.pendingBytes);

    // Registered once; each wakes whichever wait is current
    this._signals
      .wait()
      .then(signal => this.stop({ kind: 'signal', signal }))
      .catch(err => log.error('Signal listener failed', toError(err)));
    this._session.done
      .then(() => this.stop({ kind: 'done' }))
      .catch(err => log.error('Session completion failed', toError(err)));

    let frameEvent = this.nextFrameEvent();

    let reason: ShutdownReason;
    let signal: string | undefined;

    for (;;) {
      const event = await this.nextEvent(frameEvent);

      if (event.kind === 'frame') {
        if (event.result.done) {
          log.info('Frame stream ended');
          reason = 'stream-end';
          break;
        }
        this.handleFrame(event.result.value);
        frameEvent = this.nextFrameEvent();
        continue;
      }

      if (event.kind === 'signal') {
        log.info(`Received ${event.signal}, shutting down`);
        reason = 'signal';
        signal = event.signal;
        break;
      }

      // The session closed its channel; take what is still queued
      log.info('PTY session completed');
      reason = 'session-done';
      for (;;) {
        const pending = await frameEvent;
        if (pending.kind !== 'frame' || pending.result.done) break;
        this.handleFrame(pending.result.value);
        frameEvent = this.nextFrameEvent();
      }
      break;
    }

    await this.shutdown();

    return {
      reason,
      ...(signal !== undefined && { signal }),
      ...(this._childExit !== undefined && { childExit: this._childExit }),
      framesEmitted: this._framesEmitted,
    };
  }

  private stop(event: LoopEvent): void {
    if (this._stopEvent) return;
    this._stopEvent = event;
    this._interrupt?.(event);
  }

  /**
   * Wait for the pending frame or a stop, whichever comes first. The
   * signal and completion promises hold one reaction each for the whole
   * run; only the per-frame promise is new on every wait.
   */
  private nextEvent(frameEvent: Promise<LoopEvent>): Promise<LoopEvent> {
    const stopped = this._stopEvent;
    if (stopped) return Promise.resolve(stopped);

    return new Promise<LoopEvent>((resolve, reject) => {
      this._interrupt = resolve;
      frameEvent.then(resolve, reject);
    });
  }

  private nextFrameEvent(): Promise<LoopEvent> {
    return this._session.nextFrame().then((result): LoopEvent => ({ kind: 'frame', result }));
  }

  private handleFrame(f: Frame): void {
    if (f.type === 'exit' && f.code !== undefined) {
      this._childExit = { code: f.code };
    } else if (f.type === 'signal' && f.signal !== undefined) {
      this._childExit = { code: f.code ?? -1, signal: f.signal };
    }

    for (const out of this._processor.processFrame(f)) {
      this.emitFrame(out);
    }
  }

  private emitFrame(f: Frame): void {
    if (this._recording?.isRecording) {
      try {
        this._recording.recordFrame(f);
      } catch (err) {
        log.error('Recording failed, continuing without it', toError(err));
      }
    }

    try {
      this._sink.send(f);
      this._framesEmitted++;
    } catch (err) {
      log.error(`Failed to emit ${f.type} frame`, toError(err));
    }
  }

  private async shutdown(): Promise<void> {
    for (const f of this._processor.flush()) {
      this.emitFrame(f);
    }

    this._session.cancel();
    this._signals.dispose();

    if (this._recording?.isRecording) {
      try {
        this._recording.stopRecording();
      } catch (err) {
        log.error('Failed to finalize recording', toError(err));
      }
    }

    await this._sink.close();
    log.info('Shutdown complete');
  }
}

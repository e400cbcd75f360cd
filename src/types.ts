// ═══════════════════════════════════════════════════════════════════════════════
// Frame Types
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Closed set of frame tags
 */
export type FrameType =
  | 'stdout'
  | 'stdin'
  | 'stderr'
  | 'cursor'
  | 'resize'
  | 'resize_ack'
  | 'prompt'
  | 'idle'
  | 'line_update'
  | 'overflow'
  | 'signal'
  | 'exit'
  | 'stopped'
  | 'continued'
  | 'capsule_kill'
  | 'ping'
  | 'pong';

/**
 * One discrete protocol event.
 *
 * Only the fields relevant to `type` are present; the rest are absent
 * rather than null.
 */
export interface Frame {
  /** Wall-clock seconds at creation */
  readonly ts: number;

  readonly type: FrameType;

  /** UTF-8 text, or base64 when `binary` is set */
  readonly data?: string;

  readonly binary?: boolean;

  readonly cols?: number;

  readonly rows?: number;

  /** Exit code */
  readonly code?: number;

  /** Signal name, e.g. `SIGKILL` */
  readonly signal?: string;

  /** Source of the prompt pattern that matched */
  readonly regex?: string;

  /** Duration in milliseconds (idle span) */
  readonly dur_ms?: number;

  /** Free-text cause, e.g. for overflow */
  readonly reason?: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Processing
// ═══════════════════════════════════════════════════════════════════════════════

export type TokenMode = 'raw' | 'compact' | 'parsed';

export type CompressionMode = 'none' | 'gzip' | 'deflate';

// ═══════════════════════════════════════════════════════════════════════════════
// Session Types
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * How the child exited, as observed by the backend
 */
export interface ExitStatus {
  /** Exit code (when the child exited normally or the platform reports one) */
  code: number;

  /** Terminating signal name, when the child was killed by a signal */
  signal?: string;
}

/**
 * Options for spawning a PTY session
 */
export interface SessionOptions {
  /** Command to execute */
  command: string;

  /** Arguments to pass to the command */
  args?: string[];

  /** Working directory */
  cwd?: string;

  /** Environment variables (merged with process.env) */
  env?: Record<string, string>;

  /** Terminal columns (≥ 1) */
  cols: number;

  /** Terminal rows (≥ 1) */
  rows: number;

  /** Prompt-matching patterns; each must compile */
  promptPatterns?: string[];

  /** Idle threshold in ms (> 0) */
  idleTimeoutMs: number;

  /** Byte budget for frames waiting to be consumed (default: 8 MiB) */
  maxBufferBytes?: number;

  /** Grace period before the child is killed on overflow (default: 5000) */
  overflowGraceMs?: number;

  /** Exit poll interval in ms (default: 100) */
  pollIntervalMs?: number;
}

/**
 * Events emitted by a PtySession alongside its frame stream
 */
export interface SessionEvents {
  /** Output stream from the PTY closed */
  eof: () => void;

  /** Child exit observed */
  exit: (status: ExitStatus) => void;
}

/**
 * Control surface the orchestrator and sinks drive a session through
 */
export interface SessionControl {
  writeInput(data: string | Uint8Array): void;
  resize(cols: number, rows: number): void;
  acknowledgeResize(cols: number, rows: number): void;
  isAlive(): boolean;
}

/**
 * Error taxonomy for ttyframe.
 *
 * Configuration and spawn errors are fatal and surface at the CLI. I/O,
 * serialization and recording errors stay with the subsystem that raised them.
 */

export type ErrorCode =
  | 'ERR_CONFIG'
  | 'ERR_SPAWN'
  | 'ERR_PTY_IO'
  | 'ERR_SERIALIZATION'
  | 'ERR_RECORDING';

/**
 * Base class for every error raised by ttyframe
 */
export class TtyframeError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Invalid window size, idle timeout, buffer size or prompt pattern */
export class ConfigurationError extends TtyframeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ERR_CONFIG', message, options);
  }
}

/** The PTY could not be opened or the child could not be launched */
export class SpawnError extends TtyframeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ERR_SPAWN', message, options);
  }
}

/** A read, write or resize against the PTY failed */
export class PtyIoError extends TtyframeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ERR_PTY_IO', message, options);
  }
}

export class SerializationError extends TtyframeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ERR_SERIALIZATION', message, options);
  }
}

/** The recording destination could not be created or written */
export class RecordingError extends TtyframeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ERR_RECORDING', message, options);
  }
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

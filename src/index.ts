/**
 * ttyframe
 *
 * Runs a child process on a pseudo-terminal and turns its I/O into a
 * stream of JSON frames with idle detection, back-pressure, output
 * compaction and asciinema recording.
 *
 * @example
 * ```typescript
 * import {
 *   JsonLineSink,
 *   Orchestrator,
 *   OutputProcessor,
 *   PtySession,
 * } from 'ttyframe';
 *
 * const session = await PtySession.spawn({
 *   command: 'npm',
 *   args: ['install'],
 *   cols: 120,
 *   rows: 40,
 *   idleTimeoutMs: 200,
 * });
 *
 * const result = await new Orchestrator({
 *   session,
 *   processor: new OutputProcessor('compact'),
 *   sink: new JsonLineSink(process.stdout),
 * }).run();
 *
 * console.error(result.reason, result.childExit);
 * ```
 *
 * @packageDocumentation
 */

// Frames
export {
  FRAME_TYPES,
  FrameBuilder,
  frame,
  encodeFrame,
  decodeFrame,
  frameSchema,
  payloadBytes,
  frameText,
  frameSize,
} from './frame.js';
export { FrameChannel } from './channel.js';

// Session
export {
  PtySession,
  validateWindowSize,
  compilePromptPatterns,
  DEFAULT_MAX_BUFFER_BYTES,
  DEFAULT_OVERFLOW_GRACE_MS,
  DEFAULT_POLL_INTERVAL_MS,
} from './session.js';
export { NodePtyBackend, resolveExecutable, spawnNodePty } from './backend.js';

// Processing and recording
export {
  OutputProcessor,
  cleanOutput,
  isProgressUpdate,
  LINE_BUFFER_LIMIT,
} from './processor.js';
export { AsciicastRecorder, RecordingManager, toAsciicastEvent } from './recorder.js';

// Delivery
export {
  JsonLineSink,
  UnixSocketSink,
  WebSocketSink,
  compressFrame,
} from './sinks.js';
export { Orchestrator, handleControlFrame, processSignals } from './orchestrator.js';

// Configuration
export {
  parseConfig,
  configSchema,
  resolveLaunch,
  toSessionOptions,
  describeCommand,
  DEFAULTS,
  CAPSULE_COMMAND,
} from './config.js';
export { createProgram, createSink, parseArgs, runSession, RECORDING_TITLE, VERSION } from './command.js';

// Errors and logging
export {
  TtyframeError,
  ConfigurationError,
  SpawnError,
  PtyIoError,
  SerializationError,
  RecordingError,
} from './errors.js';
export { createLogger, setLogLevel, getLogLevel, LogLevel } from './logger.js';

// Utilities
export { stripAnsi } from './utils.js';

// Types
export type {
  Frame,
  FrameType,
  TokenMode,
  CompressionMode,
  ExitStatus,
  SessionOptions,
  SessionEvents,
  SessionControl,
} from './types.js';
export type { BackendFactory, LaunchSpec, PtyBackend, Disposable } from './backend.js';
export type { CleanedOutput, ProcessorOptions } from './processor.js';
export type {
  AsciicastHeader,
  AsciicastEvent,
  AsciicastEventCode,
  RecorderOptions,
} from './recorder.js';
export type { ControlHandler, FrameSink, SinkOptions, JsonLineSinkOptions } from './sinks.js';
export type {
  ManagedSession,
  OrchestratorOptions,
  OrchestratorResult,
  ShutdownReason,
  SignalSource,
} from './orchestrator.js';
export type { RawConfig, TtyframeConfig } from './config.js';
export type { CliOptions, RunOptions } from './command.js';
export type { ErrorCode } from './errors.js';
export type { Logger } from './logger.js';

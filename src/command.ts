/**
 * Command-line front end
 *
 * Option parsing (commander) and the wiring from a validated configuration
 * to a running session: sink, processor, recording and orchestrator.
 *
 * @packageDocumentation
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import type { BackendFactory } from './backend.js';
import {
  DEFAULTS,
  describeCommand,
  parseConfig,
  toSessionOptions,
  type TtyframeConfig,
} from './config.js';
import { ConfigurationError, toError } from './errors.js';
import { createLogger, LogLevel, setLogLevel } from './logger.js';
import { Orchestrator, type OrchestratorResult, type SignalSource } from './orchestrator.js';
import { OutputProcessor } from './processor.js';
import { RecordingManager } from './recorder.js';
import { compilePromptPatterns, PtySession } from './session.js';
import { JsonLineSink, UnixSocketSink, WebSocketSink, type FrameSink } from './sinks.js';
import type { CompressionMode, TokenMode } from './types.js';

const log = createLogger('cli');

export const VERSION = '0.1.0';

/** Title written into recordings made from the CLI */
export const RECORDING_TITLE = 'ttyframe recording';

/** Option values as commander hands them over */
export interface CliOptions {
  json: boolean;
  socket?: string;
  bind?: string;
  cols: number;
  rows: number;
  idle: number;
  tokenMode: TokenMode;
  promptRegex: string[];
  buffer: number;
  overflowTimeout: number;
  record?: string;
  capsule: boolean;
  sandboxProfile?: string;
  stateDir?: string;
  compress: CompressionMode;
  verbose: boolean;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!/^-?\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

// ═══════════════════════════════════════════════════════════════════════════════
// Parsing
// ═══════════════════════════════════════════════════════════════════════════════

export function createProgram(): Command {
  return new Command()
    .name('ttyframe')
    .description('Run a command on a pseudo-terminal and stream its I/O as JSON frames')
    .version(VERSION)
    .passThroughOptions()
    .option('--json', 'emit JSON frames on stdout', false)
    .option('--socket <path>', 'serve frames on a Unix domain socket')
    .option('--bind <host:port>', 'serve frames over WebSocket')
    .option('--cols <n>', 'terminal columns', parseInteger, DEFAULTS.cols)
    .option('--rows <n>', 'terminal rows', parseInteger, DEFAULTS.rows)
    .option('--idle <ms>', 'idle threshold in milliseconds', parseInteger, DEFAULTS.idleMs)
    .addOption(
      new Option('--token-mode <mode>', 'output processing mode')
        .choices(['raw', 'compact', 'parsed'])
        .default(DEFAULTS.tokenMode)
    )
    .option('--prompt-regex <re>', 'prompt pattern for parsed mode (repeatable)', collect, [])
    .option('--buffer <bytes>', 'back-pressure budget in bytes', parseInteger, DEFAULTS.bufferBytes)
    .option(
      '--overflow-timeout <ms>',
      'grace period before a stalled consumer gets the child killed',
      parseInteger,
      DEFAULTS.overflowTimeoutMs
    )
    .option('--record <path>', 'write an asciinema v2 recording')
    .option('--capsule', 'run the command inside the capsule sandbox', false)
    .option('--sandbox-profile <name>', 'sandbox profile for --capsule')
    .option('--state-dir <dir>', 'session state directory (not supported)')
    .addOption(
      new Option('--compress <mode>', 'payload compression')
        .choices(['none', 'gzip', 'deflate'])
        .default(DEFAULTS.compress)
    )
    .option('-v, --verbose', 'debug logging on stderr', false)
    .argument('<command>', 'command to run')
    .argument('[args...]', 'arguments for the command');
}

/**
 * Parse user arguments (without the node and script entries) into a
 * validated configuration
 *
 * @throws CommanderError for unknown options, bad values, help or version
 *   when the program has `exitOverride()` set
 * @throws ConfigurationError when validation fails
 */
export function parseArgs(argv: readonly string[], program: Command = createProgram()): TtyframeConfig {
  program.parse([...argv], { from: 'user' });

  const options = program.opts<CliOptions>();
  const [command = '', ...args] = program.args;

  return parseConfig({ ...options, command, args });
}

// ═══════════════════════════════════════════════════════════════════════════════
// Running
// ═══════════════════════════════════════════════════════════════════════════════

export interface RunOptions {
  /** PTY backend (default: node-pty) */
  createBackend?: BackendFactory;
  /** Overrides the sink chosen from the configuration */
  sink?: FrameSink;
  signals?: SignalSource;
}

/**
 * Transport chosen by the configuration
 *
 * @throws ConfigurationError when no transport was requested
 */
export function createSink(config: TtyframeConfig): FrameSink {
  const options = { compress: config.compress };

  if (config.socket) {
    return new UnixSocketSink(config.socket, options);
  }
  if (config.bind) {
    return new WebSocketSink(config.bind.host, config.bind.port, options);
  }
  if (config.json) {
    return new JsonLineSink(process.stdout, { ...options, input: process.stdin });
  }
  throw new ConfigurationError('No output transport: pass --json, --socket or --bind');
}

/**
 * Start the sink, spawn the session and run the orchestrator to completion
 *
 * @throws SpawnError if the child cannot be launched
 */
export async function runSession(
  config: TtyframeConfig,
  options: RunOptions = {}
): Promise<OrchestratorResult> {
  if (config.verbose) {
    setLogLevel(LogLevel.DEBUG);
  }
  if (config.stateDir) {
    log.warn(`Session persistence is not supported; ignoring --state-dir ${config.stateDir}`);
  }

  const processor = new OutputProcessor(config.tokenMode, {
    promptPatterns: compilePromptPatterns(config.promptRegex),
  });

  const sink = options.sink ?? createSink(config);
  await sink.start();

  let session: PtySession;
  try {
    session = await PtySession.spawn(toSessionOptions(config), options.createBackend);
  } catch (err) {
    await sink.close();
    throw err;
  }

  let recording: RecordingManager | undefined;
  if (config.record) {
    recording = new RecordingManager();
    try {
      recording.startRecording(config.record, config.cols, config.rows, describeCommand(config), {
        title: RECORDING_TITLE,
      });
    } catch (err) {
      log.error('Recording disabled', toError(err));
      recording = undefined;
    }
  }

  const orchestrator = new Orchestrator({
    session,
    processor,
    sink,
    recording,
    signals: options.signals,
  });

  const result = await orchestrator.run();
  log.debug('Session finished', result);
  return result;
}

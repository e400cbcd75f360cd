/**
 * Leveled logging on stderr
 *
 * stdout carries the frame stream, so nothing here ever writes to it.
 *
 *   const log = createLogger('session');
 *   log.debug('Spawning');
 *
 * The starting level comes from the environment:
 *   TTYFRAME_DEBUG=1 ttyframe --json bash
 *   TTYFRAME_LOG_LEVEL=warn ttyframe --json bash
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/**
 * Parse a level name; unknown names yield undefined
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  switch (name.toLowerCase()) {
    case 'debug': return LogLevel.DEBUG;
    case 'info': return LogLevel.INFO;
    case 'warn': return LogLevel.WARN;
    case 'error': return LogLevel.ERROR;
    case 'silent': return LogLevel.SILENT;
    default: return undefined;
  }
}

function levelFromEnv(env: NodeJS.ProcessEnv): LogLevel {
  if (env.TTYFRAME_DEBUG === '1' || env.TTYFRAME_DEBUG === 'true') {
    return LogLevel.DEBUG;
  }
  const named = env.TTYFRAME_LOG_LEVEL ? parseLogLevel(env.TTYFRAME_LOG_LEVEL) : undefined;
  return named ?? LogLevel.INFO;
}

let globalLogLevel = levelFromEnv(process.env);

export function setLogLevel(level: LogLevel): void {
  globalLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLogLevel;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Formatting
// ═══════════════════════════════════════════════════════════════════════════════

type LevelName = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

const levelColors: Record<LevelName, string> = {
  DEBUG: DIM,
  INFO: '\x1b[36m',
  WARN: '\x1b[33m',
  ERROR: '\x1b[31m',
};

const useColors = !process.env.NO_COLOR && process.stderr.isTTY === true;

function stringify(arg: unknown): string {
  if (typeof arg === 'string') return arg;
  if (arg instanceof Error) return arg.message;
  return JSON.stringify(arg);
}

function writeLine(parts: unknown[]): void {
  process.stderr.write(parts.map(stringify).join(' ') + '\n');
}

function header(name: string, level: LevelName): string {
  // HH:MM:SS.mmm
  const time = new Date().toISOString().slice(11, 23);
  const tag = `[ttyframe:${name}:${level}]`;
  return useColors
    ? `${DIM}${time}${RESET} ${levelColors[level]}${tag}${RESET}`
    : `${time} ${tag}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Logger
// ═══════════════════════════════════════════════════════════════════════════════

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  /** Print to stderr regardless of level (user-facing errors, not logging) */
  printError: (...args: unknown[]) => void;
}

/**
 * Create a logger for a component (e.g. 'session', 'sink:ws')
 */
export function createLogger(name: string): Logger {
  const at = (level: LogLevel, label: LevelName) => (...args: unknown[]): void => {
    if (globalLogLevel <= level) {
      writeLine([header(name, label), ...args]);
    }
  };

  return {
    debug: at(LogLevel.DEBUG, 'DEBUG'),
    info: at(LogLevel.INFO, 'INFO'),
    warn: at(LogLevel.WARN, 'WARN'),
    error: at(LogLevel.ERROR, 'ERROR'),
    printError: (...args: unknown[]) => writeLine(args),
  };
}

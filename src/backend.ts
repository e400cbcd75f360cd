/**
 * PTY backends
 *
 * A backend is the capability a PtySession drives: read (via `onData`),
 * write, resize, poll for exit, terminate. The production backend is
 * node-pty; tests substitute a scripted double.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { IPty, IPtyForkOptions } from 'node-pty';
import { SpawnError } from './errors.js';
import { createLogger } from './logger.js';
import type { ExitStatus } from './types.js';
import { signalName } from './utils.js';

const log = createLogger('backend');

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * What to launch and how big the terminal is
 */
export interface LaunchSpec {
  command: string;
  args: string[];
  cols: number;
  rows: number;
  cwd: string;
  env: Record<string, string>;
  /** Terminal type advertised to the child (default: xterm-256color) */
  term?: string;
}

export interface Disposable {
  dispose(): void;
}

/**
 * Capability interface over a PTY and its child process
 */
export interface PtyBackend {
  readonly pid: number;

  /** Decoded output chunks, one call per read */
  onData(listener: (chunk: string) => void): Disposable;

  /** Output stream closed; no more data will arrive */
  onEnd(listener: () => void): Disposable;

  /** Strings are sent as UTF-8; Buffers reach the child byte for byte */
  write(data: string | Buffer): void;

  resize(cols: number, rows: number): void;

  /** Exit status once the child has exited, otherwise null. Non-blocking. */
  pollExit(): ExitStatus | null;

  kill(signal?: string): void;
}

export type BackendFactory = (spec: LaunchSpec) => PtyBackend | Promise<PtyBackend>;

// ═══════════════════════════════════════════════════════════════════════════════
// node-pty backend
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Backend over a node-pty process. node-pty reads the PTY master on its own
 * native reader and decodes output as UTF-8, replacing invalid sequences.
 */
export class NodePtyBackend implements PtyBackend {
  private _exit: ExitStatus | null = null;
  private _ended = false;
  private readonly _endListeners = new Set<() => void>();
  // node-pty hands writes to the master socket as-is, Buffers included
  private readonly _input: { write(data: string | Buffer): void };

  constructor(private readonly _pty: IPty) {
    this._input = _pty;
    this._pty.onExit(({ exitCode, signal }) => {
      this.markEnded();
      this._exit = signal
        ? { code: exitCode, signal: signalName(signal) }
        : { code: exitCode };
      log.debug(`Child ${this._pty.pid} exited`, this._exit);
    });
  }

  get pid(): number {
    return this._pty.pid;
  }

  onData(listener: (chunk: string) => void): Disposable {
    return this._pty.onData(listener);
  }

  onEnd(listener: () => void): Disposable {
    this._endListeners.add(listener);
    return { dispose: () => this._endListeners.delete(listener) };
  }

  write(data: string | Buffer): void {
    this._input.write(data);
  }

  resize(cols: number, rows: number): void {
    this._pty.resize(cols, rows);
  }

  pollExit(): ExitStatus | null {
    return this._exit;
  }

  kill(signal = 'SIGTERM'): void {
    if (this._exit) return;
    this._pty.kill(signal);
  }

  private markEnded(): void {
    if (this._ended) return;
    this._ended = true;
    for (const listener of this._endListeners) listener();
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Spawning
// ═══════════════════════════════════════════════════════════════════════════════

function isExecutableFile(candidate: string): boolean {
  try {
    fs.accessSync(candidate, fs.constants.X_OK);
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
}

/**
 * Find the file execvp would run for a command: a name with a slash is a
 * path (relative to cwd), anything else is looked up on PATH. Returns null
 * when nothing executable is found.
 */
export function resolveExecutable(
  command: string,
  searchPath: string,
  cwd: string
): string | null {
  if (command.includes('/')) {
    const candidate = path.resolve(cwd, command);
    return isExecutableFile(candidate) ? candidate : null;
  }

  for (const dir of searchPath.split(path.delimiter)) {
    // An empty PATH entry means the working directory
    const candidate = path.resolve(cwd, dir, command);
    if (isExecutableFile(candidate)) return candidate;
  }
  return null;
}

/**
 * Spawn a command on a fresh node-pty terminal.
 *
 * On Unix node-pty forks before exec, so a missing command would only show
 * up as output from the child; it is checked here first instead.
 */
export const spawnNodePty: BackendFactory = async (spec) => {
  let nodePty: typeof import('node-pty');
  try {
    nodePty = await import('node-pty');
  } catch (err) {
    throw new SpawnError('node-pty is not available', { cause: err });
  }

  if (process.platform !== 'win32') {
    const searchPath = spec.env.PATH ?? process.env.PATH ?? '';
    if (resolveExecutable(spec.command, searchPath, spec.cwd) === null) {
      throw new SpawnError(`Failed to spawn ${spec.command}: command not found or not executable`);
    }
  }

  const options: IPtyForkOptions = {
    name: spec.term ?? 'xterm-256color',
    cols: spec.cols,
    rows: spec.rows,
    cwd: spec.cwd,
    env: spec.env,
  };

  try {
    const pty = nodePty.spawn(spec.command, spec.args, options);
    return new NodePtyBackend(pty);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SpawnError(`Failed to spawn ${spec.command}: ${reason}`, { cause: err });
  }
};

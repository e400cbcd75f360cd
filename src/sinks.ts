/**
 * Frame sinks
 *
 * A sink delivers encoded frames to the client and hands control frames
 * coming back from it (input, resize, ping) to the orchestrator.
 *
 * - `JsonLineSink`: one JSON object per line on a writable stream
 *   (stdout by default); control lines are read from an optional input
 * - `UnixSocketSink`: the same line protocol over a Unix domain socket
 * - `WebSocketSink`: one frame per text message over WebSocket
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs';
import * as net from 'node:net';
import * as readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import * as zlib from 'node:zlib';
import { WebSocket, WebSocketServer } from 'ws';
import { decodeFrame, encodeFrame, FrameBuilder, payloadBytes } from './frame.js';
import { createLogger, type Logger } from './logger.js';
import type { CompressionMode, Frame } from './types.js';
import { byteLength } from './utils.js';

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export type ControlHandler = (frame: Frame) => void;

export interface FrameSink {
  readonly name: string;

  /** Prepare the transport (bind, listen). Resolves once frames can be sent. */
  start(): Promise<void>;

  send(frame: Frame): void;

  /** Encoded bytes accepted by `send` but not yet handed to the OS */
  readonly pendingBytes: number;

  /** Register the handler for control frames sent by the client */
  onControl(handler: ControlHandler): void;

  close(): Promise<void>;
}

export interface SinkOptions {
  /** Payload compression applied before encoding (default: none) */
  compress?: CompressionMode;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Compression
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Compress a frame's payload, storing it base64 with `binary: true`.
 * Frames without data are returned unchanged.
 */
export function compressFrame(f: Frame, mode: CompressionMode): Frame {
  if (mode === 'none' || f.data === undefined) return f;

  const bytes = payloadBytes(f);
  const compressed = mode === 'gzip' ? zlib.gzipSync(bytes) : zlib.deflateSync(bytes);
  return FrameBuilder.from(f).withBinaryData(compressed).build();
}

/**
 * Parse one inbound line and pass it to the handler; bad lines are logged
 */
function dispatchControlLine(
  line: string,
  handler: ControlHandler | null,
  log: Logger
): void {
  const trimmed = line.trim();
  if (!trimmed) return;

  let control: Frame;
  try {
    control = decodeFrame(trimmed);
  } catch (err) {
    log.warn('Ignoring invalid control frame', err);
    return;
  }

  if (handler) {
    handler(control);
  } else {
    log.debug(`No control handler, dropping ${control.type} frame`);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// JSON lines
// ═══════════════════════════════════════════════════════════════════════════════

export interface JsonLineSinkOptions extends SinkOptions {
  /** Where control lines come from (e.g. process.stdin) */
  input?: Readable;
}

/**
 * Writes one JSON frame per line
 */
export class JsonLineSink implements FrameSink {
  readonly name = 'json-lines';

  private readonly _log = createLogger('sink:json');
  private readonly _compress: CompressionMode;
  private _handler: ControlHandler | null = null;
  private _rl: readline.Interface | null = null;
  private _closed = false;

  constructor(
    private readonly _output: Writable,
    private readonly _options: JsonLineSinkOptions = {}
  ) {
    this._compress = _options.compress ?? 'none';
  }

  async start(): Promise<void> {
    const input = this._options.input;
    if (!input || this._rl) return;

    this._rl = readline.createInterface({ input, crlfDelay: Infinity });
    this._rl.on('line', line => dispatchControlLine(line, this._handler, this._log));
  }

  send(frame: Frame): void {
    if (this._closed) return;
    this._output.write(encodeFrame(compressFrame(frame, this._compress)) + '\n');
  }

  get pendingBytes(): number {
    return this._closed ? 0 : this._output.writableLength;
  }

  onControl(handler: ControlHandler): void {
    this._handler = handler;
  }

  async close(): Promise<void> {
    if (this._closed) return;
    this._closed = true;
    this._rl?.close();
    this._rl = null;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Network sinks
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Shared fan-out for transports with many clients. Frames produced before
 * the first client connects are held and delivered to it on connect.
 */
abstract class BroadcastSink implements FrameSink {
  abstract readonly name: string;

  protected readonly _log: Logger;
  protected _handler: ControlHandler | null = null;
  protected _closed = false;
  private readonly _compress: CompressionMode;
  private _backlog: string[] | null = [];
  private _backlogBytes = 0;

  constructor(logName: string, options: SinkOptions) {
    this._log = createLogger(logName);
    this._compress = options.compress ?? 'none';
  }

  abstract start(): Promise<void>;

  abstract close(): Promise<void>;

  protected abstract get clientCount(): number;

  protected abstract deliver(message: string): void;

  /** Bytes queued on the slowest client connection */
  protected abstract clientBufferedBytes(): number;

  send(frame: Frame): void {
    if (this._closed) return;
    const message = encodeFrame(compressFrame(frame, this._compress));

    if (this._backlog && this.clientCount === 0) {
      this._backlog.push(message);
      this._backlogBytes += byteLength(message);
      return;
    }
    this.deliver(message);
  }

  get pendingBytes(): number {
    if (this._closed) return 0;
    return this._backlogBytes + this.clientBufferedBytes();
  }

  onControl(handler: ControlHandler): void {
    this._handler = handler;
  }

  /** Frames held for the first client */
  get backlog(): number {
    return this._backlog?.length ?? 0;
  }

  /**
   * Hand the held frames to the first client, then deliver live
   */
  protected takeBacklog(): string[] {
    const held = this._backlog ?? [];
    this._backlog = null;
    this._backlogBytes = 0;
    return held;
  }

  protected handleControl(line: string): void {
    dispatchControlLine(line, this._handler, this._log);
  }
}

/**
 * Line protocol over a Unix domain socket
 */
export class UnixSocketSink extends BroadcastSink {
  readonly name = 'unix-socket';

  private readonly _server: net.Server;
  private readonly _clients = new Set<net.Socket>();

  constructor(readonly path: string, options: SinkOptions = {}) {
    super('sink:unix', options);
    this._server = net.createServer(socket => this.handleConnection(socket));
  }

  protected get clientCount(): number {
    return this._clients.size;
  }

  async start(): Promise<void> {
    // A stale socket file from an earlier run blocks listen()
    fs.rmSync(this.path, { force: true });

    await new Promise<void>((resolve, reject) => {
      this._server.once('error', reject);
      this._server.listen(this.path, () => {
        this._server.off('error', reject);
        resolve();
      });
    });
    this._server.on('error', err => this._log.error('Socket server error', err));
    this._log.info(`Listening on ${this.path}`);
  }

  protected deliver(message: string): void {
    for (const client of this._clients) {
      client.write(message + '\n');
    }
  }

  protected clientBufferedBytes(): number {
    let most = 0;
    for (const client of this._clients) most = Math.max(most, client.writableLength);
    return most;
  }

  async close(): Promise<void> {
    if (this._closed) return;
    this._closed = true;

    for (const client of this._clients) client.end();
    this._clients.clear();

    await new Promise<void>(resolve => this._server.close(() => resolve()));
    fs.rmSync(this.path, { force: true });
  }

  private handleConnection(socket: net.Socket): void {
    this._log.debug('Client connected');
    for (const message of this.takeBacklog()) {
      socket.write(message + '\n');
    }
    this._clients.add(socket);

    const rl = readline.createInterface({ input: socket, crlfDelay: Infinity });
    rl.on('line', line => this.handleControl(line));

    socket.on('close', () => {
      this._clients.delete(socket);
      rl.close();
      this._log.debug('Client disconnected');
    });
    socket.on('error', err => {
      this._log.warn('Client socket error', err);
      this._clients.delete(socket);
    });
  }
}

/**
 * One frame per text message over WebSocket
 */
export class WebSocketSink extends BroadcastSink {
  readonly name = 'websocket';

  private _wss: WebSocketServer | null = null;
  private readonly _clients = new Set<WebSocket>();

  constructor(
    readonly host: string,
    readonly port: number,
    options: SinkOptions = {}
  ) {
    super('sink:ws', options);
  }

  protected get clientCount(): number {
    return this._clients.size;
  }

  async start(): Promise<void> {
    if (this._wss) {
      throw new Error('WebSocket sink already started');
    }

    const wss = new WebSocketServer({ host: this.host, port: this.port });
    this._wss = wss;

    await new Promise<void>((resolve, reject) => {
      wss.once('error', reject);
      wss.once('listening', () => {
        wss.off('error', reject);
        resolve();
      });
    });

    wss.on('error', err => this._log.error('Server error', err));
    wss.on('connection', socket => this.handleConnection(socket));
    this._log.info(`Listening on ws://${this.host}:${this.address()?.port ?? this.port}`);
  }

  /** Address the server listens on, once started */
  address(): net.AddressInfo | null {
    const addr = this._wss?.address();
    return addr && typeof addr === 'object' ? addr : null;
  }

  protected deliver(message: string): void {
    for (const client of this._clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(message);
      }
    }
  }

  protected clientBufferedBytes(): number {
    let most = 0;
    for (const client of this._clients) most = Math.max(most, client.bufferedAmount);
    return most;
  }

  async close(): Promise<void> {
    if (this._closed) return;
    this._closed = true;

    for (const client of this._clients) {
      client.close(1001, 'Session ended');
    }
    this._clients.clear();

    const wss = this._wss;
    this._wss = null;
    if (wss) {
      await new Promise<void>(resolve => wss.close(() => resolve()));
    }
  }

  private handleConnection(socket: WebSocket): void {
    this._log.debug('Client connected');
    for (const message of this.takeBacklog()) {
      socket.send(message);
    }
    this._clients.add(socket);

    socket.on('message', (data, isBinary) => {
      if (isBinary) {
        this._log.warn('Ignoring binary control message');
        return;
      }
      this.handleControl(data.toString());
    });

    socket.on('close', (code, reason) => {
      this._clients.delete(socket);
      this._log.debug('Client disconnected', { code, reason: reason.toString() });
    });

    socket.on('error', err => {
      this._log.warn('Client socket error', err);
      this._clients.delete(socket);
    });
  }
}

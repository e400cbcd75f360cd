/**
 * Output processing
 *
 * Turns raw terminal frames into a quieter stream. The mode is fixed at
 * construction:
 *
 * - `raw`: every frame passes through unchanged
 * - `compact`: strips ANSI, normalizes line endings, coalesces fragments
 *   into lines and collapses progress output into deduplicated
 *   `line_update` frames
 * - `parsed`: compact, plus `prompt` frames for lines matching a prompt
 *   pattern
 *
 * @packageDocumentation
 */

import { FrameBuilder, frameText } from './frame.js';
import type { Frame, FrameType, TokenMode } from './types.js';
import { byteLength, stripAnsi } from './utils.js';

/** Buffered text is emitted once it grows past this many bytes */
export const LINE_BUFFER_LIMIT = 512;

const PROGRESS_PATTERN =
  /[▌▍▎▏█░▒▓■□▪▫●○◐◑◒◓◔◕◖◗◘◙◚◛◜◝◞◟◠◡◢◣◤◥◦◧◨◩◪◫◬◭◮◯]+|\d+%|\[[=>\-\s]*\]/u;

const PROGRESS_KEYWORDS = ['downloading', 'installing', 'loading', 'progress'];

// Frames after which no more output follows; a pending line goes out first
const TERMINAL_TYPES: ReadonlySet<FrameType> = new Set(['exit', 'signal', 'capsule_kill']);

// ═══════════════════════════════════════════════════════════════════════════════
// Cleaning
// ═══════════════════════════════════════════════════════════════════════════════

export interface CleanedOutput {
  text: string;
  /** Carriage returns seen before line endings were normalized */
  carriageReturns: number;
}

/**
 * Strip ANSI sequences, normalize line endings to `\n` and trim trailing
 * whitespace from every terminated line. Leading indentation and the
 * unterminated tail are kept as-is, since the tail may continue in the
 * next chunk.
 */
export function cleanOutput(data: string): CleanedOutput {
  const stripped = stripAnsi(data);
  const carriageReturns = stripped.split('\r').length - 1;
  const normalized = stripped.replace(/\r\n/g, '\n').replace(/\r/g, '\n');

  const lines = normalized.split('\n');
  const tail = lines.pop() ?? '';
  const text = [...lines.map(line => line.trimEnd()), tail].join('\n');

  return { text, carriageReturns };
}

/**
 * Whether cleaned output looks like a transient progress indicator
 */
export function isProgressUpdate(cleaned: CleanedOutput): boolean {
  return PROGRESS_PATTERN.test(cleaned.text) ||
    cleaned.carriageReturns > 2 ||
    PROGRESS_KEYWORDS.some(keyword => cleaned.text.includes(keyword));
}

// ═══════════════════════════════════════════════════════════════════════════════
// Processor
// ═══════════════════════════════════════════════════════════════════════════════

export interface ProcessorOptions {
  /** Patterns tested against completed lines in parsed mode */
  promptPatterns?: readonly RegExp[];
}

export class OutputProcessor {
  readonly mode: TokenMode;

  private readonly _transform: (frame: Frame) => Frame[];
  private readonly _promptPatterns: readonly RegExp[];
  private _lineBuffer = '';
  private _lineBufferType: FrameType = 'stdout';
  private _lastLineUpdate: string | null = null;
  private _promptedPending: string | null = null;

  constructor(mode: TokenMode, options: ProcessorOptions = {}) {
    this.mode = mode;
    this._promptPatterns = options.promptPatterns ?? [];
    this._transform = this.selectTransform(mode);
  }

  private selectTransform(mode: TokenMode): (frame: Frame) => Frame[] {
    switch (mode) {
      case 'raw':
        return (frame) => [frame];
      case 'compact':
        return (frame) => this.processCompact(frame);
      case 'parsed':
        return (frame) => this.processParsed(frame);
    }
  }

  /** Text waiting for a newline or the size threshold */
  get pending(): string {
    return this._lineBuffer;
  }

  /**
   * Transform one frame into zero or more frames
   */
  processFrame(frame: Frame): Frame[] {
    return this._transform(frame);
  }

  /**
   * Emit any buffered partial line. Call before shutdown.
   */
  flush(): Frame[] {
    const out = this.drainLineBuffer();
    this._promptedPending = null;
    return out;
  }

  private drainLineBuffer(): Frame[] {
    if (!this._lineBuffer) return [];

    const out = FrameBuilder.of(this._lineBufferType).withData(this._lineBuffer).build();
    this._lineBuffer = '';
    return [out];
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Compact
  // ═══════════════════════════════════════════════════════════════════════════

  private processCompact(frame: Frame): Frame[] {
    if (TERMINAL_TYPES.has(frame.type)) {
      return [...this.drainLineBuffer(), frame];
    }

    if ((frame.type !== 'stdout' && frame.type !== 'stderr') || frame.data === undefined) {
      return [frame];
    }

    const cleaned = cleanOutput(frameText(frame));

    if (isProgressUpdate(cleaned)) {
      if (this._lastLineUpdate === cleaned.text) return [];
      this._lastLineUpdate = cleaned.text;
      return [FrameBuilder.from(frame).withType('line_update').withData(cleaned.text).build()];
    }

    this._lineBuffer += cleaned.text;
    this._lineBufferType = frame.type;

    if (this._lineBuffer.includes('\n') || byteLength(this._lineBuffer) > LINE_BUFFER_LIMIT) {
      const out = FrameBuilder.from(frame).withData(this._lineBuffer).build();
      this._lineBuffer = '';
      return [out];
    }

    return [];
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Parsed
  // ═══════════════════════════════════════════════════════════════════════════

  private processParsed(frame: Frame): Frame[] {
    const out: Frame[] = [];

    for (const emitted of this.processCompact(frame)) {
      out.push(emitted);
      if ((emitted.type === 'stdout' || emitted.type === 'stderr') && emitted !== frame) {
        out.push(...this.matchEmittedLines(emitted));
      }
    }

    const pendingPrompt = this.matchPending();
    if (pendingPrompt) out.push(pendingPrompt);

    return out;
  }

  private matchEmittedLines(emitted: Frame): Frame[] {
    const lines = (emitted.data ?? '').split('\n');
    if (lines[lines.length - 1] === '') lines.pop();

    // The first line was already reported while it sat in the buffer
    if (this._promptedPending !== null && lines.length > 0 && lines[0].startsWith(this._promptedPending)) {
      lines.shift();
    }
    this._promptedPending = null;

    const prompts: Frame[] = [];
    for (const line of lines) {
      const prompt = this.matchLine(line);
      if (prompt) prompts.push(prompt);
    }
    return prompts;
  }

  private matchPending(): Frame | null {
    if (!this._lineBuffer || this._lineBuffer === this._promptedPending) return null;

    const prompt = this.matchLine(this._lineBuffer);
    if (prompt) this._promptedPending = this._lineBuffer;
    return prompt;
  }

  private matchLine(line: string): Frame | null {
    for (const pattern of this._promptPatterns) {
      if (pattern.test(line)) {
        return FrameBuilder.of('prompt').withData(line).withRegex(pattern.source).build();
      }
    }
    return null;
  }
}

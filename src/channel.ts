import { frameSize } from './frame.js';
import type { Frame } from './types.js';

/**
 * Unbounded multi-producer, single-consumer frame queue.
 *
 * Producers call `push`; the one consumer iterates with `for await` or
 * `next()`. `pendingBytes` tracks payload bytes queued but not yet taken,
 * which the session compares against its back-pressure budget.
 */
export class FrameChannel implements AsyncIterable<Frame> {
  private readonly _queue: Frame[] = [];
  private _waiter: ((result: IteratorResult<Frame>) => void) | null = null;
  private _closed = false;
  private _pendingBytes = 0;

  /** Payload bytes waiting in the queue */
  get pendingBytes(): number {
    return this._pendingBytes;
  }

  /** Frames waiting in the queue */
  get size(): number {
    return this._queue.length;
  }

  get closed(): boolean {
    return this._closed;
  }

  /**
   * Enqueue a frame. Returns false if the channel is closed.
   */
  push(frame: Frame): boolean {
    if (this._closed) return false;

    if (this._waiter) {
      const resolve = this._waiter;
      this._waiter = null;
      resolve({ value: frame, done: false });
      return true;
    }

    this._queue.push(frame);
    this._pendingBytes += frameSize(frame);
    return true;
  }

  /**
   * Take the next frame, waiting if none is queued.
   * Resolves `done` once the channel is closed and drained.
   */
  next(): Promise<IteratorResult<Frame>> {
    const head = this._queue.shift();
    if (head) {
      this._pendingBytes -= frameSize(head);
      return Promise.resolve({ value: head, done: false });
    }
    if (this._closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this._waiter) {
      return Promise.reject(new Error('FrameChannel has a single consumer'));
    }
    return new Promise(resolve => {
      this._waiter = resolve;
    });
  }

  /**
   * Take a queued frame without waiting
   */
  tryNext(): Frame | undefined {
    const head = this._queue.shift();
    if (head) this._pendingBytes -= frameSize(head);
    return head;
  }

  /**
   * Stop accepting frames. Queued frames can still be consumed.
   */
  close(): void {
    if (this._closed) return;
    this._closed = true;
    if (this._waiter) {
      const resolve = this._waiter;
      this._waiter = null;
      resolve({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<Frame> {
    return { next: () => this.next() };
  }
}

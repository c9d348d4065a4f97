// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/langgraph-graphs/runtime/async-queue`
 * Purpose: Single-consumer async queue for streaming events from a producer, with backpressure.
 * Scope: Enables invoke() + queue pattern (NOT streamEvents).
 * Invariants:
 *   - push() is synchronous (NO_AWAIT_IN_TOKEN_PATH); pushes after close are dropped
 *   - BACKPRESSURE_VIA_READY: producers await ready() at suspension points; it settles once the
 *     buffer is below highWaterMark or the queue is closed
 *   - close() signals end of stream; buffered items are still delivered
 *   - CONSUMER_RETURN_CANCELS: breaking out of for-await closes the queue, drops the buffer and fires onReturn
 * Side-effects: none
 * @public
 */

export interface AsyncQueueOptions {
  /** Buffered items at which ready() starts waiting. Default 64 */
  readonly highWaterMark?: number;
  /** Called once when the consumer stops iterating early */
  readonly onReturn?: () => void;
}

const DEFAULT_HIGH_WATER_MARK = 64;

/**
 * Usage:
 * ```typescript
 * const queue = new AsyncQueue<AgentEvent>();
 *
 * // Producer
 * await queue.ready();
 * queue.push({ type: "agent_message_delta", delta: "hello" });
 * queue.close();
 *
 * // Consumer
 * for await (const event of queue) {
 *   handle(event);
 * }
 * ```
 */
export class AsyncQueue<T> implements AsyncIterableIterator<T> {
  private readonly buffer: Array<{ readonly item: T }> = [];
  private closed = false;
  private resolveWaiter: ((value: IteratorResult<T>) => void) | null = null;
  private readonly readyWaiters: Array<() => void> = [];
  private readonly highWaterMark: number;
  private readonly onReturn: (() => void) | undefined;

  constructor(options?: AsyncQueueOptions) {
    this.highWaterMark = Math.max(
      1,
      options?.highWaterMark ?? DEFAULT_HIGH_WATER_MARK
    );
    this.onReturn = options?.onReturn;
  }

  push(item: T): void {
    if (this.closed) {
      return;
    }

    if (this.resolveWaiter) {
      const resolve = this.resolveWaiter;
      this.resolveWaiter = null;
      resolve({ value: item, done: false });
    } else {
      this.buffer.push({ item });
    }
  }

  /**
   * Resolves when the consumer has room for more items (or the queue is closed).
   */
  ready(): Promise<void> {
    if (this.closed || this.buffer.length < this.highWaterMark) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.readyWaiters.push(resolve);
    });
  }

  close(): void {
    this.closed = true;

    if (this.resolveWaiter) {
      const resolve = this.resolveWaiter;
      this.resolveWaiter = null;
      resolve({ value: undefined, done: true });
    }
    this.releaseReadyWaiters();
  }

  isClosed(): boolean {
    return this.closed;
  }

  /** Buffered, undelivered items */
  get size(): number {
    return this.buffer.length;
  }

  async next(): Promise<IteratorResult<T>> {
    const head = this.buffer.shift();
    if (head) {
      if (this.buffer.length < this.highWaterMark) {
        this.releaseReadyWaiters();
      }
      return { value: head.item, done: false };
    }

    if (this.closed) {
      return { value: undefined, done: true };
    }

    return new Promise((resolve) => {
      this.resolveWaiter = resolve;
    });
  }

  async return(): Promise<IteratorResult<T>> {
    const wasOpen = !this.closed;
    this.buffer.length = 0;
    this.close();
    if (wasOpen) this.onReturn?.();
    return { value: undefined, done: true };
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }

  private releaseReadyWaiters(): void {
    const waiters = this.readyWaiters.splice(0);
    for (const resolve of waiters) resolve();
  }
}

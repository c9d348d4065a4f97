// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-core/concurrency/keyed-lock`
 * Purpose: Per-key FIFO mutex so only one request mutates a conversation at a time.
 * Scope: In-process serialization. Does NOT coordinate across processes.
 * Invariants:
 *   - FIFO_PER_KEY: waiters on one key run in arrival order
 *   - KEYS_INDEPENDENT: distinct keys never wait on each other
 *   - NO_LEAKED_KEYS: a key's entry is dropped once its last holder releases
 *   - ABORTABLE_WAIT: an aborted waiter leaves the queue and rejects with an AbortError; holders are unaffected
 * Side-effects: none
 * @public
 */

interface LockEntry {
  locked: boolean;
  readonly waiters: Array<() => void>;
}

function lockAbortError(): Error {
  const error = new Error("Aborted while waiting for the lock");
  error.name = "AbortError";
  return error;
}

export class KeyedLock {
  private readonly entries = new Map<string, LockEntry>();

  /**
   * Wait for the key and return its release function. Call release exactly once.
   */
  acquire(key: string, signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) {
      return Promise.reject(lockAbortError());
    }

    let entry = this.entries.get(key);
    if (!entry) {
      entry = { locked: false, waiters: [] };
      this.entries.set(key, entry);
    }
    const held = entry;

    return new Promise((resolve, reject) => {
      let released = false;
      const release = () => {
        if (released) return;
        released = true;
        const next = held.waiters.shift();
        if (next) {
          next();
          return;
        }
        held.locked = false;
        this.entries.delete(key);
      };

      if (!held.locked) {
        held.locked = true;
        resolve(release);
        return;
      }

      const onAbort = () => {
        const index = held.waiters.indexOf(grant);
        if (index !== -1) held.waiters.splice(index, 1);
        reject(lockAbortError());
      };
      const grant = () => {
        signal?.removeEventListener("abort", onAbort);
        resolve(release);
      };

      held.waiters.push(grant);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  async runExclusive<T>(
    key: string,
    fn: () => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    const release = await this.acquire(key, signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /** Keys currently held or awaited */
  get size(): number {
    return this.entries.size;
  }
}

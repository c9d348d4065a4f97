// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/langgraph-graphs/runtime/abort`
 * Purpose: AbortError construction and checks shared by the gateway, graph and runner.
 * Scope: Helpers only.
 * Invariants: Errors produced here have name "AbortError" (normalized to "aborted").
 * Side-effects: none
 * @internal
 */

export function createAbortError(message = "The operation was aborted"): Error {
  const error = new Error(message);
  error.name = "AbortError";
  return error;
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw createAbortError();
  }
}

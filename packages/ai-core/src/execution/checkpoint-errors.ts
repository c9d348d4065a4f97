// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-core/execution/checkpoint-errors`
 * Purpose: Error thrown by checkpoint store adapters.
 * Scope: Error class and guard only.
 * Invariants: Always fatal to the current request; normalized to "checkpoint_unavailable".
 * Side-effects: none
 * Links: ports/checkpoint-store.port.ts
 * @public
 */

export type CheckpointOperation = "load" | "save";

export class CheckpointError extends Error {
  readonly operation: CheckpointOperation;
  readonly conversationId: string;

  constructor(
    operation: CheckpointOperation,
    conversationId: string,
    options?: { cause?: unknown }
  ) {
    super(`Checkpoint ${operation} failed for conversation ${conversationId}`, {
      cause: options?.cause,
    });
    this.name = "CheckpointError";
    this.operation = operation;
    this.conversationId = conversationId;
  }
}

export function isCheckpointError(error: unknown): error is CheckpointError {
  return error instanceof CheckpointError;
}

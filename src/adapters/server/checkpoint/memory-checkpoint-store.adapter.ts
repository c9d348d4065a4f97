// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/checkpoint/memory-checkpoint-store.adapter`
 * Purpose: In-process CheckpointStore keyed by conversation id.
 * Scope: Map-backed load/save. Does not survive process restarts.
 * Invariants:
 *   - FRESH_STATE_ON_MISS: unknown ids load as an empty history with the default step budget
 *   - COPY_ON_READ_WRITE: stored snapshots are isolated from caller mutation
 *   - IDEMPOTENT_SAVE: saving the same state twice leaves one identical snapshot
 * Side-effects: none
 * @public
 */

import {
  type CheckpointStore,
  type ConversationState,
  createConversationState,
  DEFAULT_MAX_STEPS,
} from "@askdb/ai-core";

export class MemoryCheckpointStoreAdapter implements CheckpointStore {
  private readonly snapshots = new Map<string, ConversationState>();

  constructor(private readonly maxSteps: number = DEFAULT_MAX_STEPS) {}

  async load(conversationId: string): Promise<ConversationState> {
    const snapshot = this.snapshots.get(conversationId);
    if (!snapshot) {
      return createConversationState(conversationId, this.maxSteps);
    }
    return structuredClone(snapshot);
  }

  async save(conversationId: string, state: ConversationState): Promise<void> {
    this.snapshots.set(
      conversationId,
      structuredClone({ ...state, conversationId })
    );
  }

  /** Number of stored conversations */
  get size(): number {
    return this.snapshots.size;
  }
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-core/ports/checkpoint-store`
 * Purpose: Persistence contract for conversation checkpoints.
 * Scope: Interface only. Adapters live in the app (memory, drizzle).
 * Invariants:
 *   - LOAD_NEVER_NULL: load() returns a fresh empty state for unknown ids
 *   - SAVE_DURABLE_ON_RESOLVE: save() resolves only after the write is durable
 *   - NO_WRITER_ARBITRATION: concurrent saves for one id are the caller's problem (see KeyedLock)
 *   - FAILURES_AS_CHECKPOINT_ERROR: adapters throw CheckpointError
 * Side-effects: none (interface definition only)
 * Links: conversation/state.ts, execution/checkpoint-errors.ts
 * @public
 */

import type { ConversationState } from "../conversation/state";

export interface CheckpointStore {
  load(conversationId: string): Promise<ConversationState>;
  save(conversationId: string, state: ConversationState): Promise<void>;
}

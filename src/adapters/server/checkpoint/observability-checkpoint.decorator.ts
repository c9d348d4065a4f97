// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/checkpoint/observability-checkpoint.decorator`
 * Purpose: CheckpointStore decorator that logs each save with request correlation.
 * Scope: Wraps any CheckpointStore. Does not alter load/save semantics.
 * Invariants:
 *   - PASSTHROUGH: results and errors of the inner store are returned unchanged
 *   - ONE_EVENT_PER_SAVE: every save (ok or failed) logs one ai.checkpoint.save event
 * Side-effects: IO (logging)
 * @public
 */

import type { CheckpointStore, ConversationState } from "@askdb/ai-core";
import type { Logger } from "pino";

import { EVENT_NAMES, logEvent } from "@/shared/observability";

export class ObservabilityCheckpointStoreDecorator implements CheckpointStore {
  constructor(
    private readonly inner: CheckpointStore,
    private readonly log: Logger,
    private readonly reqId: string
  ) {}

  load(conversationId: string): Promise<ConversationState> {
    return this.inner.load(conversationId);
  }

  async save(conversationId: string, state: ConversationState): Promise<void> {
    const start = performance.now();
    let ok = false;
    try {
      await this.inner.save(conversationId, state);
      ok = true;
    } finally {
      logEvent(
        this.log,
        EVENT_NAMES.AI_CHECKPOINT_SAVE,
        {
          reqId: this.reqId,
          conversationId,
          messageCount: state.messages.length,
          remainingSteps: state.remainingSteps,
          ok,
          durationMs: Math.round(performance.now() - start),
        },
        undefined,
        ok ? "debug" : "error"
      );
    }
  }
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/checkpoint/drizzle-checkpoint-store.adapter`
 * Purpose: Drizzle implementation of CheckpointStore on the conversation_checkpoints table.
 * Scope: Upsert and point-read of the latest snapshot per conversation. Does not keep history of snapshots.
 * Invariants:
 *   - LAST_WRITE_WINS: save() upserts on conversation_id
 *   - VALIDATED_READ: stored messages are parsed with zod before use
 *   - STORE_ERRORS_WRAPPED: failures surface as CheckpointError
 * Side-effects: IO (database)
 * Links: conversationCheckpoints schema, CheckpointStore port
 * @public
 */

import {
  CheckpointError,
  type CheckpointStore,
  type ConversationState,
  createConversationState,
  DEFAULT_MAX_STEPS,
} from "@askdb/ai-core";
import { eq, sql } from "drizzle-orm";

import type { Database } from "@/adapters/server/db/drizzle.client";
import { conversationCheckpoints } from "@/shared/db";

import { parseMessages } from "./checkpoint.schema";

export class DrizzleCheckpointStoreAdapter implements CheckpointStore {
  constructor(
    private readonly db: Database,
    private readonly maxSteps: number = DEFAULT_MAX_STEPS
  ) {}

  async load(conversationId: string): Promise<ConversationState> {
    try {
      const rows = await this.db
        .select({
          messages: conversationCheckpoints.messages,
          remainingSteps: conversationCheckpoints.remainingSteps,
        })
        .from(conversationCheckpoints)
        .where(eq(conversationCheckpoints.conversationId, conversationId))
        .limit(1);

      const row = rows[0];
      if (!row) return createConversationState(conversationId, this.maxSteps);

      return {
        conversationId,
        messages: parseMessages(row.messages),
        remainingSteps: row.remainingSteps,
      };
    } catch (error) {
      throw new CheckpointError("load", conversationId, { cause: error });
    }
  }

  async save(conversationId: string, state: ConversationState): Promise<void> {
    const messages = sql`${JSON.stringify(state.messages)}::jsonb`;
    try {
      await this.db
        .insert(conversationCheckpoints)
        .values({
          conversationId,
          messages,
          remainingSteps: state.remainingSteps,
        })
        .onConflictDoUpdate({
          target: conversationCheckpoints.conversationId,
          set: {
            messages,
            remainingSteps: state.remainingSteps,
            updatedAt: sql`now()`,
          },
        });
    } catch (error) {
      throw new CheckpointError("save", conversationId, { cause: error });
    }
  }
}

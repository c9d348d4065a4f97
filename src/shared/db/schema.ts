// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/db/schema`
 * Purpose: Persistence schema for conversation checkpoints and the conversation registry.
 * Scope: Defines conversation_checkpoints and agent_conversations tables. Does not contain query logic.
 * Invariants:
 *   - ONE_ROW_PER_CONVERSATION: conversation_id is the primary key of both tables (upsert target)
 *   - messages JSONB stores the full Message[] history of a conversation
 * Side-effects: none (schema definitions only)
 * Links: DrizzleCheckpointStoreAdapter, DrizzleConversationRegistryAdapter
 * @public
 */

import { sql } from "drizzle-orm";
import {
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
} from "drizzle-orm/pg-core";

/**
 * Latest checkpoint per conversation. Each save replaces the row.
 */
export const conversationCheckpoints = pgTable("conversation_checkpoints", {
  conversationId: text("conversation_id").primaryKey(),
  /** Message[]: complete conversation history */
  messages: jsonb("messages").notNull().default(sql`'[]'::jsonb`),
  /** Step budget left when the checkpoint was taken */
  remainingSteps: integer("remaining_steps").notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
});

/**
 * Conversations seen by the service, registered on first request.
 */
export const agentConversations = pgTable(
  "agent_conversations",
  {
    conversationId: text("conversation_id").primaryKey(),
    /** Caller-supplied owner; null for anonymous conversations */
    userId: text("user_id"),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [index("agent_conversations_user_idx").on(table.userId)]
);

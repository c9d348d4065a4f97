// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/conversation/drizzle-conversation-registry.adapter`
 * Purpose: Drizzle implementation of ConversationRegistryPort on the agent_conversations table.
 * Scope: Insert-if-absent only. Does not read back or delete conversations.
 * Invariants:
 *   - REGISTER_ONCE: INSERT ... ON CONFLICT DO NOTHING keyed on conversation_id
 * Side-effects: IO (database)
 * Links: agentConversations schema
 * @public
 */

import type { Database } from "@/adapters/server/db/drizzle.client";
import type { ConversationRegistryPort } from "@/ports";
import { agentConversations } from "@/shared/db";

export class DrizzleConversationRegistryAdapter
  implements ConversationRegistryPort
{
  constructor(private readonly db: Database) {}

  async register(conversationId: string, userId?: string): Promise<void> {
    await this.db
      .insert(agentConversations)
      .values({ conversationId, userId: userId ?? null })
      .onConflictDoNothing({ target: agentConversations.conversationId });
  }
}

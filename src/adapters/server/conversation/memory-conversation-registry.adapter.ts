// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/conversation/memory-conversation-registry.adapter`
 * Purpose: In-process ConversationRegistryPort.
 * Scope: Map-backed registry. Does not survive process restarts.
 * Invariants:
 *   - REGISTER_ONCE: the first register() call fixes userId and createdAt
 * Side-effects: none
 * @public
 */

import type { ConversationRecord, ConversationRegistryPort } from "@/ports";

export class MemoryConversationRegistryAdapter
  implements ConversationRegistryPort
{
  private readonly records = new Map<string, ConversationRecord>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async register(conversationId: string, userId?: string): Promise<void> {
    if (this.records.has(conversationId)) return;
    this.records.set(conversationId, {
      conversationId,
      userId: userId ?? null,
      createdAt: this.now(),
    });
  }

  /** Stored record, for inspection in tests */
  recordOf(conversationId: string): ConversationRecord | undefined {
    const record = this.records.get(conversationId);
    return record ? { ...record } : undefined;
  }
}

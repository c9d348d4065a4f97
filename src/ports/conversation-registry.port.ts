// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/conversation-registry.port`
 * Purpose: Port interface for recording which conversations exist and who started them.
 * Scope: Defines ConversationRegistryPort and ConversationRecord. Does not contain implementations.
 * Invariants:
 *   - REGISTER_ONCE: register() is idempotent; the first call fixes userId and createdAt
 * Side-effects: none
 * @public
 */

/** What register() stores for a conversation */
export interface ConversationRecord {
  conversationId: string;
  userId: string | null;
  createdAt: Date;
}

export interface ConversationRegistryPort {
  /** Record the conversation if unseen. Later calls leave the stored record untouched. */
  register(conversationId: string, userId?: string): Promise<void>;
}

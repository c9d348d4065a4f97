// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-core/conversation/state`
 * Purpose: Persisted per-conversation state (history + step budget).
 * Scope: State shape, defaults and derived flags. Does NOT load or save state.
 * Invariants:
 *   - DEFAULT_CONVERSATION_ID: absent/empty ids resolve to "default"
 *   - LAST_STEP_AT_FLOOR: isLastStep is true once remainingSteps <= 0
 * Side-effects: none
 * Links: conversation/message.ts, ports/checkpoint-store.port.ts
 * @public
 */

import type { Message } from "./message";

export const DEFAULT_CONVERSATION_ID = "default";

/** Reasoning/acting cycles allowed per request */
export const DEFAULT_MAX_STEPS = 10;

export interface ConversationState {
  readonly conversationId: string;
  readonly messages: readonly Message[];
  readonly remainingSteps: number;
}

export function resolveConversationId(id: string | null | undefined): string {
  const trimmed = id?.trim();
  return trimmed ? trimmed : DEFAULT_CONVERSATION_ID;
}

export function createConversationState(
  conversationId: string,
  remainingSteps: number = DEFAULT_MAX_STEPS
): ConversationState {
  return { conversationId, messages: [], remainingSteps };
}

export function isLastStep(state: Pick<ConversationState, "remainingSteps">) {
  return state.remainingSteps <= 0;
}

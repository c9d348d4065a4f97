// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/events`
 * Purpose: Event name registry for structured logging - prevents ad-hoc strings and schema drift.
 * Scope: Define valid event names as const registry and required base fields. Does not define full payload schemas.
 * Invariants: All event names registered here; logEvent() enforces base fields (reqId always).
 * Side-effects: none
 * Links: Used by logEvent(); consumed by the answer service, container and adapters.
 * @public
 */

// ============================================================================
// Event Name Registry (as const)
// ============================================================================

export const EVENT_NAMES = {
  // AI Domain
  AI_ANSWER_START: "ai.answer.start",
  AI_ANSWER_COMPLETE: "ai.answer.complete",
  AI_ANSWER_ERROR: "ai.answer.error",
  AI_STREAM_CLIENT_ABORTED: "ai.answer.client_aborted",
  AI_TOOL_EXEC: "ai.tool.exec",
  AI_CHECKPOINT_SAVE: "ai.checkpoint.save",
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];

// ============================================================================
// Base Field Enforcement (for logEvent() helper)
// ============================================================================

/**
 * Required base fields for all events.
 * reqId is ALWAYS required; conversationId whenever the event belongs to one.
 */
export interface EventBase {
  reqId: string;
  conversationId?: string;
}

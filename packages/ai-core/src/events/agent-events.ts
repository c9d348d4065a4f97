// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-core/events/agent-events`
 * Purpose: Typed events emitted while a question is being answered, plus SSE framing.
 * Scope: Event union and wire encoder. Does NOT decide when events are emitted (reasoning loop does).
 * Invariants:
 *   - TYPE_DISCRIMINATOR: every event carries `type`
 *   - TOOL_BEFORE_NEXT_TURN: tool_message events precede the next turn's deltas
 *   - ERROR_IS_LAST: an error event is the final event of a stream
 *   - ONE_JSON_PER_FRAME: encodeSseEvent writes exactly one JSON object per data frame
 * Side-effects: none
 * Links: @askdb/langgraph-graphs inproc/runner.ts
 * @public
 */

import type { AiExecutionErrorCode } from "../execution/error-codes";

/**
 * A tool result was appended to the conversation.
 */
export interface ToolMessageEvent {
  readonly type: "tool_message";
  readonly toolName: string;
  /** Correlates with the assistant's ToolCallRequest.id */
  readonly toolCallId: string;
  readonly content: string;
}

/**
 * Incremental assistant text.
 */
export interface AgentMessageDeltaEvent {
  readonly type: "agent_message_delta";
  readonly delta: string;
}

/**
 * The assistant finished the turn the loop treats as final.
 */
export interface AgentMessageCompleteEvent {
  readonly type: "agent_message_complete";
  readonly content: string;
}

/**
 * Unrecoverable failure. Message is generic; details go to logs only.
 */
export interface AgentErrorEvent {
  readonly type: "error";
  readonly error: AiExecutionErrorCode;
  readonly message: string;
}

export type AgentEvent =
  | ToolMessageEvent
  | AgentMessageDeltaEvent
  | AgentMessageCompleteEvent
  | AgentErrorEvent;

export type AgentEventType = AgentEvent["type"];

/** Text of the final error event; internal detail is logged, never streamed */
export const GENERIC_STREAM_ERROR_MESSAGE =
  "I encountered an error while processing your question.";

/** Callback used by producers that push events into a stream */
export type EmitAgentEvent = (event: AgentEvent) => void;

/**
 * Frame one event for a text/event-stream response.
 */
export function encodeSseEvent(event: AgentEvent): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}

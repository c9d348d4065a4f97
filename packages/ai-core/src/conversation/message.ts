// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-core/conversation/message`
 * Purpose: Conversation message model shared by the reasoning loop, the model gateway and checkpoint stores.
 * Scope: Types plus small constructors and guards. Does NOT convert to provider or LangChain formats.
 * Invariants:
 *   - TOOL_CALLS_ON_ASSISTANT_ONLY: toolCalls is empty unless role === "assistant"
 *   - TOOL_FIELDS_ON_TOOL_ONLY: toolCallId/toolName present only when role === "tool"
 *   - JSON_SAFE: every field is plain JSON (checkpoints serialize messages verbatim)
 * Side-effects: none
 * Links: conversation/state.ts, ports/checkpoint-store.port.ts
 * @public
 */

export type MessageRole = "human" | "assistant" | "tool";

/**
 * A model-requested invocation of a named tool.
 * `arguments` is the parsed argument object; schema conformance is checked by the tool runner.
 */
export interface ToolCallRequest {
  readonly id: string;
  readonly name: string;
  readonly arguments: Readonly<Record<string, unknown>>;
}

export interface HumanMessage {
  readonly role: "human";
  readonly content: string;
}

export interface AssistantMessage {
  readonly role: "assistant";
  /** May be empty when the turn only carries tool calls */
  readonly content: string;
  readonly toolCalls: readonly ToolCallRequest[];
}

export interface ToolMessage {
  readonly role: "tool";
  readonly content: string;
  readonly toolCallId: string;
  readonly toolName: string;
}

export type Message = HumanMessage | AssistantMessage | ToolMessage;

export function humanMessage(content: string): HumanMessage {
  return { role: "human", content };
}

export function assistantMessage(
  content: string,
  toolCalls: readonly ToolCallRequest[] = []
): AssistantMessage {
  return { role: "assistant", content, toolCalls };
}

export function toolMessage(
  toolCallId: string,
  toolName: string,
  content: string
): ToolMessage {
  return { role: "tool", content, toolCallId, toolName };
}

export function hasToolCalls(m: Message): m is AssistantMessage & {
  readonly toolCalls: readonly [ToolCallRequest, ...ToolCallRequest[]];
} {
  return m.role === "assistant" && m.toolCalls.length > 0;
}

/**
 * Ids of tool messages whose toolCallId was never requested by an earlier assistant turn.
 * Empty when the history is referentially consistent.
 */
export function findOrphanToolMessages(
  messages: readonly Message[]
): readonly string[] {
  const requested = new Set<string>();
  const orphans: string[] = [];
  for (const m of messages) {
    if (m.role === "assistant") {
      for (const call of m.toolCalls) requested.add(call.id);
    } else if (m.role === "tool" && !requested.has(m.toolCallId)) {
      orphans.push(m.toolCallId);
    }
  }
  return orphans;
}

export const INTERRUPTED_TOOL_CALL_CONTENT =
  "Error: the tool call was interrupted before it produced a result.";

/**
 * Answer every tool call that has no tool message yet, so the history is valid model input.
 * Histories can end this way when a request was cancelled or crashed mid-batch.
 */
export function closeDanglingToolCalls(
  messages: readonly Message[]
): readonly Message[] {
  const out: Message[] = [];
  let pending: ToolCallRequest[] = [];

  const flush = () => {
    for (const call of pending) {
      out.push(toolMessage(call.id, call.name, INTERRUPTED_TOOL_CALL_CONTENT));
    }
    pending = [];
  };

  for (const m of messages) {
    if (m.role === "tool") {
      pending = pending.filter((call) => call.id !== m.toolCallId);
    } else {
      flush();
      if (m.role === "assistant") pending = [...m.toolCalls];
    }
    out.push(m);
  }
  flush();

  return out;
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/langgraph-graphs/runtime/message-converters`
 * Purpose: Convert between conversation messages and LangChain messages.
 * Scope: Pure conversion. Does NOT call models.
 * Invariants:
 *   - TOOL_CALL_IDS_PRESERVED: ids round-trip unchanged in both directions
 *   - MALFORMED_OUTPUT_THROWS: unparseable tool calls or missing ids throw LlmError("malformed_output")
 * Side-effects: none
 * Links: chat-model-gateway.ts
 * @public
 */

import {
  type AssistantMessage,
  assistantMessage,
  LlmError,
  type Message,
  type ToolCallRequest,
} from "@askdb/ai-core";
import {
  AIMessage,
  type AIMessageChunk,
  type BaseMessage,
  HumanMessage,
  type MessageContent,
  ToolMessage,
} from "@langchain/core/messages";

/**
 * Plain text of a message content (string, or the text parts of a content array).
 */
export function messageContentText(content: MessageContent): string {
  if (typeof content === "string") return content;
  return content
    .map((part) =>
      typeof part === "object" &&
      part !== null &&
      "type" in part &&
      part.type === "text" &&
      "text" in part &&
      typeof part.text === "string"
        ? part.text
        : ""
    )
    .join("");
}

export function toBaseMessage(msg: Message): BaseMessage {
  switch (msg.role) {
    case "human":
      return new HumanMessage({ content: msg.content });

    case "assistant":
      return new AIMessage({
        content: msg.content,
        tool_calls: msg.toolCalls.map((tc) => ({
          id: tc.id,
          name: tc.name,
          args: { ...tc.arguments },
          type: "tool_call" as const,
        })),
      });

    case "tool":
      return new ToolMessage({
        content: msg.content,
        tool_call_id: msg.toolCallId,
        name: msg.toolName,
      });

    default: {
      const _exhaustive: never = msg;
      throw new Error(`Unknown message role: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * Convert a model reply into an assistant message.
 */
export function fromAIMessage(msg: AIMessage | AIMessageChunk): AssistantMessage {
  const invalid = msg.invalid_tool_calls ?? [];
  if (invalid.length > 0) {
    const names = invalid.map((tc) => tc.name ?? "<unnamed>").join(", ");
    throw new LlmError(
      `Model produced unparseable tool calls: ${names}`,
      "malformed_output"
    );
  }

  const toolCalls: ToolCallRequest[] = (msg.tool_calls ?? []).map((tc, i) => {
    if (!tc.id || !tc.name) {
      throw new LlmError(
        `Model tool call at index ${i} is missing an id or name`,
        "malformed_output"
      );
    }
    return { id: tc.id, name: tc.name, arguments: { ...tc.args } };
  });

  return assistantMessage(messageContentText(msg.content), toolCalls);
}

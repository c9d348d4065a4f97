// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/langgraph-graphs/tests/runtime/message-converters.test`
 * Purpose: Verifies conversion between conversation messages and LangChain messages.
 * Scope: toBaseMessage, fromAIMessage, messageContentText.
 * Invariants: TOOL_CALL_IDS_PRESERVED, MALFORMED_OUTPUT_THROWS
 * Side-effects: none
 * Links: src/runtime/message-converters.ts
 * @internal
 */

import {
  assistantMessage,
  humanMessage,
  isLlmError,
  toolMessage,
} from "@askdb/ai-core";
import {
  AIMessage,
  AIMessageChunk,
  HumanMessage,
  ToolMessage,
} from "@langchain/core/messages";
import { describe, expect, it } from "vitest";

import {
  fromAIMessage,
  messageContentText,
  toBaseMessage,
} from "../../src/runtime/message-converters";

describe("toBaseMessage", () => {
  it("maps human turns", () => {
    const msg = toBaseMessage(humanMessage("How many users?"));
    expect(msg).toBeInstanceOf(HumanMessage);
    expect(msg.content).toBe("How many users?");
  });

  it("keeps tool call ids on assistant turns", () => {
    const msg = toBaseMessage(
      assistantMessage("", [
        { id: "call_1", name: "sql_db_query", arguments: { query: "SELECT 1" } },
      ])
    );
    expect(msg).toBeInstanceOf(AIMessage);
    if (!(msg instanceof AIMessage)) return;
    expect(msg.tool_calls).toEqual([
      {
        id: "call_1",
        name: "sql_db_query",
        args: { query: "SELECT 1" },
        type: "tool_call",
      },
    ]);
  });

  it("maps tool results to their call id", () => {
    const msg = toBaseMessage(toolMessage("call_1", "sql_db_query", "[]"));
    expect(msg).toBeInstanceOf(ToolMessage);
    if (!(msg instanceof ToolMessage)) return;
    expect(msg.tool_call_id).toBe("call_1");
    expect(msg.name).toBe("sql_db_query");
    expect(msg.content).toBe("[]");
  });
});

describe("fromAIMessage", () => {
  it("reads content and tool calls", () => {
    const reply = new AIMessage({
      content: "Checking.",
      tool_calls: [
        { id: "call_7", name: "sql_db_list_tables", args: {}, type: "tool_call" },
      ],
    });

    expect(fromAIMessage(reply)).toEqual(
      assistantMessage("Checking.", [
        { id: "call_7", name: "sql_db_list_tables", arguments: {} },
      ])
    );
  });

  it("round-trips an assistant turn", () => {
    const original = assistantMessage("", [
      { id: "call_1", name: "sql_db_schema", arguments: { table_names: "users" } },
    ]);
    const base = toBaseMessage(original);
    if (!(base instanceof AIMessage)) throw new Error("expected AIMessage");
    expect(fromAIMessage(base)).toEqual(original);
  });

  it("rejects a tool call without an id", () => {
    const reply = new AIMessage({
      content: "",
      tool_calls: [{ name: "sql_db_list_tables", args: {}, type: "tool_call" }],
    });

    expect(() => fromAIMessage(reply)).toThrow(
      "Model tool call at index 0 is missing an id or name"
    );
  });

  it("rejects unparseable tool arguments as malformed output", () => {
    const chunk = new AIMessageChunk({
      content: "",
      tool_call_chunks: [
        {
          id: "call_1",
          name: "sql_db_query",
          args: "{not json",
          index: 0,
          type: "tool_call_chunk",
        },
      ],
    });

    let caught: unknown;
    try {
      fromAIMessage(chunk);
    } catch (error) {
      caught = error;
    }
    expect(isLlmError(caught) && caught.kind).toBe("malformed_output");
    expect(caught).toHaveProperty(
      "message",
      "Model produced unparseable tool calls: sql_db_query"
    );
  });
});

describe("messageContentText", () => {
  it("joins the text parts of structured content", () => {
    expect(
      messageContentText([
        { type: "text", text: "Hello" },
        { type: "image_url", image_url: "https://example.invalid/x.png" },
        { type: "text", text: " world" },
      ])
    ).toBe("Hello world");
  });
});

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/langgraph-graphs/tests/runtime/chat-model-gateway.test`
 * Purpose: Verifies ChatModelGateway against a scripted LangChain chat model.
 * Scope: Prompt assembly, tool binding, delta streaming, aggregation and error classification. No network.
 * Invariants: STATELESS_GATEWAY, TOOLS_AS_OPENAI_FUNCTIONS, DELTAS_IN_ORDER, ERRORS_AS_LLM_ERROR
 * Side-effects: none
 * Links: src/runtime/chat-model-gateway.ts
 * @internal
 */

import {
  assistantMessage,
  humanMessage,
  isLlmError,
  type ToolSpec,
} from "@askdb/ai-core";
import type { BaseLanguageModelInput } from "@langchain/core/language_models/base";
import {
  BaseChatModel,
  type BaseChatModelCallOptions,
  type BindToolsInput,
} from "@langchain/core/language_models/chat_models";
import {
  AIMessageChunk,
  type BaseMessage,
  HumanMessage,
  SystemMessage,
} from "@langchain/core/messages";
import { ChatGenerationChunk, type ChatResult } from "@langchain/core/outputs";
import type { Runnable } from "@langchain/core/runnables";
import { describe, expect, it } from "vitest";

import {
  ChatModelGateway,
  toLlmError,
} from "../../src/runtime/chat-model-gateway";

// ─────────────────────────────────────────────────────────────────────────────
// Scripted model
// ─────────────────────────────────────────────────────────────────────────────

type ModelStep = readonly AIMessageChunk[] | Error;

class ScriptedChatModel extends BaseChatModel {
  readonly received: BaseMessage[][] = [];
  readonly boundTools: BindToolsInput[] = [];
  private readonly steps: ModelStep[];

  constructor(steps: readonly ModelStep[]) {
    super({});
    this.steps = [...steps];
  }

  override _llmType(): string {
    return "scripted";
  }

  override bindTools(
    tools: BindToolsInput[]
  ): Runnable<BaseLanguageModelInput, AIMessageChunk, BaseChatModelCallOptions> {
    this.boundTools.push(...tools);
    return this;
  }

  override async _generate(): Promise<ChatResult> {
    throw new Error("ScriptedChatModel only streams");
  }

  override async *_streamResponseChunks(
    messages: BaseMessage[]
  ): AsyncGenerator<ChatGenerationChunk> {
    this.received.push(messages);
    const step = this.steps.shift();
    if (step === undefined) throw new Error("script exhausted");
    if (step instanceof Error) throw step;
    for (const message of step) {
      yield new ChatGenerationChunk({
        message,
        text: typeof message.content === "string" ? message.content : "",
      });
    }
  }
}

const text = (content: string) => new AIMessageChunk({ content });

const QUERY_SPEC: ToolSpec = {
  name: "sql_db_query",
  description: "Run a read-only query",
  inputSchema: {
    type: "object",
    properties: { query: { type: "string" } },
    required: ["query"],
  },
  effect: "read_only",
};

async function catchError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected rejection");
}

// ─────────────────────────────────────────────────────────────────────────────
// Tests
// ─────────────────────────────────────────────────────────────────────────────

describe("ChatModelGateway", () => {
  it("streams deltas in order and returns the aggregate", async () => {
    const model = new ScriptedChatModel([[text("Hel"), text("lo")]]);
    const gateway = new ChatModelGateway(model);
    const deltas: string[] = [];

    const reply = await gateway.generate([humanMessage("Hi")], [], {
      onDelta: (d) => deltas.push(d),
    });

    expect(deltas).toEqual(["Hel", "lo"]);
    expect(reply).toEqual(assistantMessage("Hello"));
  });

  it("prepends the system prompt to the full history", async () => {
    const model = new ScriptedChatModel([[text("ok")]]);
    const gateway = new ChatModelGateway(model, { systemPrompt: "Be brief." });

    await gateway.generate([humanMessage("Hi")], []);

    const sent = model.received[0] ?? [];
    expect(sent).toHaveLength(2);
    expect(sent[0]).toBeInstanceOf(SystemMessage);
    expect(sent[0]?.content).toBe("Be brief.");
    expect(sent[1]).toBeInstanceOf(HumanMessage);
  });

  it("binds tools as OpenAI functions", async () => {
    const model = new ScriptedChatModel([[text("ok")]]);
    const gateway = new ChatModelGateway(model);

    await gateway.generate([humanMessage("Hi")], [QUERY_SPEC]);

    expect(model.boundTools).toHaveLength(1);
    expect(model.boundTools[0]).toMatchObject({
      type: "function",
      function: {
        name: "sql_db_query",
        description: "Run a read-only query",
        parameters: { type: "object", required: ["query"] },
      },
    });
  });

  it("does not bind when there are no tools", async () => {
    const model = new ScriptedChatModel([[text("ok")]]);
    await new ChatModelGateway(model).generate([humanMessage("Hi")], []);
    expect(model.boundTools).toEqual([]);
  });

  it("parses streamed tool calls", async () => {
    const model = new ScriptedChatModel([
      [
        new AIMessageChunk({
          content: "",
          tool_call_chunks: [
            {
              id: "call_1",
              name: "sql_db_query",
              args: '{"query":"SELECT 1"}',
              index: 0,
              type: "tool_call_chunk",
            },
          ],
        }),
      ],
    ]);
    const deltas: string[] = [];

    const reply = await new ChatModelGateway(model).generate(
      [humanMessage("One?")],
      [QUERY_SPEC],
      { onDelta: (d) => deltas.push(d) }
    );

    expect(deltas).toEqual([]);
    expect(reply).toEqual(
      assistantMessage("", [
        { id: "call_1", name: "sql_db_query", arguments: { query: "SELECT 1" } },
      ])
    );
  });

  it("classifies provider status codes", async () => {
    const failure = Object.assign(new Error("Too many requests"), {
      status: 429,
    });
    const model = new ScriptedChatModel([failure]);

    const error = await catchError(
      new ChatModelGateway(model).generate([humanMessage("Hi")], [])
    );

    expect(isLlmError(error) && error.kind).toBe("rate_limited");
    expect(isLlmError(error) && error.status).toBe(429);
    expect(isLlmError(error) && error.retryable).toBe(true);
  });

  it("treats errors without a status as network failures", async () => {
    const model = new ScriptedChatModel([new Error("socket hang up")]);

    const error = await catchError(
      new ChatModelGateway(model).generate([humanMessage("Hi")], [])
    );

    expect(isLlmError(error) && error.kind).toBe("network");
    expect(error).toHaveProperty("message", "socket hang up");
  });
});

describe("toLlmError", () => {
  it("recognizes timeouts by message", () => {
    const error = toLlmError(new Error("Request timed out."));
    expect(isLlmError(error) && error.kind).toBe("timeout");
  });

  it("turns anything into an AbortError once the signal fired", () => {
    const controller = new AbortController();
    controller.abort();
    expect(toLlmError(new Error("socket hang up"), controller.signal).name).toBe(
      "AbortError"
    );
  });

  it("passes provider 5xx through with its status", () => {
    const error = toLlmError(
      Object.assign(new Error("Bad gateway"), { status: 502 })
    );
    expect(isLlmError(error) && error.kind).toBe("provider_5xx");
  });
});

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/langgraph-graphs/runtime/chat-model-gateway`
 * Purpose: ModelGateway backed by any LangChain chat model with tool calling.
 * Scope: Prompt assembly, tool binding, streaming aggregation, error classification. Does NOT choose the provider (composition root does).
 * Invariants:
 *   - STATELESS_GATEWAY: system prompt + full history sent on every call
 *   - TOOLS_AS_OPENAI_FUNCTIONS: ToolSpecs are bound in OpenAI function format (name, description, parameters)
 *   - DELTAS_IN_ORDER: onDelta receives text chunks in arrival order; empty chunks are skipped
 *   - ERRORS_AS_LLM_ERROR: transport failures → retryable LlmError; unparseable output → LlmError("malformed_output")
 * Side-effects: IO (model service call)
 * Links: message-converters.ts, @askdb/ai-core ports/model-gateway.port.ts
 * @public
 */

import {
  type AssistantMessage,
  classifyLlmErrorFromStatus,
  isLlmError,
  LlmError,
  type Message,
  type ModelGateway,
  type ModelGenerateOptions,
  type ToolSpec,
} from "@askdb/ai-core";
import type {
  BaseLanguageModelInput,
  ToolDefinition,
} from "@langchain/core/language_models/base";
import type {
  BaseChatModel,
  BaseChatModelCallOptions,
} from "@langchain/core/language_models/chat_models";
import {
  type AIMessageChunk,
  type BaseMessage,
  SystemMessage,
} from "@langchain/core/messages";
import type { Runnable } from "@langchain/core/runnables";
import { convertToOpenAITool } from "@langchain/core/utils/function_calling";

import { createAbortError } from "./abort";
import {
  fromAIMessage,
  messageContentText,
  toBaseMessage,
} from "./message-converters";

export interface ChatModelGatewayOptions {
  /** Prepended to every call; not part of the persisted history */
  readonly systemPrompt?: string;
}

export function toOpenAITool(spec: ToolSpec): ToolDefinition {
  return convertToOpenAITool({
    type: "function",
    function: {
      name: spec.name,
      description: spec.description,
      parameters: spec.inputSchema,
    },
  });
}

function readStatus(error: unknown): number | undefined {
  if (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    typeof error.status === "number"
  ) {
    return error.status;
  }
  return undefined;
}

/**
 * Classify a thrown provider error. Abort errors pass through unchanged.
 */
export function toLlmError(error: unknown, signal?: AbortSignal): Error {
  if (isLlmError(error)) return error;
  if (signal?.aborted) return createAbortError();
  if (error instanceof Error && error.name === "AbortError") return error;

  const message = error instanceof Error ? error.message : String(error);
  const status = readStatus(error);
  if (status !== undefined) {
    return new LlmError(message, classifyLlmErrorFromStatus(status), status, {
      cause: error,
    });
  }
  if (error instanceof Error && /timeout|timed out/i.test(error.message)) {
    return new LlmError(message, "timeout", undefined, { cause: error });
  }
  return new LlmError(message, "network", undefined, { cause: error });
}

export class ChatModelGateway implements ModelGateway {
  private readonly model: BaseChatModel;
  private readonly systemPrompt: string | undefined;

  constructor(model: BaseChatModel, options?: ChatModelGatewayOptions) {
    this.model = model;
    this.systemPrompt = options?.systemPrompt;
  }

  async generate(
    messages: readonly Message[],
    tools: readonly ToolSpec[],
    options?: ModelGenerateOptions
  ): Promise<AssistantMessage> {
    const input: BaseMessage[] = [
      ...(this.systemPrompt ? [new SystemMessage(this.systemPrompt)] : []),
      ...messages.map(toBaseMessage),
    ];
    const signal = options?.signal;

    let aggregate: AIMessageChunk | undefined;
    try {
      const runnable = this.withTools(tools);
      const stream = await runnable.stream(input, { signal });
      for await (const chunk of stream) {
        const text = messageContentText(chunk.content);
        if (text.length > 0) options?.onDelta?.(text);
        aggregate = aggregate === undefined ? chunk : aggregate.concat(chunk);
      }
    } catch (error) {
      throw toLlmError(error, signal);
    }

    if (aggregate === undefined) {
      throw new LlmError("Model returned an empty response", "malformed_output");
    }
    return fromAIMessage(aggregate);
  }

  private withTools(
    tools: readonly ToolSpec[]
  ): Runnable<BaseLanguageModelInput, AIMessageChunk, BaseChatModelCallOptions> {
    if (tools.length === 0) return this.model;
    if (!this.model.bindTools) {
      throw new LlmError(
        "Configured chat model does not support tool calling",
        "provider_4xx"
      );
    }
    return this.model.bindTools(tools.map(toOpenAITool));
  }
}

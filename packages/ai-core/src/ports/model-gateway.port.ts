// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-core/ports/model-gateway`
 * Purpose: Request/response contract for one language-model turn.
 * Scope: Interface only. The LangChain-backed adapter lives in @askdb/langgraph-graphs.
 * Invariants:
 *   - STATELESS_GATEWAY: full history is passed on every call; the gateway keeps none
 *   - ONE_ASSISTANT_MESSAGE: resolves with exactly one assistant message
 *   - ERRORS_AS_LLM_ERROR: transport failures throw retryable LlmError; unparseable output throws
 *     LlmError("malformed_output"), which is not retryable
 * Side-effects: none (interface definition only)
 * Links: execution/llm-errors.ts, tooling/types.ts
 * @public
 */

import type { AssistantMessage, Message } from "../conversation/message";
import type { ToolSpec } from "../tooling/types";

export interface ModelGenerateOptions {
  readonly signal?: AbortSignal;
  /** Called for each text increment as it arrives */
  readonly onDelta?: (delta: string) => void;
}

export interface ModelGateway {
  generate(
    messages: readonly Message[],
    tools: readonly ToolSpec[],
    options?: ModelGenerateOptions
  ): Promise<AssistantMessage>;
}

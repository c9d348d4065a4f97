// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/langgraph-graphs/runtime`
 * Purpose: LangChain runtime utilities for graph execution.
 * Scope: Message converters, chat-model gateway, async queue, abort helpers. Does NOT contain graph definitions.
 * Invariants:
 *   - All LangChain model imports contained here
 * Side-effects: none
 * @public
 */

export { createAbortError, throwIfAborted } from "./abort";
export { AsyncQueue, type AsyncQueueOptions } from "./async-queue";
export {
  ChatModelGateway,
  type ChatModelGatewayOptions,
  toLlmError,
  toOpenAITool,
} from "./chat-model-gateway";
export {
  fromAIMessage,
  messageContentText,
  toBaseMessage,
} from "./message-converters";

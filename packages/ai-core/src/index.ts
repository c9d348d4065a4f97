// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-core`
 * Purpose: Barrel export for executor-agnostic question-answering primitives.
 * Scope: Re-exports all public types from submodules. Does NOT implement orchestration.
 * Invariants: SINGLE_SOURCE_OF_TRUTH - these are the canonical definitions.
 * Side-effects: none
 * @public
 */

// Concurrency
export { KeyedLock } from "./concurrency/keyed-lock";
// Conversation model
export {
  type AssistantMessage,
  assistantMessage,
  closeDanglingToolCalls,
  findOrphanToolMessages,
  type HumanMessage,
  hasToolCalls,
  humanMessage,
  INTERRUPTED_TOOL_CALL_CONTENT,
  type Message,
  type MessageRole,
  type ToolCallRequest,
  type ToolMessage,
  toolMessage,
} from "./conversation/message";
export {
  type ConversationState,
  createConversationState,
  DEFAULT_CONVERSATION_ID,
  DEFAULT_MAX_STEPS,
  isLastStep,
  resolveConversationId,
} from "./conversation/state";
// Event types
export {
  type AgentErrorEvent,
  type AgentEvent,
  type AgentEventType,
  type AgentMessageCompleteEvent,
  type AgentMessageDeltaEvent,
  type EmitAgentEvent,
  encodeSseEvent,
  GENERIC_STREAM_ERROR_MESSAGE,
  type ToolMessageEvent,
} from "./events/agent-events";
// Execution errors
export {
  type CheckpointOperation,
  CheckpointError,
  isCheckpointError,
} from "./execution/checkpoint-errors";
export {
  AI_EXECUTION_ERROR_CODES,
  AiExecutionError,
  type AiExecutionErrorCode,
  isAiExecutionError,
  isAiExecutionErrorCode,
  normalizeErrorToExecutionCode,
} from "./execution/error-codes";
export {
  classifyLlmErrorFromStatus,
  isLlmError,
  LlmError,
  type LlmErrorKind,
} from "./execution/llm-errors";
// Ports
export type { CheckpointStore } from "./ports/checkpoint-store.port";
export type {
  ModelGateway,
  ModelGenerateOptions,
} from "./ports/model-gateway.port";
// Tooling
export type { ToolSourcePort } from "./tooling/ports/tool-source.port";
export {
  createToolAllowlistPolicy,
  DENY_ALL_POLICY,
  READ_ONLY_POLICY,
  type ToolPolicy,
  type ToolPolicyDecision,
} from "./tooling/runtime/tool-policy";
export {
  createStaticToolSource,
  StaticToolSource,
} from "./tooling/sources/static.source";
export {
  createToolRunner,
  type ToolExecOptions,
  type ToolExecOutcome,
  type ToolExecRecord,
  type ToolRunner,
  type ToolRunnerConfig,
  toolResultContent,
} from "./tooling/tool-runner";
export type {
  BoundToolRuntime,
  ToolEffect,
  ToolErrorCode,
  ToolInvocationContext,
  ToolResult,
  ToolSpec,
} from "./tooling/types";

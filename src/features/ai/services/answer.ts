// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ai/services/answer`
 * Purpose: Use case orchestration for answering a question within a conversation, streamed or whole.
 * Scope: Resolve ids, validate input, register the conversation, wire per-request tool runner and logging, drive the runner. Does not handle transport framing or auth.
 * Invariants:
 *   - Only imports ports, shared and packages - never adapters
 *   - ONE_ERROR_EVENT_LAST: a failed request ends its stream with exactly one error event
 *   - GENERIC_CALLER_ERRORS: callers see fixed apology texts; internal detail is logged only
 *   - reqId is stable per request entry and carried on every log event
 *   - CANCEL_ON_RETURN: a consumer that stops iterating aborts the loop; the outcome is still logged
 * Side-effects: IO (via ports)
 * Links: @askdb/langgraph-graphs createQaRunner
 * @public
 */

import { randomUUID } from "node:crypto";

import {
  type AgentEvent,
  type CheckpointStore,
  createToolRunner,
  GENERIC_STREAM_ERROR_MESSAGE,
  type KeyedLock,
  type Message,
  type ModelGateway,
  resolveConversationId,
  type ToolPolicy,
  type ToolSourcePort,
} from "@askdb/ai-core";
import { createQaRunner, type QaRunResult } from "@askdb/langgraph-graphs";
import type { Logger } from "pino";

import type { ConversationRegistryPort } from "@/ports";
import { EVENT_NAMES, logEvent } from "@/shared/observability";

/** Returned by answer() whenever the request fails */
export const ANSWER_ERROR_MESSAGE =
  "I apologize, but I encountered an error while processing your question.";

export interface AnswerDeps {
  readonly log: Logger;
  readonly gateway: ModelGateway;
  readonly checkpointStore: CheckpointStore;
  readonly conversationRegistry: ConversationRegistryPort;
  readonly toolSource: ToolSourcePort;
  readonly toolPolicy: ToolPolicy;
  readonly lock: KeyedLock;
  readonly maxSteps: number;
  readonly highWaterMark?: number;
  /** Wraps the checkpoint store per request (e.g. save logging) */
  readonly decorateCheckpointStore?: (
    store: CheckpointStore,
    log: Logger,
    reqId: string
  ) => CheckpointStore;
}

export interface AnswerInput {
  /** Missing or blank ids fall back to the default conversation */
  readonly conversationId?: string | null;
  readonly question: string;
  readonly userId?: string;
  readonly signal?: AbortSignal;
}

/**
 * Run the reasoning loop and yield its events as they are produced.
 *
 * The sequence ends after agent_message_complete on success, or after a single error event on failure.
 */
export async function* streamAnswer(
  deps: AnswerDeps,
  input: AnswerInput
): AsyncGenerator<AgentEvent, void, undefined> {
  const reqId = randomUUID();
  const conversationId = resolveConversationId(input.conversationId);
  const log = deps.log.child({ feature: "ai.answer", reqId, conversationId });

  if (input.question.trim().length === 0) {
    logEvent(
      log,
      EVENT_NAMES.AI_ANSWER_ERROR,
      { reqId, conversationId, errorCode: "invalid_request" },
      "blank question rejected",
      "warn"
    );
    yield {
      type: "error",
      error: "invalid_request",
      message: GENERIC_STREAM_ERROR_MESSAGE,
    };
    return;
  }

  logEvent(log, EVENT_NAMES.AI_ANSWER_START, {
    reqId,
    conversationId,
    questionLength: input.question.length,
  });
  const start = performance.now();

  try {
    await deps.conversationRegistry.register(conversationId, input.userId);
  } catch (error) {
    // Registry is bookkeeping only; the answer does not depend on it
    log.warn({ err: error }, "conversation registry write failed");
  }

  const toolRunner = createToolRunner(deps.toolSource, {
    policy: deps.toolPolicy,
    onExec: (record) =>
      logEvent(
        log,
        EVENT_NAMES.AI_TOOL_EXEC,
        { reqId, conversationId, ...record },
        undefined,
        record.ok ? "info" : "warn"
      ),
  });

  const checkpointStore = deps.decorateCheckpointStore
    ? deps.decorateCheckpointStore(deps.checkpointStore, log, reqId)
    : deps.checkpointStore;

  const run = createQaRunner({
    gateway: deps.gateway,
    checkpointStore,
    toolRunner,
    lock: deps.lock,
    maxSteps: deps.maxSteps,
    ...(deps.highWaterMark !== undefined && {
      highWaterMark: deps.highWaterMark,
    }),
    request: {
      conversationId,
      question: input.question,
      ...(input.signal !== undefined && { abortSignal: input.signal }),
    },
  });

  let drained = false;
  try {
    for await (const event of run.stream) {
      yield event;
    }
    drained = true;
  } finally {
    const result = await run.final;
    logOutcome(log, reqId, conversationId, result, {
      durationMs: Math.round(performance.now() - start),
      clientAborted: !drained,
    });
  }
}

function logOutcome(
  log: Logger,
  reqId: string,
  conversationId: string,
  result: QaRunResult,
  meta: { durationMs: number; clientAborted: boolean }
): void {
  if (meta.clientAborted) {
    logEvent(log, EVENT_NAMES.AI_STREAM_CLIENT_ABORTED, {
      reqId,
      conversationId,
      durationMs: meta.durationMs,
    });
  }

  if (result.ok) {
    logEvent(log, EVENT_NAMES.AI_ANSWER_COMPLETE, {
      reqId,
      conversationId,
      durationMs: meta.durationMs,
      messageCount: result.state.messages.length,
      remainingSteps: result.state.remainingSteps,
    });
    return;
  }

  logEvent(
    log,
    EVENT_NAMES.AI_ANSWER_ERROR,
    {
      reqId,
      conversationId,
      durationMs: meta.durationMs,
      errorCode: result.error,
      errorMessage: result.errorMessage,
    },
    undefined,
    result.error === "aborted" ? "info" : "error"
  );
}

/**
 * Run the reasoning loop to termination and return the final assistant content.
 *
 * Never throws for request failures; returns ANSWER_ERROR_MESSAGE instead.
 */
export async function answer(
  deps: AnswerDeps,
  input: AnswerInput
): Promise<string> {
  let content: string | null = null;
  let failed = false;

  // Drain every event so the loop is never held by backpressure
  for await (const event of streamAnswer(deps, input)) {
    if (event.type === "agent_message_complete") {
      content = event.content;
    } else if (event.type === "error") {
      failed = true;
    }
  }

  return failed || content === null ? ANSWER_ERROR_MESSAGE : content;
}

/**
 * Persisted messages of a conversation; empty for unknown ids.
 */
export async function getConversationHistory(
  deps: Pick<AnswerDeps, "checkpointStore">,
  conversationId?: string | null
): Promise<readonly Message[]> {
  const state = await deps.checkpointStore.load(
    resolveConversationId(conversationId)
  );
  return state.messages;
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/langgraph-graphs/inproc/runner`
 * Purpose: In-process runner for the question-answering loop: load state, invoke graph, stream events.
 * Scope: Creates queue, links cancellation, loads/repairs history, invokes the graph, normalizes errors. Does NOT import from src/.
 * Invariants:
 *   - SINGLE_QUEUE_PER_RUN: runner creates the queue, the graph emits into it
 *   - BUDGET_RESET_PER_REQUEST: remainingSteps starts at maxSteps on every request
 *   - HISTORY_REPAIRED_ON_LOAD: dangling tool calls from an interrupted run are closed before the new question
 *   - ERROR_EVENT_LAST: on failure exactly one error event is emitted and nothing after it
 *   - RESULT_REFLECTS_OUTCOME: final.ok matches stream success/failure
 *   - ERROR_NORMALIZATION_ONCE: catch block uses normalizeErrorToExecutionCode()
 *   - CONSUMER_CANCEL_ABORTS: stopping iteration aborts the run at its next suspension point
 * Side-effects: IO (executes graph, reads/writes checkpoints, emits events)
 * Links: graphs/qa/graph.ts, runtime/async-queue.ts
 * @public
 */

import {
  type AgentEvent,
  CheckpointError,
  closeDanglingToolCalls,
  type ConversationState,
  DEFAULT_MAX_STEPS,
  GENERIC_STREAM_ERROR_MESSAGE,
  humanMessage,
  isCheckpointError,
  normalizeErrorToExecutionCode,
} from "@askdb/ai-core";

import { createQaGraph } from "../graphs/qa/graph";
import { throwIfAborted } from "../runtime/abort";
import { AsyncQueue } from "../runtime/async-queue";
import type { QaRun, QaRunnerOptions, QaRunResult } from "./types";

// Two node visits per cycle plus start, termination and slack
function recursionLimitFor(maxSteps: number): number {
  return 2 * Math.max(0, maxSteps) + 5;
}

/**
 * Create a runner for one question.
 *
 * The loop starts immediately; consume `stream` to receive events and await `final` for the outcome.
 * A consumer that never reads the stream stalls the loop once highWaterMark events are buffered.
 */
export function createQaRunner(opts: QaRunnerOptions): QaRun {
  const { gateway, checkpointStore, toolRunner, lock, request } = opts;
  const maxSteps = opts.maxSteps ?? DEFAULT_MAX_STEPS;
  const { conversationId } = request;

  const controller = new AbortController();
  const onExternalAbort = () => controller.abort(request.abortSignal?.reason);
  if (request.abortSignal?.aborted) {
    controller.abort(request.abortSignal.reason);
  } else {
    request.abortSignal?.addEventListener("abort", onExternalAbort, {
      once: true,
    });
  }

  const queue = new AsyncQueue<AgentEvent>({
    ...(opts.highWaterMark !== undefined && {
      highWaterMark: opts.highWaterMark,
    }),
    onReturn: () => controller.abort(),
  });

  const emit = (event: AgentEvent): void => {
    queue.push(event);
  };

  const graph = createQaGraph({
    gateway,
    toolRunner,
    checkpointStore,
    emit,
    awaitCapacity: () => queue.ready(),
  });

  async function loadState(): Promise<ConversationState> {
    try {
      return await checkpointStore.load(conversationId);
    } catch (error) {
      throw isCheckpointError(error)
        ? error
        : new CheckpointError("load", conversationId, { cause: error });
    }
  }

  async function run(): Promise<QaRunResult> {
    const signal = controller.signal;
    throwIfAborted(signal);

    const loaded = await loadState();
    const messages = [
      ...closeDanglingToolCalls(loaded.messages),
      humanMessage(request.question),
    ];

    const result = await graph.invoke(
      {
        conversationId,
        messages,
        remainingSteps: maxSteps,
        answer: null,
      },
      { signal, recursionLimit: recursionLimitFor(maxSteps) }
    );

    return {
      ok: true,
      answer: result.answer ?? "",
      state: {
        conversationId,
        messages: result.messages,
        remainingSteps: result.remainingSteps,
      },
    };
  }

  const final = (async (): Promise<QaRunResult> => {
    try {
      return lock
        ? await lock.runExclusive(conversationId, run, controller.signal)
        : await run();
    } catch (error) {
      // Aborts surface from LangGraph under varying error names
      const code = controller.signal.aborted
        ? "aborted"
        : normalizeErrorToExecutionCode(error);
      const errorMessage =
        error instanceof Error
          ? `${error.name}: ${error.message}`
          : String(error);

      emit({ type: "error", error: code, message: GENERIC_STREAM_ERROR_MESSAGE });
      return { ok: false, error: code, errorMessage };
    } finally {
      request.abortSignal?.removeEventListener("abort", onExternalAbort);
      queue.close();
    }
  })();

  return { stream: queue, final };
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/langgraph-graphs/graphs/qa/graph`
 * Purpose: Tool-augmented reasoning loop (Thinking → Acting → ... → Terminated) as a LangGraph StateGraph.
 * Scope: Graph nodes, routing, persistence points and event emission. Does NOT load state or own the stream (see inproc/runner.ts).
 * Invariants:
 *   - STEP_BUDGET_GUARD: with remainingSteps <= 0 a tool-calling reply is replaced by STEP_BUDGET_EXHAUSTED_MESSAGE and no tool runs
 *   - DECREMENT_ON_ACTING_ONLY: remainingSteps drops by one per tool batch, never on termination
 *   - SEQUENTIAL_TOOLS: calls in one turn execute in request order, one tool message each
 *   - SAVE_AT_SUSPENSION: state is saved before every model call and every tool call, and on termination
 *   - TOOL_EVENT_AFTER_APPEND: tool_message is emitted right after its tool message is created
 *   - COMPLETE_ONCE: agent_message_complete is emitted exactly once, for the terminating turn
 *   - LAST_STEP_DELTAS_HELD: on the last step deltas are buffered and emitted only if the reply is kept
 * Side-effects: IO (model, tools, checkpoint store via injected ports)
 * Links: state.ts, prompts.ts, inproc/runner.ts
 * @public
 */

import {
  assistantMessage,
  CheckpointError,
  type CheckpointStore,
  type EmitAgentEvent,
  hasToolCalls,
  isCheckpointError,
  isLastStep,
  type Message,
  type ModelGateway,
  type ToolMessage,
  type ToolRunner,
  toolMessage,
} from "@askdb/ai-core";
import type { RunnableConfig } from "@langchain/core/runnables";
import { StateGraph } from "@langchain/langgraph";

import { throwIfAborted } from "../../runtime/abort";
import { STEP_BUDGET_EXHAUSTED_MESSAGE } from "./prompts";
import { type QaState, QaStateAnnotation, type QaStateUpdate } from "./state";

export interface CreateQaGraphOptions {
  readonly gateway: ModelGateway;
  readonly toolRunner: ToolRunner;
  readonly checkpointStore: CheckpointStore;
  readonly emit: EmitAgentEvent;
  /** Awaited before each suspension point so a slow consumer holds the loop */
  readonly awaitCapacity?: () => Promise<void>;
}

export function createQaGraph(opts: CreateQaGraphOptions) {
  const { gateway, toolRunner, checkpointStore, emit } = opts;
  const awaitCapacity = opts.awaitCapacity ?? (() => Promise.resolve());
  const toolSpecs = toolRunner.listToolSpecs();

  async function persist(
    conversationId: string,
    messages: readonly Message[],
    remainingSteps: number
  ): Promise<void> {
    try {
      await checkpointStore.save(conversationId, {
        conversationId,
        messages,
        remainingSteps,
      });
    } catch (error) {
      throw isCheckpointError(error)
        ? error
        : new CheckpointError("save", conversationId, { cause: error });
    }
  }

  // Thinking: one model turn
  async function agent(
    state: QaState,
    config: RunnableConfig
  ): Promise<QaStateUpdate> {
    throwIfAborted(config.signal);
    await awaitCapacity();
    await persist(state.conversationId, state.messages, state.remainingSteps);

    const lastStep = isLastStep(state);
    const held: string[] = [];
    const reply = await gateway.generate(state.messages, toolSpecs, {
      ...(config.signal !== undefined && { signal: config.signal }),
      onDelta: (delta) => {
        if (lastStep) held.push(delta);
        else emit({ type: "agent_message_delta", delta });
      },
    });

    if (!hasToolCalls(reply)) {
      for (const delta of held) emit({ type: "agent_message_delta", delta });
      emit({ type: "agent_message_complete", content: reply.content });
      return { messages: [reply], answer: reply.content };
    }

    if (lastStep) {
      const exhausted = assistantMessage(STEP_BUDGET_EXHAUSTED_MESSAGE);
      emit({ type: "agent_message_complete", content: exhausted.content });
      return { messages: [exhausted], answer: exhausted.content };
    }

    return { messages: [reply] };
  }

  // Acting: run the last turn's tool calls in order
  async function tools(
    state: QaState,
    config: RunnableConfig
  ): Promise<QaStateUpdate> {
    const last = state.messages[state.messages.length - 1];
    if (last === undefined || !hasToolCalls(last)) {
      return {};
    }

    const appended: ToolMessage[] = [];
    for (const call of last.toolCalls) {
      throwIfAborted(config.signal);
      await awaitCapacity();
      await persist(
        state.conversationId,
        [...state.messages, ...appended],
        state.remainingSteps
      );

      const outcome = await toolRunner.exec(
        call,
        config.signal !== undefined ? { signal: config.signal } : undefined
      );
      const message = toolMessage(call.id, call.name, outcome.content);
      appended.push(message);
      emit({
        type: "tool_message",
        toolName: message.toolName,
        toolCallId: message.toolCallId,
        content: message.content,
      });
    }

    return {
      messages: appended,
      remainingSteps: state.remainingSteps - 1,
    };
  }

  // Terminated: final save
  async function checkpoint(state: QaState): Promise<QaStateUpdate> {
    await persist(state.conversationId, state.messages, state.remainingSteps);
    return {};
  }

  function routeAgent(state: QaState): "tools" | "checkpoint" {
    return state.answer === null ? "tools" : "checkpoint";
  }

  const builder = new StateGraph(QaStateAnnotation)
    .addNode("agent", agent)
    .addNode("tools", tools)
    .addNode("checkpoint", checkpoint)
    .addEdge("__start__", "agent")
    .addConditionalEdges("agent", routeAgent, ["tools", "checkpoint"])
    .addEdge("tools", "agent")
    .addEdge("checkpoint", "__end__");

  return builder.compile();
}

export type QaGraph = ReturnType<typeof createQaGraph>;

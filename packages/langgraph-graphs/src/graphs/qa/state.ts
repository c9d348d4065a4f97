// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/langgraph-graphs/graphs/qa/state`
 * Purpose: LangGraph state annotation for the question-answering loop.
 * Scope: State shape and reducers. Does NOT define nodes.
 * Invariants:
 *   - APPEND_ONLY_MESSAGES: node updates append to history, never rewrite it
 *   - STEPS_REPLACED: remainingSteps updates replace the value (tools node decrements)
 *   - ANSWER_SET_ON_TERMINATION: answer stays null until the loop terminates
 * Side-effects: none
 * Links: graph.ts
 * @public
 */

import { DEFAULT_MAX_STEPS, type Message } from "@askdb/ai-core";
import { Annotation } from "@langchain/langgraph";

export const QaStateAnnotation = Annotation.Root({
  /** Checkpoint key */
  conversationId: Annotation<string>(),

  /** Full conversation history, loaded history first */
  messages: Annotation<readonly Message[]>({
    reducer: (left, right) => [...left, ...right],
    default: () => [],
  }),

  /** Reasoning/acting cycles left in this request */
  remainingSteps: Annotation<number>({
    reducer: (_, right) => right,
    default: () => DEFAULT_MAX_STEPS,
  }),

  /** Final assistant content once terminated */
  answer: Annotation<string | null>({
    reducer: (_, right) => right,
    default: () => null,
  }),
});

export type QaState = typeof QaStateAnnotation.State;
export type QaStateUpdate = typeof QaStateAnnotation.Update;

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `askdb`
 * Purpose: Public entry for the question-answering core, bound to the process container.
 * Scope: Thin wrappers over the answer feature. Does not contain logic or transport.
 * Invariants: Dependencies resolved per call from the singleton container.
 * Side-effects: IO (via container on first call)
 * @public
 */

import type { AgentEvent, Message } from "@askdb/ai-core";

import { resolveAnswerDeps } from "@/bootstrap/container";
import {
  answer as answerWithDeps,
  getConversationHistory as historyWithDeps,
  streamAnswer as streamWithDeps,
} from "@/features/ai/public.server";

export interface AskOptions {
  userId?: string;
  signal?: AbortSignal;
}

/** Run the loop to termination and return the final assistant text. */
export function answer(
  conversationId: string | null | undefined,
  question: string,
  options: AskOptions = {}
): Promise<string> {
  return answerWithDeps(resolveAnswerDeps(), {
    conversationId,
    question,
    ...options,
  });
}

/** Run the loop and yield events as they are produced. */
export function streamAnswer(
  conversationId: string | null | undefined,
  question: string,
  options: AskOptions = {}
): AsyncIterable<AgentEvent> {
  return streamWithDeps(resolveAnswerDeps(), {
    conversationId,
    question,
    ...options,
  });
}

export function getConversationHistory(
  conversationId?: string | null
): Promise<readonly Message[]> {
  return historyWithDeps(resolveAnswerDeps(), conversationId);
}

export {
  type AgentEvent,
  AI_EXECUTION_ERROR_CODES,
  type AiExecutionErrorCode,
  encodeSseEvent,
  type Message,
} from "@askdb/ai-core";
export { ANSWER_ERROR_MESSAGE } from "@/features/ai/public.server";

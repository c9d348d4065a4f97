// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/langgraph-graphs/inproc/types`
 * Purpose: Type definitions for in-process execution of the question-answering loop.
 * Scope: Runner options and result. Does NOT import from src/.
 * Invariants:
 *   - PACKAGES_NO_SRC_IMPORTS: No imports from src/**
 *   - PORTS_INJECTED: gateway, store and tools arrive as ai-core ports
 * Side-effects: none
 * Links: runner.ts
 * @public
 */

import type {
  AgentEvent,
  AiExecutionErrorCode,
  CheckpointStore,
  ConversationState,
  KeyedLock,
  ModelGateway,
  ToolRunner,
} from "@askdb/ai-core";

export interface QaRunRequest {
  /** Already resolved (non-empty) conversation id */
  readonly conversationId: string;
  readonly question: string;
  readonly abortSignal?: AbortSignal;
}

export interface QaRunnerOptions {
  readonly gateway: ModelGateway;
  readonly checkpointStore: CheckpointStore;
  readonly toolRunner: ToolRunner;
  /** Serializes runs per conversation id when given */
  readonly lock?: KeyedLock;
  /** Step budget granted to this request. Default DEFAULT_MAX_STEPS */
  readonly maxSteps?: number;
  /** Undelivered events at which the loop pauses. Default 64 */
  readonly highWaterMark?: number;
  readonly request: QaRunRequest;
}

/**
 * Outcome of one run. Error detail in errorMessage is for logs only.
 */
export type QaRunResult =
  | {
      readonly ok: true;
      readonly answer: string;
      readonly state: ConversationState;
    }
  | {
      readonly ok: false;
      readonly error: AiExecutionErrorCode;
      readonly errorMessage: string;
    };

export interface QaRun {
  readonly stream: AsyncIterable<AgentEvent>;
  readonly final: Promise<QaRunResult>;
}

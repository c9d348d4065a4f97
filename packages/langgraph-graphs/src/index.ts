// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/langgraph-graphs`
 * Purpose: Barrel export for the question-answering graph, its runner and runtime utilities.
 * Scope: Re-exports public API. All @langchain/* code lives here (per NO_LANGCHAIN_IN_SRC) except model and vector-store construction in src/adapters.
 * Invariants:
 *   - PACKAGES_NO_SRC_IMPORTS: Never import from src/
 * Side-effects: none
 * @public
 */

export {
  type CreateQaGraphOptions,
  createQaGraph,
  QA_SYSTEM_PROMPT,
  type QaGraph,
  type QaState,
  STEP_BUDGET_EXHAUSTED_MESSAGE,
} from "./graphs/index";

export {
  createQaRunner,
  type QaRun,
  type QaRunnerOptions,
  type QaRunRequest,
  type QaRunResult,
} from "./inproc/index";

export {
  AsyncQueue,
  ChatModelGateway,
  type ChatModelGatewayOptions,
  createAbortError,
  fromAIMessage,
  toBaseMessage,
  toLlmError,
} from "./runtime/index";

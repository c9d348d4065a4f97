// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/langgraph-graphs/graphs`
 * Purpose: Barrel export for graph factories, state and prompts.
 * Scope: Graph creation functions. Does NOT include runners.
 * Invariants:
 *   - Graphs are pure factories, no env reads
 * Side-effects: none
 * @public
 */

export {
  type CreateQaGraphOptions,
  createQaGraph,
  type QaGraph,
} from "./qa/graph";
export { QA_SYSTEM_PROMPT, STEP_BUDGET_EXHAUSTED_MESSAGE } from "./qa/prompts";
export {
  type QaState,
  QaStateAnnotation,
  type QaStateUpdate,
} from "./qa/state";

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/langgraph-graphs/inproc`
 * Purpose: In-process runner entry for the question-answering loop.
 * Scope: Barrel export. Does NOT import from src/.
 * Side-effects: none
 * @public
 */

export { createQaRunner } from "./runner";
export type {
  QaRun,
  QaRunnerOptions,
  QaRunRequest,
  QaRunResult,
} from "./types";

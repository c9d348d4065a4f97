// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ai/public.server`
 * Purpose: Server-only exports for the AI feature.
 * Scope: Re-exports the answer use cases. Does not implement logic.
 * Side-effects: none
 * Links: Part of hexagonal architecture boundary enforcement
 * @public
 */

export {
  ANSWER_ERROR_MESSAGE,
  type AnswerDeps,
  type AnswerInput,
  answer,
  getConversationHistory,
  streamAnswer,
} from "./services/answer";

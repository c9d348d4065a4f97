// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-core/execution/error-codes`
 * Purpose: Canonical error codes, error class, and normalization for request-fatal failures.
 * Scope: Single source of truth for execution error codes and normalization logic. Does NOT cover tool errors (see tooling/types.ts).
 * Invariants:
 *   - SINGLE_SOURCE_OF_TRUTH: All error codes defined here, imported everywhere else
 *   - ERROR_NORMALIZATION_ONCE: normalizeErrorToExecutionCode() is the canonical normalizer
 *   - Recognizes AiExecutionError (.code), LlmError (.kind, .status) and CheckpointError
 * Side-effects: none
 * Links: llm-errors.ts, checkpoint-errors.ts
 * @public
 */

import { isCheckpointError } from "./checkpoint-errors";
import { isLlmError } from "./llm-errors";

/**
 * Canonical error codes for request-fatal failures.
 * - invalid_request: Required input missing or malformed (client error)
 * - model_unavailable: Model service unreachable, timed out, rate limited or rejected the call
 * - model_output_invalid: Model answered with something that is not a usable message
 * - checkpoint_unavailable: Checkpoint store load/save failed
 * - aborted: Request was cancelled (e.g., AbortSignal)
 * - internal: Unexpected error during execution (server fault)
 */
export const AI_EXECUTION_ERROR_CODES = [
  "invalid_request",
  "model_unavailable",
  "model_output_invalid",
  "checkpoint_unavailable",
  "aborted",
  "internal",
] as const;

export type AiExecutionErrorCode = (typeof AI_EXECUTION_ERROR_CODES)[number];

export function isAiExecutionErrorCode(x: unknown): x is AiExecutionErrorCode {
  return (
    typeof x === "string" &&
    AI_EXECUTION_ERROR_CODES.some((code) => code === x)
  );
}

/**
 * Error class that carries a structured AiExecutionErrorCode through call chains.
 */
export class AiExecutionError extends Error {
  readonly code: AiExecutionErrorCode;
  readonly retryable: boolean;

  constructor(
    code: AiExecutionErrorCode,
    message?: string,
    options?: { retryable?: boolean; cause?: unknown }
  ) {
    super(message ?? `AI execution failed: ${code}`, {
      cause: options?.cause,
    });
    this.name = "AiExecutionError";
    this.code = code;
    this.retryable = options?.retryable ?? false;
  }
}

export function isAiExecutionError(error: unknown): error is AiExecutionError {
  return error instanceof AiExecutionError;
}

/**
 * Normalize any error to stable AiExecutionErrorCode.
 *
 * Priority:
 * 1. AbortError → "aborted"
 * 2. AiExecutionError → its code
 * 3. CheckpointError → "checkpoint_unavailable"
 * 4. LlmError → "model_output_invalid" for malformed output, "aborted", else "model_unavailable"
 * 5. Default → "internal"
 */
export function normalizeErrorToExecutionCode(
  error: unknown
): AiExecutionErrorCode {
  if (error instanceof Error && error.name === "AbortError") {
    return "aborted";
  }

  if (isAiExecutionError(error)) {
    return error.code;
  }

  if (isCheckpointError(error)) {
    return "checkpoint_unavailable";
  }

  if (isLlmError(error)) {
    switch (error.kind) {
      case "malformed_output":
        return "model_output_invalid";
      case "aborted":
        return "aborted";
      default:
        return "model_unavailable";
    }
  }

  return "internal";
}

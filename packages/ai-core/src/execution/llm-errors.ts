// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-core/execution/llm-errors`
 * Purpose: Model gateway error type with retryability classification.
 * Scope: Defines LlmError class and helpers. Does not implement normalization (see error-codes.ts).
 * Invariants:
 *   - LlmError captures kind + optional HTTP status at throw site (gateway boundary)
 *   - classifyLlmErrorFromStatus maps HTTP codes to LlmErrorKind
 *   - RETRYABLE_BY_KIND: malformed_output, provider_4xx and aborted are never retryable
 * Side-effects: none
 * Links: error-codes.ts (normalizeErrorToExecutionCode)
 * @public
 */

/**
 * Error classification kinds for model failures.
 */
export type LlmErrorKind =
  | "timeout"
  | "rate_limited"
  | "provider_4xx"
  | "provider_5xx"
  | "network"
  | "malformed_output"
  | "aborted"
  | "unknown";

const NON_RETRYABLE_KINDS: ReadonlySet<LlmErrorKind> = new Set([
  "provider_4xx",
  "malformed_output",
  "aborted",
]);

/**
 * Typed error for model gateway failures.
 */
export class LlmError extends Error {
  readonly kind: LlmErrorKind;
  readonly status: number | undefined;

  constructor(
    message: string,
    kind: LlmErrorKind,
    status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = "LlmError";
    this.kind = kind;
    this.status = status;
  }

  get retryable(): boolean {
    return !NON_RETRYABLE_KINDS.has(this.kind);
  }
}

export function isLlmError(error: unknown): error is LlmError {
  return error instanceof LlmError;
}

/**
 * Classify LlmError kind from HTTP status code.
 */
export function classifyLlmErrorFromStatus(status: number): LlmErrorKind {
  if (status === 408) return "timeout";
  if (status === 429) return "rate_limited";
  if (status >= 400 && status < 500) return "provider_4xx";
  if (status >= 500 && status < 600) return "provider_5xx";
  return "unknown";
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-core/tooling/types`
 * Purpose: Executor-agnostic tool types: spec, result union, and the bound runtime the tool runner drives.
 * Scope: Types only. Does NOT import Zod; schemas are compiled to JSONSchema7 by @askdb/ai-tools.
 * Invariants:
 *   - EFFECT_TYPED: every tool declares its side-effect level
 *   - RESULT_NEVER_THROWS: tool outcomes cross the runner boundary as ToolResult, never as exceptions
 *   - TEXT_FOR_MODEL: successful outputs are rendered to text by the bound runtime
 * Side-effects: none (types only)
 * Links: tool-runner.ts, @askdb/ai-tools runtime-adapter.ts
 * @public
 */

import type { JSONSchema7 } from "json-schema";

/**
 * Tool effect level for policy decisions.
 */
export type ToolEffect = "read_only" | "state_change" | "external_side_effect";

/**
 * Tool specification presented to the model (name + description + argument schema).
 * Compiled form of a ToolContract.
 */
export interface ToolSpec {
  /** Stable tool name (snake_case) as the model sees it */
  readonly name: string;
  readonly description: string;
  readonly inputSchema: JSONSchema7;
  readonly effect: ToolEffect;
}

/**
 * Error codes for tool failures. All of them are recovered inside the loop.
 */
export type ToolErrorCode =
  | "unknown_tool"
  | "invalid_input"
  | "policy_denied"
  | "execution_failed"
  | "invalid_output";

export type ToolResult =
  | { readonly ok: true; readonly value: string }
  | {
      readonly ok: false;
      readonly errorCode: ToolErrorCode;
      readonly safeMessage: string;
    };

/**
 * Context for one tool invocation. References only, no secrets.
 */
export interface ToolInvocationContext {
  readonly toolCallId: string;
  readonly signal?: AbortSignal;
}

/**
 * Executable tool as seen by the runner.
 *
 * Pipeline order (runner-owned): validateInput → checkInput → exec → validateOutput → format.
 * Each stage may throw; the runner maps the stage to a ToolErrorCode.
 */
export interface BoundToolRuntime {
  readonly spec: ToolSpec;
  /** Parse raw model arguments; throws on schema mismatch */
  validateInput(rawArgs: unknown): unknown;
  /** Content policy on validated input; returns a denial reason, or null to proceed */
  checkInput(validated: unknown): string | null;
  exec(validated: unknown, ctx: ToolInvocationContext): Promise<unknown>;
  /** Throws when the implementation broke its output contract */
  validateOutput(rawOutput: unknown): unknown;
  /** Render validated output as the text the model reads */
  format(validatedOutput: unknown): string;
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-tools/types`
 * Purpose: Typed tool contract, implementation and bound-tool shapes.
 * Scope: Types only. Does NOT execute tools.
 * Invariants:
 *   - ZOD_IS_SOURCE_OF_TRUTH: inputSchema drives validation and the JSONSchema shown to the model
 *   - FORMAT_IS_PURE: format() renders validated output to text without IO
 *   - NO LangChain imports (LangChain wrapping lives in langgraph-graphs)
 * Side-effects: none (types only)
 * Links: runtime-adapter.ts, schema.ts
 * @public
 */

import type { ToolEffect, ToolInvocationContext } from "@askdb/ai-core";
import type { z } from "zod";

/**
 * Tool contract: schema and rendering, no implementation.
 */
export interface ToolContract<TName extends string, TInput, TOutput> {
  /** Stable tool name (snake_case) as the model sees it */
  readonly name: TName;
  /** Human-readable description for the model */
  readonly description: string;
  readonly effect: ToolEffect;
  readonly inputSchema: z.ZodType<TInput>;
  readonly outputSchema: z.ZodType<TOutput>;
  /** Text the model reads for a successful call */
  readonly format: (output: TOutput) => string;
  /**
   * Content policy applied after validation, before execution.
   * Returns a denial reason, or null to proceed.
   */
  readonly checkInput?: (input: TInput) => string | null;
}

/**
 * Tool implementation. Adapters implement this; receives validated input, returns raw output.
 */
export interface ToolImplementation<TInput, TOutput> {
  readonly execute: (
    input: TInput,
    ctx: ToolInvocationContext
  ) => Promise<TOutput>;
}

/**
 * Bound tool: contract + implementation together.
 */
export interface BoundTool<TName extends string, TInput, TOutput> {
  readonly contract: ToolContract<TName, TInput, TOutput>;
  readonly implementation: ToolImplementation<TInput, TOutput>;
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-tools/runtime-adapter`
 * Purpose: Convert a typed BoundTool (ai-tools) to the BoundToolRuntime interface (ai-core).
 * Scope: Adapter creation only. Does not execute tools.
 * Invariants:
 *   - ZOD_STAYS_HERE: validation runs through the contract's schemas; ai-core sees only the interface
 *   - TYPED_EXEC: each stage re-parses through the contract schema, so implementations receive typed values
 *   - READABLE_VALIDATION_ERRORS: schema issues render as "path: message" pairs for the model
 * Side-effects: none
 * @public
 */

import type { BoundToolRuntime, ToolInvocationContext } from "@askdb/ai-core";
import type { z } from "zod";

import { toToolSpec } from "./schema";
import type { BoundTool } from "./types";

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

export function toBoundToolRuntime<TName extends string, TInput, TOutput>(
  boundTool: BoundTool<TName, TInput, TOutput>
): BoundToolRuntime {
  const { contract, implementation } = boundTool;

  // Compile spec once
  const spec = toToolSpec(contract);

  const parseInput = (raw: unknown): TInput => {
    const parsed = contract.inputSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(
        `Invalid arguments for ${contract.name}: ${describeIssues(parsed.error)}`
      );
    }
    return parsed.data;
  };

  const parseOutput = (raw: unknown): TOutput => {
    const parsed = contract.outputSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(
        `Invalid output from ${contract.name}: ${describeIssues(parsed.error)}`
      );
    }
    return parsed.data;
  };

  return {
    spec,

    validateInput(rawArgs: unknown): unknown {
      return parseInput(rawArgs);
    },

    checkInput(validated: unknown): string | null {
      return contract.checkInput
        ? contract.checkInput(parseInput(validated))
        : null;
    },

    exec(validated: unknown, ctx: ToolInvocationContext): Promise<unknown> {
      return implementation.execute(parseInput(validated), ctx);
    },

    validateOutput(rawOutput: unknown): unknown {
      return parseOutput(rawOutput);
    },

    format(validatedOutput: unknown): string {
      return contract.format(parseOutput(validatedOutput));
    },
  };
}

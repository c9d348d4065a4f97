// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-core/tooling/tool-runner`
 * Purpose: Executes one model tool call through a fixed pipeline and returns model-readable text.
 * Scope: Lookup, policy, validation, content checks, execution, output validation, formatting. Does NOT append messages or emit stream events.
 * Invariants:
 *   - TOOLRUNNER_PIPELINE_ORDER: lookup → policy → validateInput → checkInput → exec → validateOutput → format
 *   - NEVER_THROWS: every failure becomes a ToolResult with a ToolErrorCode
 *   - UNKNOWN_TOOL_IS_A_RESULT: unresolved names yield a result naming the tool and the valid alternatives
 *   - DENY_BY_DEFAULT: Default to DENY_ALL_POLICY if no policy provided
 * Side-effects: none beyond what the bound tool's exec performs
 * Links: types.ts, runtime/tool-policy.ts, sources/static.source.ts
 * @public
 */

import type { ToolCallRequest } from "../conversation/message";
import type { ToolSourcePort } from "./ports/tool-source.port";
import { DENY_ALL_POLICY, type ToolPolicy } from "./runtime/tool-policy";
import type { ToolErrorCode, ToolResult } from "./types";

/**
 * Observation of one finished tool call, for logging.
 */
export interface ToolExecRecord {
  readonly toolCallId: string;
  readonly toolName: string;
  readonly ok: boolean;
  readonly errorCode?: ToolErrorCode;
  readonly durationMs: number;
}

export interface ToolRunnerConfig {
  /** Default: DENY_ALL_POLICY */
  readonly policy?: ToolPolicy;
  readonly onExec?: (record: ToolExecRecord) => void;
}

export interface ToolExecOptions {
  readonly signal?: AbortSignal;
}

export interface ToolExecOutcome {
  readonly result: ToolResult;
  /** Text for the tool message appended to the conversation */
  readonly content: string;
}

const FIX_HINT = "Please fix your mistakes.";

/**
 * Render a ToolResult as tool message content.
 */
export function toolResultContent(result: ToolResult): string {
  if (result.ok) return result.value;
  switch (result.errorCode) {
    case "invalid_input":
    case "execution_failed":
      return `Error: ${result.safeMessage}\n${FIX_HINT}`;
    default:
      return `Error: ${result.safeMessage}`;
  }
}

function errorMessage(err: unknown, fallback: string): string {
  return err instanceof Error && err.message ? err.message : fallback;
}

/**
 * Create a tool runner over a tool source.
 */
export function createToolRunner(
  source: ToolSourcePort,
  config?: ToolRunnerConfig
) {
  const policy = config?.policy ?? DENY_ALL_POLICY;
  const onExec = config?.onExec;

  async function run(
    call: ToolCallRequest,
    options?: ToolExecOptions
  ): Promise<ToolResult> {
    const boundTool = source.getBoundTool(call.name);
    if (!boundTool) {
      const known = source.getToolNames().join(", ");
      return {
        ok: false,
        errorCode: "unknown_tool",
        safeMessage: `${call.name} is not a valid tool, try one of [${known}].`,
      };
    }

    // 1. Policy
    if (policy.decide(call.name, boundTool.spec.effect) === "deny") {
      return {
        ok: false,
        errorCode: "policy_denied",
        safeMessage: `Tool '${call.name}' is not allowed by current policy`,
      };
    }

    // 2. Validate args
    let validatedInput: unknown;
    try {
      validatedInput = boundTool.validateInput(call.arguments);
    } catch (err) {
      return {
        ok: false,
        errorCode: "invalid_input",
        safeMessage: errorMessage(err, "Invalid tool arguments"),
      };
    }

    // 3. Content policy (e.g. read-only SQL)
    const denial = boundTool.checkInput(validatedInput);
    if (denial !== null) {
      return { ok: false, errorCode: "policy_denied", safeMessage: denial };
    }

    // 4. Execute
    let rawOutput: unknown;
    try {
      rawOutput = await boundTool.exec(validatedInput, {
        toolCallId: call.id,
        ...(options?.signal !== undefined && { signal: options.signal }),
      });
    } catch (err) {
      return {
        ok: false,
        errorCode: "execution_failed",
        safeMessage: errorMessage(err, "Tool execution failed"),
      };
    }

    // 5. Validate output + format
    try {
      const validatedOutput = boundTool.validateOutput(rawOutput);
      return { ok: true, value: boundTool.format(validatedOutput) };
    } catch (err) {
      return {
        ok: false,
        errorCode: "invalid_output",
        safeMessage: errorMessage(err, "Invalid tool output"),
      };
    }
  }

  /**
   * Execute a tool call. Never throws.
   */
  async function exec(
    call: ToolCallRequest,
    options?: ToolExecOptions
  ): Promise<ToolExecOutcome> {
    const startedAt = performance.now();
    const result = await run(call, options);
    onExec?.({
      toolCallId: call.id,
      toolName: call.name,
      ok: result.ok,
      ...(!result.ok && { errorCode: result.errorCode }),
      durationMs: performance.now() - startedAt,
    });
    return { result, content: toolResultContent(result) };
  }

  return { exec, listToolSpecs: () => source.listToolSpecs() };
}

export type ToolRunner = ReturnType<typeof createToolRunner>;

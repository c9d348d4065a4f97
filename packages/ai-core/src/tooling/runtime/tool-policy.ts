// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-core/tooling/runtime/tool-policy`
 * Purpose: Runtime policy deciding whether a resolved tool may execute.
 * Scope: Policy interface and stock policies. Content checks on arguments live on the bound tool (checkInput).
 * Invariants:
 *   - DENY_BY_DEFAULT: the runner uses DENY_ALL_POLICY when none is supplied
 *   - READ_ONLY_POLICY: only tools declaring effect "read_only" are allowed
 * Side-effects: none
 * Links: tool-runner.ts
 * @public
 */

import type { ToolEffect } from "../types";

export type ToolPolicyDecision = "allow" | "deny";

export interface ToolPolicy {
  decide(toolName: string, effect: ToolEffect): ToolPolicyDecision;
}

export const DENY_ALL_POLICY: ToolPolicy = {
  decide: () => "deny",
};

/**
 * Allows every read-only tool; everything with a side effect is denied.
 */
export const READ_ONLY_POLICY: ToolPolicy = {
  decide: (_toolName, effect) => (effect === "read_only" ? "allow" : "deny"),
};

/**
 * Tools in the allowlist are allowed; all others denied.
 */
export function createToolAllowlistPolicy(
  allowedTools: readonly string[]
): ToolPolicy {
  const allowedSet = new Set(allowedTools);
  return {
    decide: (toolName) => (allowedSet.has(toolName) ? "allow" : "deny"),
  };
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-core/tooling/ports/tool-source`
 * Purpose: Lookup port for executable tools.
 * Scope: Interface only.
 * Invariants:
 *   - RESOLVED_AT_STARTUP: sources are immutable once built; lookups are plain map reads
 *   - SPECS_MATCH_TOOLS: listToolSpecs() lists exactly the tools getBoundTool() resolves
 * Side-effects: none (interface definition only)
 * @public
 */

import type { BoundToolRuntime, ToolSpec } from "../types";

export interface ToolSourcePort {
  /** Undefined when the name is not registered */
  getBoundTool(toolName: string): BoundToolRuntime | undefined;
  listToolSpecs(): readonly ToolSpec[];
  getToolNames(): readonly string[];
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-core/tooling/sources/static`
 * Purpose: Immutable name → tool map built once at startup.
 * Scope: ToolSourcePort implementation over BoundToolRuntime values.
 * Invariants:
 *   - TOOL_NAME_UNIQUE: construction throws on duplicate names, never silently overwrites
 * Side-effects: none
 * Links: ports/tool-source.port.ts
 * @public
 */

import type { ToolSourcePort } from "../ports/tool-source.port";
import type { BoundToolRuntime, ToolSpec } from "../types";

export class StaticToolSource implements ToolSourcePort {
  private readonly toolMap: ReadonlyMap<string, BoundToolRuntime>;
  private readonly specs: readonly ToolSpec[];

  constructor(tools: ReadonlyMap<string, BoundToolRuntime>) {
    this.toolMap = tools;
    this.specs = Array.from(tools.values()).map((t) => t.spec);
  }

  getBoundTool(toolName: string): BoundToolRuntime | undefined {
    return this.toolMap.get(toolName);
  }

  listToolSpecs(): readonly ToolSpec[] {
    return this.specs;
  }

  getToolNames(): readonly string[] {
    return Array.from(this.toolMap.keys());
  }
}

/**
 * @throws If two tools share a name
 */
export function createStaticToolSource(
  tools: readonly BoundToolRuntime[]
): StaticToolSource {
  const map = new Map<string, BoundToolRuntime>();

  for (const tool of tools) {
    const name = tool.spec.name;
    if (map.has(name)) {
      throw new Error(
        `TOOL_NAME_UNIQUE violation: Duplicate tool name "${name}". ` +
          "Tool names must be unique within a source."
      );
    }
    map.set(name, tool);
  }

  return new StaticToolSource(map);
}

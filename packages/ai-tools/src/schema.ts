// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-tools/schema`
 * Purpose: Compile a tool contract's Zod input schema into the ToolSpec shown to the model.
 * Scope: Zod → JSONSchema7 conversion. Does NOT emit provider wire formats.
 * Invariants:
 *   - INLINE_SCHEMAS: $refStrategy "none", no $schema key
 *   - STABLE_SPEC: same contract → same spec
 * Side-effects: none
 * Links: types.ts, runtime-adapter.ts
 * @public
 */

import type { ToolEffect, ToolSpec } from "@askdb/ai-core";
import type { JSONSchema7 } from "json-schema";
import type { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";

/**
 * The contract fields a ToolSpec is compiled from.
 */
export interface ToolSpecSource {
  readonly name: string;
  readonly description: string;
  readonly effect: ToolEffect;
  readonly inputSchema: z.ZodTypeAny;
}

export function toToolSpec(contract: ToolSpecSource): ToolSpec {
  const { $schema: _draft, ...rawSchema } = zodToJsonSchema(
    contract.inputSchema,
    { $refStrategy: "none" }
  );

  const inputSchema: JSONSchema7 =
    typeof rawSchema === "object" && rawSchema !== null
      ? (rawSchema as JSONSchema7)
      : { type: "object" };

  return {
    name: contract.name,
    description: contract.description,
    inputSchema,
    effect: contract.effect,
  };
}

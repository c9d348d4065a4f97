// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-tools/tools/sql-list-tables`
 * Purpose: AI tool listing the tables of the connected database.
 * Scope: Contract + implementation factory. Does NOT implement database access.
 * Invariants:
 *   - EFFECT_TYPED: effect is `read_only`
 *   - COMMA_SEPARATED: output renders as "a, b, c"
 * Side-effects: IO (database catalog read via capability)
 * Links: capabilities/sql.ts
 * @public
 */

import { z } from "zod";

import type { SqlCapability } from "../capabilities/sql";
import type { BoundTool, ToolContract, ToolImplementation } from "../types";

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const SqlListTablesInputSchema = z.object({});
export type SqlListTablesInput = z.infer<typeof SqlListTablesInputSchema>;

export const SqlListTablesOutputSchema = z.object({
  tables: z.array(z.string()),
});
export type SqlListTablesOutput = z.infer<typeof SqlListTablesOutputSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Contract
// ─────────────────────────────────────────────────────────────────────────────

export const SQL_LIST_TABLES_NAME = "sql_db_list_tables" as const;

export const sqlListTablesContract: ToolContract<
  typeof SQL_LIST_TABLES_NAME,
  SqlListTablesInput,
  SqlListTablesOutput
> = {
  name: SQL_LIST_TABLES_NAME,
  description:
    "Input is an empty object, output is a comma-separated list of tables in the database.",
  effect: "read_only",
  inputSchema: SqlListTablesInputSchema,
  outputSchema: SqlListTablesOutputSchema,
  format: (output) => output.tables.join(", "),
};

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export interface SqlToolDeps {
  sql: SqlCapability;
}

export function createSqlListTablesImplementation(
  deps: SqlToolDeps
): ToolImplementation<SqlListTablesInput, SqlListTablesOutput> {
  return {
    execute: async () => ({ tables: [...(await deps.sql.listTables())] }),
  };
}

export function createSqlListTablesBoundTool(
  deps: SqlToolDeps
): BoundTool<
  typeof SQL_LIST_TABLES_NAME,
  SqlListTablesInput,
  SqlListTablesOutput
> {
  return {
    contract: sqlListTablesContract,
    implementation: createSqlListTablesImplementation(deps),
  };
}

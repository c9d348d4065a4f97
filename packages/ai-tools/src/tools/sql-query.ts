// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-tools/tools/sql-query`
 * Purpose: AI tool executing a read-only SQL statement.
 * Scope: Contract (with read-only content check) + implementation factory. Does NOT implement database access.
 * Invariants:
 *   - EFFECT_TYPED: effect is `read_only`
 *   - READ_ONLY_BEFORE_EXEC: statements with write keywords, or more than one statement, are denied before the capability is called
 *   - JSON_ROWS: rows render as a JSON array; bigint values render as strings
 * Side-effects: IO (database read via capability)
 * Links: sql/read-only-guard.ts, capabilities/sql.ts
 * @public
 */

import { z } from "zod";

import { checkReadOnlySql, readOnlyCheckMessage } from "../sql/read-only-guard";
import type { BoundTool, ToolContract, ToolImplementation } from "../types";
import type { SqlToolDeps } from "./sql-list-tables";

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const SqlQueryInputSchema = z.object({
  query: z.string().min(1).describe("A detailed and correct SQL query."),
});
export type SqlQueryInput = z.infer<typeof SqlQueryInputSchema>;

export const SqlQueryOutputSchema = z.object({
  rows: z.array(z.record(z.unknown())),
});
export type SqlQueryOutput = z.infer<typeof SqlQueryOutputSchema>;

function jsonSafe(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

// ─────────────────────────────────────────────────────────────────────────────
// Contract
// ─────────────────────────────────────────────────────────────────────────────

export const SQL_QUERY_NAME = "sql_db_query" as const;

export const sqlQueryContract: ToolContract<
  typeof SQL_QUERY_NAME,
  SqlQueryInput,
  SqlQueryOutput
> = {
  name: SQL_QUERY_NAME,
  description:
    "Input to this tool is a detailed and correct SQL query, output is a result from the database. " +
    "If the query is not correct, an error message will be returned. " +
    "If an error is returned, rewrite the query, check the query, and try again. " +
    "If you encounter an issue with Unknown column 'xxxx' in 'field list', use sql_db_schema to query the correct table fields.",
  effect: "read_only",
  inputSchema: SqlQueryInputSchema,
  outputSchema: SqlQueryOutputSchema,
  format: (output) => JSON.stringify(output.rows, jsonSafe),
  checkInput: (input) => readOnlyCheckMessage(checkReadOnlySql(input.query)),
};

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export function createSqlQueryImplementation(
  deps: SqlToolDeps
): ToolImplementation<SqlQueryInput, SqlQueryOutput> {
  return {
    execute: async (input) => {
      const rows = await deps.sql.query(input.query);
      return { rows: rows.map((r) => ({ ...r })) };
    },
  };
}

export function createSqlQueryBoundTool(
  deps: SqlToolDeps
): BoundTool<typeof SQL_QUERY_NAME, SqlQueryInput, SqlQueryOutput> {
  return {
    contract: sqlQueryContract,
    implementation: createSqlQueryImplementation(deps),
  };
}

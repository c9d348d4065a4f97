// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-tools/tools/sql-schema`
 * Purpose: AI tool describing table columns plus a few sample rows.
 * Scope: Contract + implementation factory + CREATE TABLE rendering. Does NOT implement database access.
 * Invariants:
 *   - EFFECT_TYPED: effect is `read_only`
 *   - UNKNOWN_TABLES_FAIL: names missing from the database fail the call, listing every missing name
 *   - TABLE_ORDER_AS_REQUESTED: descriptions render in the order the model asked for them
 * Side-effects: IO (database catalog + sample row reads via capability)
 * Links: capabilities/sql.ts, sql-list-tables.ts
 * @public
 */

import { z } from "zod";

import type { SqlRow, TableDescription } from "../capabilities/sql";
import type { BoundTool, ToolContract, ToolImplementation } from "../types";
import type { SqlToolDeps } from "./sql-list-tables";

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const SqlSchemaInputSchema = z.object({
  table_names: z
    .string()
    .min(1)
    .describe(
      "A comma-separated list of the table names for which to return the schema. Example input: 'table1, table2, table3'"
    ),
});
export type SqlSchemaInput = z.infer<typeof SqlSchemaInputSchema>;

const ColumnSchema = z.object({
  name: z.string(),
  dataType: z.string(),
  nullable: z.boolean(),
});

export const SqlSchemaOutputSchema = z.object({
  tables: z.array(
    z.object({
      name: z.string(),
      columns: z.array(ColumnSchema),
      sampleRows: z.array(z.record(z.unknown())),
    })
  ),
});
export type SqlSchemaOutput = z.infer<typeof SqlSchemaOutputSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Rendering
// ─────────────────────────────────────────────────────────────────────────────

function renderCell(value: unknown): string {
  if (value === null || value === undefined) return "None";
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

function renderSampleRows(
  table: Pick<TableDescription, "name" | "columns">,
  rows: readonly SqlRow[]
): string {
  const header = table.columns.map((c) => c.name).join("\t");
  const body = rows.map((row) =>
    table.columns.map((c) => renderCell(row[c.name])).join("\t")
  );
  return [
    "/*",
    `${rows.length} rows from ${table.name} table:`,
    header,
    ...body,
    "*/",
  ].join("\n");
}

/**
 * Render one table as CREATE TABLE text followed by its sample rows.
 */
export function renderTableDescription(
  table: SqlSchemaOutput["tables"][number]
): string {
  const columns = table.columns
    .map(
      (c) => `\t"${c.name}" ${c.dataType.toUpperCase()}${c.nullable ? "" : " NOT NULL"}`
    )
    .join(", \n");
  const ddl = `CREATE TABLE "${table.name}" (\n${columns}\n)`;
  return table.sampleRows.length > 0
    ? `${ddl}\n\n${renderSampleRows(table, table.sampleRows)}`
    : ddl;
}

export function parseTableNames(raw: string): string[] {
  return raw
    .split(",")
    .map((n) => n.trim())
    .filter((n) => n.length > 0);
}

// ─────────────────────────────────────────────────────────────────────────────
// Contract
// ─────────────────────────────────────────────────────────────────────────────

export const SQL_SCHEMA_NAME = "sql_db_schema" as const;

export const sqlSchemaContract: ToolContract<
  typeof SQL_SCHEMA_NAME,
  SqlSchemaInput,
  SqlSchemaOutput
> = {
  name: SQL_SCHEMA_NAME,
  description:
    "Input to this tool is a comma-separated list of tables, output is the schema and sample rows for those tables. " +
    "Be sure that the tables actually exist by calling sql_db_list_tables first!",
  effect: "read_only",
  inputSchema: SqlSchemaInputSchema,
  outputSchema: SqlSchemaOutputSchema,
  format: (output) => output.tables.map(renderTableDescription).join("\n\n"),
};

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export function createSqlSchemaImplementation(
  deps: SqlToolDeps
): ToolImplementation<SqlSchemaInput, SqlSchemaOutput> {
  return {
    execute: async (input) => {
      const requested = parseTableNames(input.table_names);
      const known = new Set(await deps.sql.listTables());
      const missing = requested.filter((name) => !known.has(name));
      if (missing.length > 0) {
        throw new Error(
          `table_names {${missing.join(", ")}} not found in database`
        );
      }

      const described = await deps.sql.describeTables(requested);
      const byName = new Map(described.map((t) => [t.name, t]));
      const tables = requested.flatMap((name) => {
        const table = byName.get(name);
        return table
          ? [
              {
                name: table.name,
                columns: table.columns.map((c) => ({ ...c })),
                sampleRows: table.sampleRows.map((r) => ({ ...r })),
              },
            ]
          : [];
      });
      return { tables };
    },
  };
}

export function createSqlSchemaBoundTool(
  deps: SqlToolDeps
): BoundTool<typeof SQL_SCHEMA_NAME, SqlSchemaInput, SqlSchemaOutput> {
  return {
    contract: sqlSchemaContract,
    implementation: createSqlSchemaImplementation(deps),
  };
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/sql/postgres-sql.adapter`
 * Purpose: SqlCapability backed by postgres.js against the queried database.
 * Scope: Catalog reads via information_schema, sample rows, and ad-hoc statements. Does not enforce read-only text rules (see ai-tools guard).
 * Invariants:
 *   - SORTED_TABLES: listTables() returns base tables and views of the configured schema in name order
 *   - READ_ONLY_TRANSACTION: query() runs inside a read-only transaction
 *   - EXTENDED_PROTOCOL: query() never uses the simple protocol, so the server runs at most one statement
 *   - QUOTED_IDENTIFIERS: sample queries quote table names
 * Side-effects: IO (database)
 * Links: SqlCapability (ai-tools), sql.client.ts
 * @public
 */

import type { SqlCapability, SqlRow, TableDescription } from "@askdb/ai-tools";
import type postgres from "postgres";

import type { SqlClient } from "@/adapters/server/db/sql.client";

export interface PostgresSqlAdapterConfig {
  /** Rows fetched per table for schema descriptions */
  sampleRows: number;
  /** Default "public" */
  schema?: string;
}

interface ColumnRow {
  column_name: string;
  data_type: string;
  is_nullable: string;
}

// postgres.js reads `simple` at runtime but leaves it out of UnsafeQueryOptions
const SINGLE_STATEMENT: postgres.UnsafeQueryOptions & { simple: boolean } = {
  simple: false,
};

function quoteIdentifier(name: string): string {
  return `"${name.replaceAll('"', '""')}"`;
}

export class PostgresSqlAdapter implements SqlCapability {
  private readonly schema: string;

  constructor(
    private readonly sql: SqlClient,
    private readonly config: PostgresSqlAdapterConfig
  ) {
    this.schema = config.schema ?? "public";
  }

  async listTables(): Promise<readonly string[]> {
    const rows = await this.sql<{ table_name: string }[]>`
      select table_name
      from information_schema.tables
      where table_schema = ${this.schema}
        and table_type in ('BASE TABLE', 'VIEW')
      order by table_name
    `;
    return rows.map((row) => row.table_name);
  }

  async describeTables(
    tableNames: readonly string[]
  ): Promise<TableDescription[]> {
    const existing = new Set(await this.listTables());
    const described: TableDescription[] = [];

    for (const name of tableNames) {
      if (!existing.has(name)) continue;

      const columns = await this.sql<ColumnRow[]>`
        select column_name, data_type, is_nullable
        from information_schema.columns
        where table_schema = ${this.schema} and table_name = ${name}
        order by ordinal_position
      `;

      const sampleRows =
        this.config.sampleRows > 0
          ? await this.query(
              `SELECT * FROM ${quoteIdentifier(this.schema)}.${quoteIdentifier(name)} LIMIT ${this.config.sampleRows}`
            )
          : [];

      described.push({
        name,
        columns: columns.map((column) => ({
          name: column.column_name,
          dataType: column.data_type,
          nullable: column.is_nullable === "YES",
        })),
        sampleRows,
      });
    }

    return described;
  }

  async query(statement: string): Promise<readonly SqlRow[]> {
    return this.sql.begin("read only", async (tx) => {
      const rows = await tx.unsafe(statement, [], SINGLE_STATEMENT);
      return rows.map((row): SqlRow => ({ ...row }));
    });
  }
}

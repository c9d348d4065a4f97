// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-tools/capabilities/sql`
 * Purpose: SQL toolkit capability consumed by the sql_db_* tools.
 * Scope: Interface definitions only. The postgres-backed adapter lives in the app.
 * Invariants:
 *   - READ_ONLY_CALLER: tools only pass statements that cleared the read-only guard
 *   - SORTED_TABLES: listTables returns names in ascending order
 * Side-effects: none (interface definition only)
 * @public
 */

export interface ColumnDescription {
  readonly name: string;
  /** Database type name as reported by the catalog (e.g. "integer", "text") */
  readonly dataType: string;
  readonly nullable: boolean;
}

export type SqlRow = Readonly<Record<string, unknown>>;

export interface TableDescription {
  readonly name: string;
  readonly columns: readonly ColumnDescription[];
  readonly sampleRows: readonly SqlRow[];
}

export interface SqlCapability {
  listTables(): Promise<readonly string[]>;
  /**
   * Describe existing tables. Names not present in the database are skipped.
   */
  describeTables(tableNames: readonly string[]): Promise<TableDescription[]>;
  /**
   * Execute a statement and return its rows.
   * @throws On database errors; the message is shown to the model
   */
  query(sql: string): Promise<readonly SqlRow[]>;
}

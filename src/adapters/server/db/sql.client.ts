// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/db/sql.client`
 * Purpose: Raw postgres.js client for the database the SQL tools query.
 * Scope: Connection setup only. Does not issue queries.
 * Invariants: Single client instance; lazy initialization; separate pool from checkpoint persistence
 * Side-effects: IO (database connections) - only on first access
 * Links: Used by PostgresSqlAdapter
 * @internal
 */

import postgres from "postgres";

import { serverEnv } from "@/shared/env";

export type SqlClient = postgres.Sql;

let _sql: SqlClient | null = null;

export function getSqlClient(): SqlClient {
  if (!_sql) {
    const url = serverEnv().DATABASE_URL;
    if (!url) {
      throw new Error("DATABASE_URL must be set for the SQL tools");
    }
    _sql = postgres(url, {
      max: 5,
      idle_timeout: 20,
      connect_timeout: 10,
      connection: {
        application_name: "askdb_sql_tools",
      },
    });
  }
  return _sql;
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/db/drizzle.client`
 * Purpose: Drizzle database client for checkpoint and registry persistence.
 * Scope: Database connection setup and Drizzle ORM instance. Does not handle business logic or migrations.
 * Invariants: Single database connection instance; properly configured with schema; lazy initialization
 * Side-effects: IO (database connections) - only on first access
 * Notes: Uses postgres driver with Drizzle ORM; CHECKPOINT_DATABASE_URL falls back to DATABASE_URL.
 * Links: Used by DrizzleCheckpointStoreAdapter and DrizzleConversationRegistryAdapter
 * @internal
 */

import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

import * as schema from "@/shared/db";
import { checkpointDatabaseUrl, serverEnv } from "@/shared/env";

// Schema-aware database type
export type Database = PostgresJsDatabase<typeof schema>;

// Lazy database connection - only created when first accessed
let _db: Database | null = null;

function createDb(): Database {
  if (!_db) {
    const url = checkpointDatabaseUrl(serverEnv());
    if (!url) {
      throw new Error(
        "CHECKPOINT_DATABASE_URL or DATABASE_URL must be set for postgres persistence"
      );
    }
    const client = postgres(url, {
      max: 10,
      idle_timeout: 20,
      connect_timeout: 10,
      connection: {
        application_name: "askdb_checkpoints",
      },
    });

    _db = drizzle(client, { schema });
  }
  return _db;
}

// Export lazy database getter to avoid top-level runtime env access
export const getDb = createDb;

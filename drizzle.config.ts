// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `drizzle.config`
 * Purpose: Drizzle ORM configuration for checkpoint/registry migrations via drizzle-kit.
 * Scope: Migration configuration and schema paths. Does not handle runtime database connections.
 * Invariants: Schema path matches actual database schema location
 * Side-effects: IO (file system operations during migration generation)
 * Notes: CHECKPOINT_DATABASE_URL wins over DATABASE_URL, matching the runtime client.
 * Links: Used by npm run db:generate and db:migrate
 * @public
 */

import { defineConfig } from "drizzle-kit";

function getDatabaseUrl(): string {
  const url = process.env.CHECKPOINT_DATABASE_URL ?? process.env.DATABASE_URL;
  if (!url) {
    throw new Error("Set CHECKPOINT_DATABASE_URL or DATABASE_URL for drizzle-kit");
  }
  return url;
}

export default defineConfig({
  schema: "./src/shared/db/schema.ts",
  out: "./src/adapters/server/db/migrations",
  dialect: "postgresql",
  dbCredentials: {
    url: getDatabaseUrl(),
  },
  verbose: true,
  strict: true,
});

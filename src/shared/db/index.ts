// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/db`
 * Purpose: Barrel export for database schema.
 * Scope: Exposes table definitions. Does not handle connections or migrations.
 * Side-effects: none
 * @public
 */

export * from "./schema";

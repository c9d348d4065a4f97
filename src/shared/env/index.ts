// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env`
 * Purpose: Public surface for environment configuration.
 * Scope: Re-exports the validated server env and its error. Does not export internal schemas.
 * Invariants: Only re-exports public APIs.
 * Side-effects: none
 * @public
 */

export type { EnvValidationMeta, ServerEnv } from "./server";
export {
  checkpointDatabaseUrl,
  EnvValidationError,
  resetServerEnv,
  serverEnv,
} from "./server";

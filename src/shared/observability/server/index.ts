// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server`
 * Purpose: Server-side logging utilities (pino-based).
 * Scope: Logger factory and logEvent() wrapper. Does not define events.
 * Invariants: none
 * Side-effects: IO (logging to stdout)
 * Links: Uses event registry from ../events.
 * @public
 */

export { type LogEventLevel, logEvent } from "./logEvent";
export type { Logger } from "./logger";
export { makeLogger, makeNoopLogger } from "./logger";
export { REDACT_PATHS } from "./redact";

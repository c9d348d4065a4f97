// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability`
 * Purpose: Public API for structured logging.
 * Scope: Re-exports event registry and server logging. Does not implement transports.
 * Invariants: none
 * Side-effects: none
 * Notes: Import from this module, not from submodules.
 * @public
 */

export type { EventBase, EventName } from "./events";
export { EVENT_NAMES } from "./events";
export type { LogEventLevel, Logger } from "./server";
export { logEvent, makeLogger, makeNoopLogger, REDACT_PATHS } from "./server";

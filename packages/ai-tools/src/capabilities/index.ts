// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-tools/capabilities`
 * Purpose: Capability interfaces tools depend on (defined here, NOT in ai-core).
 * Scope: Re-exports only.
 * Invariants: none
 * Side-effects: none
 * @public
 */

export type {
  DocumentSearchCapability,
  RetrievedDocument,
} from "./documents";
export type {
  ColumnDescription,
  SqlCapability,
  SqlRow,
  TableDescription,
} from "./sql";

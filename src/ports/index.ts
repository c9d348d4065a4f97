// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports`
 * Purpose: Hex entry file for port interfaces - canonical import surface.
 * Scope: Re-exports app-owned ports plus the package-owned ports features depend on. Does not export implementations.
 * Invariants: Named exports only, no runtime coupling, no export *
 * Side-effects: none
 * Links: Used by features and adapters for port contracts
 * @public
 */

export type {
  CheckpointStore,
  ConversationState,
  ModelGateway,
} from "@askdb/ai-core";
export type {
  DocumentSearchCapability,
  SqlCapability,
} from "@askdb/ai-tools";
export type {
  ConversationRecord,
  ConversationRegistryPort,
} from "./conversation-registry.port";

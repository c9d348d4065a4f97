// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server`
 * Purpose: Hex entry file for server adapters - canonical import surface.
 * Scope: Re-exports only public server adapter implementations with named exports. Does not export test doubles.
 * Invariants: Named exports only, no export *, runtime implementations
 * Side-effects: none (at import time - adapters have runtime effects when instantiated)
 * Links: Used by bootstrap layer for DI container assembly
 * @public
 */

export { createChatModel, createEmbeddings } from "./ai/chat-model.factory";
export { DrizzleCheckpointStoreAdapter } from "./checkpoint/drizzle-checkpoint-store.adapter";
export { MemoryCheckpointStoreAdapter } from "./checkpoint/memory-checkpoint-store.adapter";
export { ObservabilityCheckpointStoreDecorator } from "./checkpoint/observability-checkpoint.decorator";
export { DrizzleConversationRegistryAdapter } from "./conversation/drizzle-conversation-registry.adapter";
export { MemoryConversationRegistryAdapter } from "./conversation/memory-conversation-registry.adapter";
export { type Database, getDb } from "./db/drizzle.client";
export { getSqlClient, type SqlClient } from "./db/sql.client";
export { loadDocumentSeed, parseDocumentSeed } from "./documents/document-seed";
export {
  VectorStoreSearchAdapter,
  type VectorStoreSearchAdapterOptions,
} from "./documents/vector-store-search.adapter";
export {
  type PostgresSqlAdapterConfig,
  PostgresSqlAdapter,
} from "./sql/postgres-sql.adapter";

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-tools/capabilities/documents`
 * Purpose: Similarity-search capability consumed by the document retrieval tool.
 * Scope: Interface definition only. The vector-store adapter lives in the app.
 * Invariants: similaritySearch returns at most k documents, best match first.
 * Side-effects: none (interface definition only)
 * @public
 */

export interface RetrievedDocument {
  readonly pageContent: string;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface DocumentSearchCapability {
  similaritySearch(query: string, k: number): Promise<RetrievedDocument[]>;
}

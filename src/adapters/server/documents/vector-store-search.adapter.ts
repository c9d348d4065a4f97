// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/documents/vector-store-search.adapter`
 * Purpose: DocumentSearchCapability over a LangChain vector store, with optional lazy seeding.
 * Scope: Similarity search and one-time seed load. Does not chunk or crawl documents.
 * Invariants:
 *   - SEED_ONCE: the seed loader runs at most once, before the first search; a failed seed is retried on the next search
 *   - PLAIN_RESULTS: returns pageContent + metadata only, never LangChain document instances
 * Side-effects: IO (embedding provider via the vector store; file read via the seed loader)
 * Links: DocumentSearchCapability (ai-tools), document-seed.ts
 * @public
 */

import type { DocumentSearchCapability, RetrievedDocument } from "@askdb/ai-tools";
import type { DocumentInterface } from "@langchain/core/documents";
import type { VectorStoreInterface } from "@langchain/core/vectorstores";

export interface VectorStoreSearchAdapterOptions {
  /** Documents to add before the first search */
  seed?: () => Promise<DocumentInterface[]>;
}

export class VectorStoreSearchAdapter implements DocumentSearchCapability {
  private seeding: Promise<void> | null = null;

  constructor(
    private readonly store: VectorStoreInterface,
    private readonly options: VectorStoreSearchAdapterOptions = {}
  ) {}

  async similaritySearch(
    query: string,
    k: number
  ): Promise<RetrievedDocument[]> {
    await this.ensureSeeded();
    const documents = await this.store.similaritySearch(query, k);
    return documents.map((doc) => ({
      pageContent: doc.pageContent,
      metadata: { ...doc.metadata },
    }));
  }

  private ensureSeeded(): Promise<void> {
    const { seed } = this.options;
    if (!seed) return Promise.resolve();
    if (!this.seeding) {
      this.seeding = (async () => {
        const documents = await seed();
        if (documents.length > 0) {
          await this.store.addDocuments(documents);
        }
      })().catch((error: unknown) => {
        this.seeding = null;
        throw error;
      });
    }
    return this.seeding;
  }
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-tools/tools/retrieve-documents`
 * Purpose: AI tool returning the passages most similar to a query.
 * Scope: Contract + implementation factory. Does NOT embed or index documents.
 * Invariants:
 *   - EFFECT_TYPED: effect is `read_only`
 *   - EMPTY_IS_EXPLICIT: zero matches render as exactly NO_DOCUMENTS_FOUND
 *   - NUMBERED_PASSAGES: passages render as "Document N:\n<content>", 1-based, blank line between
 * Side-effects: IO (similarity search via capability)
 * Links: capabilities/documents.ts
 * @public
 */

import { z } from "zod";

import type { DocumentSearchCapability } from "../capabilities/documents";
import type { BoundTool, ToolContract, ToolImplementation } from "../types";

export const NO_DOCUMENTS_FOUND = "No documents are found.";

/** Passages returned per query unless configured otherwise */
export const DEFAULT_RETRIEVAL_TOP_K = 5;

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const RetrieveDocumentsInputSchema = z.object({
  query: z
    .string()
    .min(1)
    .describe("A clear, specific search query for the document index"),
});
export type RetrieveDocumentsInput = z.infer<
  typeof RetrieveDocumentsInputSchema
>;

export const RetrieveDocumentsOutputSchema = z.object({
  documents: z.array(
    z.object({
      pageContent: z.string(),
      metadata: z.record(z.unknown()),
    })
  ),
});
export type RetrieveDocumentsOutput = z.infer<
  typeof RetrieveDocumentsOutputSchema
>;

export function formatRetrievedDocuments(
  documents: readonly { pageContent: string }[]
): string {
  if (documents.length === 0) return NO_DOCUMENTS_FOUND;
  return documents
    .map((doc, i) => `Document ${i + 1}:\n${doc.pageContent}`)
    .join("\n\n");
}

// ─────────────────────────────────────────────────────────────────────────────
// Contract
// ─────────────────────────────────────────────────────────────────────────────

export const RETRIEVE_DOCUMENTS_NAME = "retrieve_documents" as const;

export const retrieveDocumentsContract: ToolContract<
  typeof RETRIEVE_DOCUMENTS_NAME,
  RetrieveDocumentsInput,
  RetrieveDocumentsOutput
> = {
  name: RETRIEVE_DOCUMENTS_NAME,
  description:
    "Retrieve relevant documents from the document index for a query. " +
    "Use this for general knowledge, explanations, and information that is not stored in the database.",
  effect: "read_only",
  inputSchema: RetrieveDocumentsInputSchema,
  outputSchema: RetrieveDocumentsOutputSchema,
  format: (output) => formatRetrievedDocuments(output.documents),
};

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export interface RetrieveDocumentsDeps {
  documents: DocumentSearchCapability;
  /** Default: DEFAULT_RETRIEVAL_TOP_K */
  topK?: number;
}

export function createRetrieveDocumentsImplementation(
  deps: RetrieveDocumentsDeps
): ToolImplementation<RetrieveDocumentsInput, RetrieveDocumentsOutput> {
  const k = deps.topK ?? DEFAULT_RETRIEVAL_TOP_K;
  return {
    execute: async (input) => {
      const docs = await deps.documents.similaritySearch(input.query, k);
      return {
        documents: docs.map((d) => ({
          pageContent: d.pageContent,
          metadata: { ...d.metadata },
        })),
      };
    },
  };
}

export function createRetrieveDocumentsBoundTool(
  deps: RetrieveDocumentsDeps
): BoundTool<
  typeof RETRIEVE_DOCUMENTS_NAME,
  RetrieveDocumentsInput,
  RetrieveDocumentsOutput
> {
  return {
    contract: retrieveDocumentsContract,
    implementation: createRetrieveDocumentsImplementation(deps),
  };
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/documents/document-seed`
 * Purpose: Load seed documents for the in-memory vector store from a JSON file.
 * Scope: Read + validate `[{pageContent, metadata?}]`. Does not embed.
 * Invariants: Invalid files fail with a zod error naming the offending path.
 * Side-effects: IO (file read)
 * @internal
 */

import { readFile } from "node:fs/promises";

import { Document } from "@langchain/core/documents";
import { z } from "zod";

const seedFileSchema = z.array(
  z.object({
    pageContent: z.string().min(1),
    metadata: z.record(z.unknown()).default({}),
  })
);

export function parseDocumentSeed(raw: unknown): Document[] {
  return seedFileSchema
    .parse(raw)
    .map(
      (entry) =>
        new Document({ pageContent: entry.pageContent, metadata: entry.metadata })
    );
}

export async function loadDocumentSeed(path: string): Promise<Document[]> {
  const text = await readFile(path, "utf8");
  const raw: unknown = JSON.parse(text);
  return parseDocumentSeed(raw);
}

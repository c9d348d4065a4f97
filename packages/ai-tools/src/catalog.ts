// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-tools/catalog`
 * Purpose: The closed set of tools the reasoning loop may call, bound to their capabilities.
 * Scope: Tool registration and binding. Does NOT execute tools.
 * Invariants:
 *   - CATALOG_IS_CLOSED: the model sees exactly TOOL_NAMES, in this order
 *   - BOUND_AT_STARTUP: capabilities are injected once by the composition root
 * Side-effects: none
 * Links: runtime-adapter.ts, @askdb/ai-core StaticToolSource
 * @public
 */

import type { BoundToolRuntime } from "@askdb/ai-core";

import type { DocumentSearchCapability } from "./capabilities/documents";
import type { SqlCapability } from "./capabilities/sql";
import { toBoundToolRuntime } from "./runtime-adapter";
import {
  createRetrieveDocumentsBoundTool,
  RETRIEVE_DOCUMENTS_NAME,
} from "./tools/retrieve-documents";
import {
  createSqlListTablesBoundTool,
  SQL_LIST_TABLES_NAME,
} from "./tools/sql-list-tables";
import { createSqlQueryBoundTool, SQL_QUERY_NAME } from "./tools/sql-query";
import { createSqlSchemaBoundTool, SQL_SCHEMA_NAME } from "./tools/sql-schema";

export const TOOL_NAMES = [
  SQL_LIST_TABLES_NAME,
  SQL_SCHEMA_NAME,
  SQL_QUERY_NAME,
  RETRIEVE_DOCUMENTS_NAME,
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export interface ToolCatalogDeps {
  readonly sql: SqlCapability;
  readonly documents: DocumentSearchCapability;
  /** Passages per retrieval; default DEFAULT_RETRIEVAL_TOP_K */
  readonly retrievalTopK?: number;
}

/**
 * Bind every catalog tool to its capability.
 */
export function createToolCatalog(
  deps: ToolCatalogDeps
): readonly BoundToolRuntime[] {
  const sqlDeps = { sql: deps.sql };
  return Object.freeze([
    toBoundToolRuntime(createSqlListTablesBoundTool(sqlDeps)),
    toBoundToolRuntime(createSqlSchemaBoundTool(sqlDeps)),
    toBoundToolRuntime(createSqlQueryBoundTool(sqlDeps)),
    toBoundToolRuntime(
      createRetrieveDocumentsBoundTool({
        documents: deps.documents,
        ...(deps.retrievalTopK !== undefined && { topK: deps.retrievalTopK }),
      })
    ),
  ]);
}

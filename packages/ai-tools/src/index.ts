// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-tools`
 * Purpose: Tool contracts, capabilities and bindings for SQL and document retrieval.
 * Scope: Re-exports. Does NOT import LangChain.
 * Invariants: none
 * Side-effects: none
 * @public
 */

export type {
  ColumnDescription,
  DocumentSearchCapability,
  RetrievedDocument,
  SqlCapability,
  SqlRow,
  TableDescription,
} from "./capabilities";
export {
  createToolCatalog,
  TOOL_NAMES,
  type ToolCatalogDeps,
  type ToolName,
} from "./catalog";
export { toBoundToolRuntime } from "./runtime-adapter";
export { type ToolSpecSource, toToolSpec } from "./schema";
export {
  blankSqlLiterals,
  checkReadOnlySql,
  MULTIPLE_STATEMENTS_MESSAGE,
  type ReadOnlyCheck,
  readOnlyCheckMessage,
  readOnlyDenialMessage,
  WRITE_KEYWORDS,
  type WriteKeyword,
} from "./sql/read-only-guard";
export {
  createRetrieveDocumentsBoundTool,
  DEFAULT_RETRIEVAL_TOP_K,
  formatRetrievedDocuments,
  NO_DOCUMENTS_FOUND,
  RETRIEVE_DOCUMENTS_NAME,
  type RetrieveDocumentsDeps,
} from "./tools/retrieve-documents";
export {
  createSqlListTablesBoundTool,
  SQL_LIST_TABLES_NAME,
  type SqlToolDeps,
} from "./tools/sql-list-tables";
export { createSqlQueryBoundTool, SQL_QUERY_NAME } from "./tools/sql-query";
export {
  createSqlSchemaBoundTool,
  parseTableNames,
  renderTableDescription,
  SQL_SCHEMA_NAME,
} from "./tools/sql-schema";
export type { BoundTool, ToolContract, ToolImplementation } from "./types";

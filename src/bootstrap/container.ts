// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Dependency injection container for application composition root with environment-based adapter selection.
 * Scope: Wire adapters to ports for runtime dependency injection. Does not handle request-scoped lifecycle.
 * Invariants: All ports wired; single container instance per process; tool catalog static after startup; one KeyedLock per process.
 * Side-effects: IO (initializes logger and emits startup log on first access)
 * Notes: Uses serverEnv.isTestMode (APP_ENV=test) to wire fakes; CHECKPOINT_BACKEND selects memory or postgres persistence.
 * Links: Used by src/index.ts and tests; configure adapters here for DI.
 * @public
 */

import {
  type CheckpointStore,
  createStaticToolSource,
  KeyedLock,
  type ModelGateway,
  READ_ONLY_POLICY,
  type ToolPolicy,
  type ToolSourcePort,
} from "@askdb/ai-core";
import {
  createToolCatalog,
  type DocumentSearchCapability,
  type SqlCapability,
} from "@askdb/ai-tools";
import {
  ChatModelGateway,
  QA_SYSTEM_PROMPT,
} from "@askdb/langgraph-graphs";
import { MemoryVectorStore } from "langchain/vectorstores/memory";
import type { Logger } from "pino";

import {
  createChatModel,
  createEmbeddings,
  DrizzleCheckpointStoreAdapter,
  DrizzleConversationRegistryAdapter,
  getDb,
  getSqlClient,
  loadDocumentSeed,
  MemoryCheckpointStoreAdapter,
  MemoryConversationRegistryAdapter,
  ObservabilityCheckpointStoreDecorator,
  PostgresSqlAdapter,
  VectorStoreSearchAdapter,
} from "@/adapters/server";
import {
  FakeDocumentSearchAdapter,
  FakeModelGatewayAdapter,
  FakeSqlAdapter,
} from "@/adapters/test";
import type { AnswerDeps } from "@/features/ai/public.server";
import type { ConversationRegistryPort } from "@/ports";
import { type ServerEnv, serverEnv } from "@/shared/env";
import { makeLogger } from "@/shared/observability";

export interface Container {
  log: Logger;
  env: ServerEnv;
  gateway: ModelGateway;
  checkpointStore: CheckpointStore;
  conversationRegistry: ConversationRegistryPort;
  sql: SqlCapability;
  documents: DocumentSearchCapability;
  toolSource: ToolSourcePort;
  toolPolicy: ToolPolicy;
  lock: KeyedLock;
}

// Module-level singleton
let _container: Container | null = null;

/**
 * Get the singleton container instance.
 * Lazily initializes on first access.
 */
export function getContainer(): Container {
  if (!_container) {
    _container = createContainer();
  }
  return _container;
}

/**
 * Reset the singleton container.
 * For tests only - allows fresh container between test runs.
 */
export function resetContainer(): void {
  _container = null;
}

function createPersistence(
  env: ServerEnv
): Pick<Container, "checkpointStore" | "conversationRegistry"> {
  if (env.CHECKPOINT_BACKEND === "postgres") {
    const db = getDb();
    return {
      checkpointStore: new DrizzleCheckpointStoreAdapter(
        db,
        env.AGENT_MAX_STEPS
      ),
      conversationRegistry: new DrizzleConversationRegistryAdapter(db),
    };
  }
  return {
    checkpointStore: new MemoryCheckpointStoreAdapter(env.AGENT_MAX_STEPS),
    conversationRegistry: new MemoryConversationRegistryAdapter(),
  };
}

function createDocumentSearch(env: ServerEnv): DocumentSearchCapability {
  const store = new MemoryVectorStore(createEmbeddings(env));
  const seedPath = env.DOCUMENT_SEED_PATH;
  return new VectorStoreSearchAdapter(
    store,
    seedPath !== undefined ? { seed: () => loadDocumentSeed(seedPath) } : {}
  );
}

function createContainer(): Container {
  const env = serverEnv();
  const log = makeLogger({ service: env.SERVICE_NAME });

  // Startup log - confirm config (no URLs/secrets)
  log.info(
    {
      env: env.APP_ENV,
      llmProvider: env.LLM_PROVIDER,
      checkpointBackend: env.CHECKPOINT_BACKEND,
      maxSteps: env.AGENT_MAX_STEPS,
      logLevel: env.PINO_LOG_LEVEL,
    },
    "container initialized"
  );

  // Environment-based adapter wiring - single source of truth
  const gateway: ModelGateway = env.isTestMode
    ? new FakeModelGatewayAdapter()
    : new ChatModelGateway(createChatModel(env), {
        systemPrompt: QA_SYSTEM_PROMPT,
      });

  const sql: SqlCapability = env.isTestMode
    ? new FakeSqlAdapter({ sampleRows: env.SQL_SAMPLE_ROWS })
    : new PostgresSqlAdapter(getSqlClient(), {
        sampleRows: env.SQL_SAMPLE_ROWS,
      });

  const documents: DocumentSearchCapability = env.isTestMode
    ? new FakeDocumentSearchAdapter()
    : createDocumentSearch(env);

  // Tool registry: static name → runtime mapping, resolved once
  const toolSource = createStaticToolSource(
    createToolCatalog({ sql, documents, retrievalTopK: env.RETRIEVAL_TOP_K })
  );

  return {
    log,
    env,
    gateway,
    ...createPersistence(env),
    sql,
    documents,
    toolSource,
    toolPolicy: READ_ONLY_POLICY,
    lock: new KeyedLock(),
  };
}

/**
 * Resolves dependencies for the answer feature.
 */
export function resolveAnswerDeps(): AnswerDeps {
  const container = getContainer();
  return {
    log: container.log,
    gateway: container.gateway,
    checkpointStore: container.checkpointStore,
    conversationRegistry: container.conversationRegistry,
    toolSource: container.toolSource,
    toolPolicy: container.toolPolicy,
    lock: container.lock,
    maxSteps: container.env.AGENT_MAX_STEPS,
    decorateCheckpointStore: (store, log, reqId) =>
      new ObservabilityCheckpointStoreDecorator(store, log, reqId),
  };
}

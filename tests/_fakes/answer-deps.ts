// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/answer-deps`
 * Purpose: Builds AnswerDeps over in-memory adapters and the real tool catalog.
 * Scope: Test wiring only; mirrors the container's test-mode composition.
 * Invariants: every dependency is in-process; overrides replace single members.
 * Side-effects: none
 * @internal
 */

import {
  createStaticToolSource,
  KeyedLock,
  type ModelGateway,
  READ_ONLY_POLICY,
} from "@askdb/ai-core";
import { createToolCatalog } from "@askdb/ai-tools";

import {
  MemoryCheckpointStoreAdapter,
  MemoryConversationRegistryAdapter,
} from "@/adapters/server";
import { FakeDocumentSearchAdapter, FakeSqlAdapter } from "@/adapters/test";
import type { AnswerDeps } from "@/features/ai/public.server";
import { makeNoopLogger } from "@/shared/observability";

export interface TestAnswerWorld {
  readonly deps: AnswerDeps;
  readonly sql: FakeSqlAdapter;
  readonly documents: FakeDocumentSearchAdapter;
  readonly checkpointStore: MemoryCheckpointStoreAdapter;
  readonly conversationRegistry: MemoryConversationRegistryAdapter;
}

export interface TestAnswerWorldOptions {
  readonly gateway: ModelGateway;
  readonly sql?: FakeSqlAdapter;
  readonly documents?: FakeDocumentSearchAdapter;
  readonly maxSteps?: number;
  readonly overrides?: Partial<AnswerDeps>;
}

export function makeTestAnswerWorld(
  options: TestAnswerWorldOptions
): TestAnswerWorld {
  const sql = options.sql ?? new FakeSqlAdapter();
  const documents = options.documents ?? new FakeDocumentSearchAdapter();
  const maxSteps = options.maxSteps ?? 10;
  const checkpointStore = new MemoryCheckpointStoreAdapter(maxSteps);
  const conversationRegistry = new MemoryConversationRegistryAdapter();

  const deps: AnswerDeps = {
    log: makeNoopLogger(),
    gateway: options.gateway,
    checkpointStore,
    conversationRegistry,
    toolSource: createStaticToolSource(createToolCatalog({ sql, documents })),
    toolPolicy: READ_ONLY_POLICY,
    lock: new KeyedLock(),
    maxSteps,
    ...options.overrides,
  };

  return { deps, sql, documents, checkpointStore, conversationRegistry };
}

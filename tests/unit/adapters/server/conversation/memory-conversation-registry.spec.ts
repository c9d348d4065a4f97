// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/adapters/server/conversation/memory-conversation-registry.spec`
 * Purpose: Verifies conversation bookkeeping in memory.
 * Scope: MemoryConversationRegistryAdapter. Does NOT cover the Postgres registry.
 * Invariants: First registration wins.
 * Side-effects: none
 * Links: src/adapters/server/conversation/memory-conversation-registry.adapter.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import { MemoryConversationRegistryAdapter } from "@/adapters/server";

function steppingClock(): () => Date {
  let tick = 0;
  return () => new Date(Date.UTC(2025, 0, 1, 0, 0, tick++));
}

describe("MemoryConversationRegistryAdapter", () => {
  it("keeps the first registration", async () => {
    const registry = new MemoryConversationRegistryAdapter(steppingClock());

    await registry.register("conv-1", "user-1");
    await registry.register("conv-1", "user-2");

    expect(registry.recordOf("conv-1")).toEqual({
      conversationId: "conv-1",
      userId: "user-1",
      createdAt: new Date(Date.UTC(2025, 0, 1, 0, 0, 0)),
    });
  });

  it("records anonymous conversations with a null user", async () => {
    const registry = new MemoryConversationRegistryAdapter(steppingClock());

    await registry.register("conv-1");

    expect(registry.recordOf("conv-1")?.userId).toBeNull();
  });

  it("has no record for an unknown conversation", async () => {
    const registry = new MemoryConversationRegistryAdapter();

    await registry.register("conv-1");

    expect(registry.recordOf("missing")).toBeUndefined();
  });

  it("returns copies of stored records", async () => {
    const registry = new MemoryConversationRegistryAdapter(steppingClock());

    await registry.register("conv-1", "user-1");
    const copy = registry.recordOf("conv-1");
    if (copy) copy.userId = "someone-else";

    expect(registry.recordOf("conv-1")?.userId).toBe("user-1");
  });
});

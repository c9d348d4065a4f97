// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/public-api.spec`
 * Purpose: Verifies the package entry answers through the container-bound test wiring.
 * Scope: answer(), streamAnswer(), getConversationHistory() from src/index. Does NOT test adapters directly.
 * Invariants: APP_ENV=test so the fake model gateway answers deterministically.
 * Side-effects: process.env (restored after each test)
 * Links: src/index.ts, src/adapters/test/ai/fake-model-gateway.adapter.ts
 * @internal
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const ORIGINAL_ENV = { ...process.env };

describe("public API", () => {
  beforeEach(() => {
    vi.resetModules();
    process.env = { ...ORIGINAL_ENV, NODE_ENV: "test", APP_ENV: "test" };
  });

  afterEach(async () => {
    const { resetContainer } = await import("@/bootstrap/container");
    const { resetServerEnv } = await import("@/shared/env");
    resetContainer();
    resetServerEnv();
    process.env = { ...ORIGINAL_ENV };
  });

  it("answers a question", async () => {
    const { answer } = await import("@/index");

    await expect(answer("conv-1", "What is up?")).resolves.toBe(
      "[FAKE_ANSWER] What is up?"
    );
  });

  it("streams word deltas and the complete message", async () => {
    const { streamAnswer } = await import("@/index");

    const events = [];
    for await (const event of streamAnswer("conv-1", "What is up?")) {
      events.push(event);
    }

    expect(events).toEqual([
      { type: "agent_message_delta", delta: "[FAKE_ANSWER]" },
      { type: "agent_message_delta", delta: " What" },
      { type: "agent_message_delta", delta: " is" },
      { type: "agent_message_delta", delta: " up?" },
      {
        type: "agent_message_complete",
        content: "[FAKE_ANSWER] What is up?",
      },
    ]);
  });

  it("keeps the conversation history between calls", async () => {
    const { answer, getConversationHistory } = await import("@/index");

    await answer(null, "Hello");

    await expect(getConversationHistory()).resolves.toEqual([
      { role: "human", content: "Hello" },
      { role: "assistant", content: "[FAKE_ANSWER] Hello", toolCalls: [] },
    ]);
  });
});

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/test/ai/fake-model-gateway.adapter`
 * Purpose: Deterministic fake ModelGateway for CI and test environments.
 * Scope: Implements ModelGateway with a fixed answer derived from the last question. Does not make external calls.
 * Invariants: Never requests tools; streams the answer word by word before returning it.
 * Side-effects: none
 * Notes: Used when APP_ENV=test.
 * Links: Implements ModelGateway port
 * @internal
 */

import {
  type AssistantMessage,
  assistantMessage,
  type Message,
  type ModelGateway,
  type ModelGenerateOptions,
  type ToolSpec,
} from "@askdb/ai-core";

export const FAKE_ANSWER_PREFIX = "[FAKE_ANSWER]";

export class FakeModelGatewayAdapter implements ModelGateway {
  async generate(
    messages: readonly Message[],
    _tools: readonly ToolSpec[],
    options?: ModelGenerateOptions
  ): Promise<AssistantMessage> {
    const question =
      [...messages].reverse().find((m) => m.role === "human")?.content ?? "";
    const content = `${FAKE_ANSWER_PREFIX} ${question}`.trim();

    const words = content.split(" ");
    words.forEach((word, i) => {
      options?.onDelta?.(i === 0 ? word : ` ${word}`);
    });

    return assistantMessage(content);
  }
}

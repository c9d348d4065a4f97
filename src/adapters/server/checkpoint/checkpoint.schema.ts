// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/checkpoint/checkpoint.schema`
 * Purpose: Zod schema for persisted conversation messages.
 * Scope: Validates JSONB read back from storage. Does not perform IO.
 * Invariants: Parsed output is structurally a Message[]; unknown roles are rejected.
 * Side-effects: none
 * @internal
 */

import type { Message } from "@askdb/ai-core";
import { z } from "zod";

const toolCallSchema = z.object({
  id: z.string(),
  name: z.string(),
  arguments: z.record(z.unknown()),
});

export const messageSchema = z.discriminatedUnion("role", [
  z.object({ role: z.literal("human"), content: z.string() }),
  z.object({
    role: z.literal("assistant"),
    content: z.string(),
    toolCalls: z.array(toolCallSchema),
  }),
  z.object({
    role: z.literal("tool"),
    content: z.string(),
    toolCallId: z.string(),
    toolName: z.string(),
  }),
]);

export const messagesSchema = z.array(messageSchema);

export function parseMessages(raw: unknown): Message[] {
  return messagesSchema.parse(raw);
}

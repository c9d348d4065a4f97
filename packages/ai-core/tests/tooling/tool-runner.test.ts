// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@askdb/ai-core/tests/tooling/tool-runner.test`
 * Purpose: Verifies the tool runner pipeline maps every failure stage to a ToolResult.
 * Scope: createToolRunner, toolResultContent, policies and the static source. Uses hand-built bound tools.
 * Invariants:
 *   - TOOLRUNNER_PIPELINE_ORDER: lookup → policy → validateInput → checkInput → exec → validateOutput → format
 *   - NEVER_THROWS: every failure surfaces as a result
 * Side-effects: none
 * Links: src/tooling/tool-runner.ts, src/tooling/sources/static.source.ts
 * @internal
 */

import { describe, expect, it, vi } from "vitest";

import {
  type BoundToolRuntime,
  createStaticToolSource,
  createToolAllowlistPolicy,
  createToolRunner,
  DENY_ALL_POLICY,
  READ_ONLY_POLICY,
  type ToolEffect,
  type ToolExecRecord,
  toolResultContent,
} from "../../src";

// ─────────────────────────────────────────────────────────────────────────────
// Fixtures
// ─────────────────────────────────────────────────────────────────────────────

interface EchoToolOverrides {
  name?: string;
  effect?: ToolEffect;
  exec?: BoundToolRuntime["exec"];
  checkInput?: BoundToolRuntime["checkInput"];
  validateOutput?: BoundToolRuntime["validateOutput"];
}

function echoTool(overrides: EchoToolOverrides = {}): BoundToolRuntime {
  return {
    spec: {
      name: overrides.name ?? "echo",
      description: "Echo the text argument",
      inputSchema: {
        type: "object",
        properties: { text: { type: "string" } },
        required: ["text"],
      },
      effect: overrides.effect ?? "read_only",
    },
    validateInput(rawArgs) {
      if (
        typeof rawArgs === "object" &&
        rawArgs !== null &&
        "text" in rawArgs &&
        typeof rawArgs.text === "string"
      ) {
        return rawArgs.text;
      }
      throw new Error("text: Required");
    },
    checkInput: overrides.checkInput ?? (() => null),
    exec: overrides.exec ?? (async (text) => text),
    validateOutput: overrides.validateOutput ?? ((raw) => raw),
    format: (value) => `echo: ${String(value)}`,
  };
}

const call = (name: string, args: Record<string, unknown>) => ({
  id: "call_1",
  name,
  arguments: args,
});

// ─────────────────────────────────────────────────────────────────────────────
// Pipeline
// ─────────────────────────────────────────────────────────────────────────────

describe("createToolRunner", () => {
  it("formats a successful call", async () => {
    const runner = createToolRunner(createStaticToolSource([echoTool()]), {
      policy: READ_ONLY_POLICY,
    });

    const outcome = await runner.exec(call("echo", { text: "hello" }));

    expect(outcome.result).toEqual({ ok: true, value: "echo: hello" });
    expect(outcome.content).toBe("echo: hello");
  });

  it("names the valid tools when the requested one is unknown", async () => {
    const source = createStaticToolSource([
      echoTool(),
      echoTool({ name: "shout" }),
    ]);
    const runner = createToolRunner(source, { policy: READ_ONLY_POLICY });

    const outcome = await runner.exec(call("whisper", {}));

    expect(outcome.result).toEqual({
      ok: false,
      errorCode: "unknown_tool",
      safeMessage: "whisper is not a valid tool, try one of [echo, shout].",
    });
    expect(outcome.content).toBe(
      "Error: whisper is not a valid tool, try one of [echo, shout]."
    );
  });

  it("denies everything when no policy is given", async () => {
    const exec = vi.fn(async () => "never");
    const runner = createToolRunner(createStaticToolSource([echoTool({ exec })]));

    const outcome = await runner.exec(call("echo", { text: "x" }));

    expect(outcome.content).toBe(
      "Error: Tool 'echo' is not allowed by current policy"
    );
    expect(exec).not.toHaveBeenCalled();
  });

  it("denies tools with side effects under the read-only policy", async () => {
    const runner = createToolRunner(
      createStaticToolSource([echoTool({ effect: "state_change" })]),
      { policy: READ_ONLY_POLICY }
    );

    const outcome = await runner.exec(call("echo", { text: "x" }));

    expect(outcome.result.ok).toBe(false);
    expect(outcome.result).toMatchObject({ errorCode: "policy_denied" });
  });

  it("reports invalid arguments with a fix hint", async () => {
    const runner = createToolRunner(createStaticToolSource([echoTool()]), {
      policy: READ_ONLY_POLICY,
    });

    const outcome = await runner.exec(call("echo", { text: 7 }));

    expect(outcome.content).toBe(
      "Error: text: Required\nPlease fix your mistakes."
    );
  });

  it("stops at the content check and never executes", async () => {
    const exec = vi.fn(async () => "never");
    const runner = createToolRunner(
      createStaticToolSource([
        echoTool({ exec, checkInput: () => "Only greetings are allowed" }),
      ]),
      { policy: READ_ONLY_POLICY }
    );

    const outcome = await runner.exec(call("echo", { text: "bye" }));

    expect(outcome.result).toEqual({
      ok: false,
      errorCode: "policy_denied",
      safeMessage: "Only greetings are allowed",
    });
    expect(outcome.content).toBe("Error: Only greetings are allowed");
    expect(exec).not.toHaveBeenCalled();
  });

  it("turns a throwing tool into an execution_failed result", async () => {
    const runner = createToolRunner(
      createStaticToolSource([
        echoTool({
          exec: async () => {
            throw new Error('relation "nope" does not exist');
          },
        }),
      ]),
      { policy: READ_ONLY_POLICY }
    );

    const outcome = await runner.exec(call("echo", { text: "x" }));

    expect(outcome.content).toBe(
      'Error: relation "nope" does not exist\nPlease fix your mistakes.'
    );
  });

  it("reports broken output without the fix hint", async () => {
    const runner = createToolRunner(
      createStaticToolSource([
        echoTool({
          validateOutput: () => {
            throw new Error("expected a string");
          },
        }),
      ]),
      { policy: READ_ONLY_POLICY }
    );

    const outcome = await runner.exec(call("echo", { text: "x" }));

    expect(outcome.result).toMatchObject({ errorCode: "invalid_output" });
    expect(outcome.content).toBe("Error: expected a string");
  });

  it("passes the call id and signal to the tool", async () => {
    const exec = vi.fn(async (text: unknown) => text);
    const runner = createToolRunner(createStaticToolSource([echoTool({ exec })]), {
      policy: READ_ONLY_POLICY,
    });
    const controller = new AbortController();

    await runner.exec(call("echo", { text: "x" }), {
      signal: controller.signal,
    });

    expect(exec).toHaveBeenCalledWith("x", {
      toolCallId: "call_1",
      signal: controller.signal,
    });
  });

  it("reports every call to onExec", async () => {
    const records: ToolExecRecord[] = [];
    const runner = createToolRunner(createStaticToolSource([echoTool()]), {
      policy: createToolAllowlistPolicy(["echo"]),
      onExec: (record) => records.push(record),
    });

    await runner.exec(call("echo", { text: "x" }));
    await runner.exec(call("missing", {}));

    expect(records).toHaveLength(2);
    expect(records[0]).toMatchObject({
      toolCallId: "call_1",
      toolName: "echo",
      ok: true,
    });
    expect(records[0]).not.toHaveProperty("errorCode");
    expect(records[1]).toMatchObject({
      toolName: "missing",
      ok: false,
      errorCode: "unknown_tool",
    });
  });

  it("lists the specs of its source", () => {
    const runner = createToolRunner(createStaticToolSource([echoTool()]));
    expect(runner.listToolSpecs().map((s) => s.name)).toEqual(["echo"]);
  });
});

// ─────────────────────────────────────────────────────────────────────────────
// Policies, source, formatting
// ─────────────────────────────────────────────────────────────────────────────

describe("tool policies", () => {
  it("DENY_ALL_POLICY denies read-only tools", () => {
    expect(DENY_ALL_POLICY.decide("echo", "read_only")).toBe("deny");
  });

  it("the allowlist ignores effect", () => {
    const policy = createToolAllowlistPolicy(["echo"]);
    expect(policy.decide("echo", "external_side_effect")).toBe("allow");
    expect(policy.decide("shout", "read_only")).toBe("deny");
  });
});

describe("createStaticToolSource", () => {
  it("rejects duplicate names", () => {
    expect(() => createStaticToolSource([echoTool(), echoTool()])).toThrow(
      'TOOL_NAME_UNIQUE violation: Duplicate tool name "echo". Tool names must be unique within a source.'
    );
  });

  it("returns undefined for unknown names", () => {
    const source = createStaticToolSource([echoTool()]);
    expect(source.getBoundTool("shout")).toBeUndefined();
    expect(source.getToolNames()).toEqual(["echo"]);
  });
});

describe("toolResultContent", () => {
  it("adds the fix hint only to input and execution failures", () => {
    expect(
      toolResultContent({
        ok: false,
        errorCode: "execution_failed",
        safeMessage: "syntax error",
      })
    ).toBe("Error: syntax error\nPlease fix your mistakes.");
    expect(
      toolResultContent({
        ok: false,
        errorCode: "policy_denied",
        safeMessage: "read only",
      })
    ).toBe("Error: read only");
  });
});

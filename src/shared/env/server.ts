// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Server-side environment variable validation and type-safe configuration schema using Zod.
 * Scope: Validates process.env for the server runtime; provides lazy, cached env access. Does not read .env files.
 * Invariants: All env vars validated on first access; cross-field requirements reported as missing vars; fails fast on invalid env.
 * Side-effects: process.env
 * Notes: APP_ENV=test wires fakes in the container; LLM_PROVIDER selects OpenAI or Azure OpenAI.
 *        Lazy init keeps imports free of env access.
 * @public
 */

import { ZodError, z } from "zod";

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid server env: ${JSON.stringify(meta)}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

const serverSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),

  // Application environment (controls adapter wiring)
  APP_ENV: z.enum(["test", "production"]).default("production"),

  // Service identity for observability
  SERVICE_NAME: z.string().default("askdb"),
  PINO_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error"])
    .default("info"),

  // LLM provider
  LLM_PROVIDER: z.enum(["openai", "azure"]).default("openai"),
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  AZURE_OPENAI_API_KEY: z.string().min(1).optional(),
  AZURE_OPENAI_ENDPOINT: z.string().url().optional(),
  AZURE_OPENAI_API_VERSION: z.string().default("2024-08-01-preview"),
  AZURE_OPENAI_DEPLOYMENT: z.string().min(1).optional(),
  AZURE_OPENAI_EMBEDDING_DEPLOYMENT: z.string().min(1).optional(),
  DEFAULT_MODEL: z.string().default("gpt-4o-mini"),
  EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  MODEL_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),

  // Database queried by the SQL tools
  DATABASE_URL: z.string().url().optional(),

  // Conversation checkpoints
  CHECKPOINT_BACKEND: z.enum(["memory", "postgres"]).default("memory"),
  CHECKPOINT_DATABASE_URL: z.string().url().optional(),

  // Reasoning loop and tools
  AGENT_MAX_STEPS: z.coerce.number().int().positive().default(10),
  RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(5),
  SQL_SAMPLE_ROWS: z.coerce.number().int().min(0).default(3),
  DOCUMENT_SEED_PATH: z.string().min(1).optional(),
});

type ParsedServerEnv = z.infer<typeof serverSchema>;

type ServerEnv = ParsedServerEnv & {
  isDev: boolean;
  isTest: boolean;
  isProd: boolean;
  isTestMode: boolean;
};

/**
 * Variables required by the combination of other variables.
 * Test mode wires fakes, so provider keys and database URLs are only demanded in production mode.
 */
function missingCrossFieldVars(parsed: ParsedServerEnv): string[] {
  const missing: string[] = [];
  const isTestMode = parsed.APP_ENV === "test";

  if (parsed.LLM_PROVIDER === "azure") {
    if (!parsed.AZURE_OPENAI_API_KEY) missing.push("AZURE_OPENAI_API_KEY");
    if (!parsed.AZURE_OPENAI_ENDPOINT) missing.push("AZURE_OPENAI_ENDPOINT");
    if (!parsed.AZURE_OPENAI_DEPLOYMENT) missing.push("AZURE_OPENAI_DEPLOYMENT");
  } else if (!isTestMode && !parsed.OPENAI_API_KEY) {
    missing.push("OPENAI_API_KEY");
  }

  if (!isTestMode && !parsed.DATABASE_URL) {
    missing.push("DATABASE_URL");
  }

  if (
    parsed.CHECKPOINT_BACKEND === "postgres" &&
    !parsed.CHECKPOINT_DATABASE_URL &&
    !parsed.DATABASE_URL
  ) {
    missing.push("CHECKPOINT_DATABASE_URL");
  }

  return missing;
}

let ENV: ServerEnv | null = null;

export function serverEnv(): ServerEnv {
  if (ENV === null) {
    try {
      const parsed = serverSchema.parse(process.env);

      const missing = missingCrossFieldVars(parsed);
      if (missing.length > 0) {
        throw new EnvValidationError({
          code: "INVALID_ENV",
          missing,
          invalid: [],
        });
      }

      ENV = {
        ...parsed,
        isDev: parsed.NODE_ENV === "development",
        isTest: parsed.NODE_ENV === "test",
        isProd: parsed.NODE_ENV === "production",
        isTestMode: parsed.APP_ENV === "test",
      };
    } catch (error) {
      if (error instanceof ZodError) {
        const missing = new Set<string>();
        const invalid = new Set<string>();

        for (const issue of error.issues) {
          const key = issue.path[0]?.toString();
          if (!key) continue;

          // Treat all invalid_type as missing (avoids any casting)
          if (issue.code === "invalid_type") {
            missing.add(key);
          } else {
            invalid.add(key);
          }
        }

        throw new EnvValidationError({
          code: "INVALID_ENV",
          missing: [...missing],
          invalid: [...invalid],
        });
      }

      throw error;
    }
  }
  return ENV;
}

/**
 * Drop the cached env so the next serverEnv() re-reads process.env.
 * For tests only.
 */
export function resetServerEnv(): void {
  ENV = null;
}

/** Resolved connection string for checkpoint persistence, if any */
export function checkpointDatabaseUrl(env: ServerEnv): string | undefined {
  return env.CHECKPOINT_DATABASE_URL ?? env.DATABASE_URL;
}

export type { ServerEnv };

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/ai/chat-model.factory`
 * Purpose: Construct the provider chat model and embeddings from server env.
 * Scope: OpenAI and Azure OpenAI via @langchain/openai. Does not call the provider.
 * Invariants:
 *   - PROVIDER_FROM_ENV: LLM_PROVIDER selects the client; env validation already guarantees its credentials
 *   - NO_SDK_RETRIES: maxRetries 0, retry policy belongs to callers
 * Side-effects: none
 * @internal
 */

import type { EmbeddingsInterface } from "@langchain/core/embeddings";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import {
  AzureChatOpenAI,
  AzureOpenAIEmbeddings,
  ChatOpenAI,
  OpenAIEmbeddings,
} from "@langchain/openai";

import type { ServerEnv } from "@/shared/env";

export function createChatModel(env: ServerEnv): BaseChatModel {
  if (env.LLM_PROVIDER === "azure") {
    return new AzureChatOpenAI({
      azureOpenAIApiKey: env.AZURE_OPENAI_API_KEY,
      azureOpenAIEndpoint: env.AZURE_OPENAI_ENDPOINT,
      azureOpenAIApiDeploymentName: env.AZURE_OPENAI_DEPLOYMENT,
      azureOpenAIApiVersion: env.AZURE_OPENAI_API_VERSION,
      temperature: env.MODEL_TEMPERATURE,
      maxRetries: 0,
    });
  }

  return new ChatOpenAI({
    model: env.DEFAULT_MODEL,
    apiKey: env.OPENAI_API_KEY,
    temperature: env.MODEL_TEMPERATURE,
    maxRetries: 0,
    ...(env.OPENAI_BASE_URL !== undefined && {
      configuration: { baseURL: env.OPENAI_BASE_URL },
    }),
  });
}

export function createEmbeddings(env: ServerEnv): EmbeddingsInterface {
  if (env.LLM_PROVIDER === "azure") {
    return new AzureOpenAIEmbeddings({
      azureOpenAIApiKey: env.AZURE_OPENAI_API_KEY,
      azureOpenAIEndpoint: env.AZURE_OPENAI_ENDPOINT,
      azureOpenAIApiDeploymentName:
        env.AZURE_OPENAI_EMBEDDING_DEPLOYMENT ?? env.EMBEDDING_MODEL,
      azureOpenAIApiVersion: env.AZURE_OPENAI_API_VERSION,
      maxRetries: 0,
    });
  }

  return new OpenAIEmbeddings({
    model: env.EMBEDDING_MODEL,
    apiKey: env.OPENAI_API_KEY,
    maxRetries: 0,
    ...(env.OPENAI_BASE_URL !== undefined && {
      configuration: { baseURL: env.OPENAI_BASE_URL },
    }),
  });
}

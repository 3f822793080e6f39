import { anthropic } from "@ai-sdk/anthropic";
import { openai } from "@ai-sdk/openai";
import { google } from "@ai-sdk/google";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import { createOllama } from "ollama-ai-provider-v2";
import type { LanguageModel } from "ai";
import type { ProviderName } from "../config";

const ollama = createOllama({
  baseURL: process.env["OLLAMA_BASE_URL"] ?? "http://localhost:11434/api",
});

const lmstudio = createOpenAICompatible({
  name: "lmstudio",
  baseURL: process.env["LMSTUDIO_BASE_URL"] ?? "http://localhost:1234/v1",
});

/**
 * Environment variable each hosted provider reads its API key from.
 * Local providers (ollama, lmstudio) need none.
 */
export const providerApiKeyEnv: Readonly<Record<ProviderName, string | null>> = {
  anthropic: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY",
  gemini: "GOOGLE_GENERATIVE_AI_API_KEY",
  ollama: null,
  lmstudio: null,
};

export function getModel(provider: ProviderName, modelId: string): LanguageModel {
  switch (provider) {
    case "anthropic":
      return anthropic(modelId);
    case "openai":
      return openai(modelId);
    case "gemini":
      return google(modelId);
    case "ollama":
      return ollama(modelId);
    case "lmstudio":
      return lmstudio(modelId);
    default: {
      const _exhaustive: never = provider;
      throw new Error(`unknown provider: ${String(_exhaustive)}`);
    }
  }
}

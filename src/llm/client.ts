// pattern: Imperative Shell
import { generateText } from "ai";
import type { LanguageModel } from "ai";
import type { AppConfig } from "../config";
import type { SummarizeFn } from "../pipeline/types";
import { buildUserMessage, RELEASE_SUMMARY_SYSTEM_PROMPT } from "./prompt";
import { getModel } from "./providers";
import { errorMessage } from "../errors";

export function createLlmClient(config: AppConfig): LanguageModel {
  return getModel(config.llm.provider, config.llm.model);
}

/**
 * OpenAI's gpt-5 family are reasoning models that only accept the default
 * temperature.
 */
export function supportsTemperature(config: AppConfig["llm"]): boolean {
  return !(config.provider === "openai" && config.model.startsWith("gpt-5"));
}

/**
 * Binds a language model to the release-summary prompt.
 * The returned function rejects with `LLM summarization failed: …` on any error,
 * including its own timeout.
 */
export function createReleaseSummarizer(
  model: LanguageModel,
  llmConfig: AppConfig["llm"],
): SummarizeFn {
  const temperature = supportsTemperature(llmConfig)
    ? llmConfig.temperature
    : undefined;

  return async function summarize(
    repository: string,
    version: string,
    releaseNote: string,
  ): Promise<string> {
    try {
      const result = await generateText({
        model,
        system: RELEASE_SUMMARY_SYSTEM_PROMPT,
        prompt: buildUserMessage(repository, version, releaseNote),
        temperature,
        abortSignal: AbortSignal.timeout(llmConfig.timeoutMs),
      });

      return result.text;
    } catch (err) {
      const message = errorMessage(err);
      throw new Error(`LLM summarization failed: ${message}`);
    }
  };
}

import { describe, it, expect, beforeEach, vi } from "vitest";
import type { LanguageModel } from "ai";

vi.mock("ai", () => ({
  generateText: vi.fn(),
}));

import { generateText } from "ai";
import { createReleaseSummarizer, supportsTemperature } from "./client";
import { buildUserMessage, RELEASE_SUMMARY_SYSTEM_PROMPT } from "./prompt";
import { createTestConfig } from "../test-utils/fixtures";

describe("createReleaseSummarizer", () => {
  const mockModel = {} as LanguageModel;
  const llmConfig = createTestConfig().llm;

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should send the system prompt and the release as the user message", async () => {
    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    vi.mocked(generateText).mockResolvedValueOnce({ text: "• Added widgets" } as any);

    const summarize = createReleaseSummarizer(mockModel, llmConfig);
    const summary = await summarize("acme/widgets", "v2.0.0", "Added widgets");

    expect(summary).toBe("• Added widgets");
    expect(generateText).toHaveBeenCalledWith({
      model: mockModel,
      system: RELEASE_SUMMARY_SYSTEM_PROMPT,
      prompt: buildUserMessage("acme/widgets", "v2.0.0", "Added widgets"),
      temperature: 0.3,
      abortSignal: expect.any(AbortSignal),
    });
  });

  it("should leave temperature unset for gpt-5 models", async () => {
    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    vi.mocked(generateText).mockResolvedValueOnce({ text: "ok" } as any);

    const summarize = createReleaseSummarizer(mockModel, {
      ...llmConfig,
      model: "gpt-5-mini",
    });
    await summarize("a/b", "v1", "notes");

    expect(vi.mocked(generateText).mock.calls[0]?.[0]).toMatchObject({
      temperature: undefined,
    });
  });

  it("should wrap model failures", async () => {
    vi.mocked(generateText).mockRejectedValueOnce(new Error("429 Too Many Requests"));

    const summarize = createReleaseSummarizer(mockModel, llmConfig);

    await expect(summarize("a/b", "v1", "notes")).rejects.toThrow(
      "LLM summarization failed: 429 Too Many Requests",
    );
  });
});

describe("supportsTemperature", () => {
  const llmConfig = createTestConfig().llm;

  it("should be false only for OpenAI gpt-5 models", () => {
    expect(supportsTemperature({ ...llmConfig, provider: "openai", model: "gpt-5" })).toBe(false);
    expect(supportsTemperature({ ...llmConfig, provider: "openai", model: "gpt-4o" })).toBe(true);
    expect(supportsTemperature({ ...llmConfig, provider: "ollama", model: "gpt-5-oss" })).toBe(true);
  });
});

describe("buildUserMessage", () => {
  it("should lay out repository, version and notes", () => {
    expect(buildUserMessage("a/b", "v1.0.0", "- fixed a bug")).toBe(
      "Repository: a/b\nVersion: v1.0.0\n\nRelease notes:\n- fixed a bug\n\nSummarize the release notes above.",
    );
  });

  it("should say so when the notes are empty", () => {
    expect(buildUserMessage("a/b", "v1", "  ")).toContain(
      "Release notes:\n(no release notes provided)\n",
    );
  });
});

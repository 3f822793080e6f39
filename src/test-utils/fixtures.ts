import { vi } from "vitest";
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import type { ReleasePair } from "../github/types";
import type { ReleaseRecord } from "../pipeline/types";

/**
 * Creates a default AppConfig suitable for testing.
 */
export function createTestConfig(overrides?: Partial<AppConfig>): AppConfig {
  return {
    llm: {
      provider: "openai",
      model: "gpt-4o-mini",
      temperature: 0.3,
      timeoutMs: 60000,
    },
    github: {
      apiBaseUrl: "https://api.github.com",
      perPage: 100,
      timeoutMs: 30000,
      maxConcurrency: 5,
    },
    slack: { timeoutMs: 10000 },
    summarization: { maxConcurrency: 10 },
    run: { sinceHours: 24, sampleMode: false },
    schedule: {},
    ...overrides,
  };
}

/**
 * Creates a mock Logger whose methods are vi.fn() spies.
 */
export function createMockLogger(): Logger {
  return {
    info: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    level: "info" as const,
    child: vi.fn(),
    isLevelEnabled: vi.fn(),
  } as unknown as Logger;
}

export function makeRecord(overrides?: Partial<ReleaseRecord>): ReleaseRecord {
  return {
    repositoryName: "acme/widgets",
    tagName: "v1.0.0",
    releaseBody: "Fixed things.",
    releaseUrl: "https://github.com/acme/widgets/releases/tag/v1.0.0",
    publishedAt: "2024-05-01T10:00:00Z",
    ...overrides,
  };
}

/**
 * Builds a notification+release pair the way the GitHub client returns them.
 */
export function makePair(
  repository: string,
  tag: string,
  publishedAt: string | null = null,
): ReleasePair {
  return {
    notification: {
      id: `${repository}@${tag}`,
      subject: {
        title: tag,
        type: "Release",
        url: `https://api.github.com/repos/${repository}/releases/${tag}`,
      },
      repository: { full_name: repository },
    },
    release: {
      tag_name: tag,
      body: `Notes for ${repository} ${tag}`,
      html_url: `https://github.com/${repository}/releases/tag/${tag}`,
      published_at: publishedAt,
    },
  };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// pattern: Imperative Shell
import pLimit from "p-limit";
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import {
  notificationListSchema,
  releaseSchema,
  type GitHubNotification,
  type GitHubRelease,
  type NotificationSource,
  type ReleasePair,
} from "./types";
import { errorMessage } from "../errors";

export type GitHubClientOptions = AppConfig["github"] & {
  readonly token: string;
};

/**
 * GitHub wants second precision: `2024-05-01T09:00:00Z`.
 */
export function formatSince(now: Date, sinceHours: number): string {
  const since = new Date(now.getTime() - sinceHours * 60 * 60 * 1000);
  return since.toISOString().replace(/\.\d{3}Z$/, "Z");
}

/**
 * Creates a notification source backed by the GitHub REST API.
 *
 * Listing notifications is the only call allowed to fail the run; release detail
 * lookups that fail are logged and the release is dropped.
 */
export function createGitHubClient(
  options: GitHubClientOptions,
  logger: Logger,
): NotificationSource {
  const headers = {
    Authorization: `token ${options.token}`,
    Accept: "application/vnd.github.v3+json",
    "User-Agent": "release-herald/1.0",
  };

  async function getJson(url: string): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(url, {
        headers,
        signal: AbortSignal.timeout(options.timeoutMs),
      });
    } catch (err) {
      throw new Error(`GitHub API request failed: ${errorMessage(err)}`);
    }

    if (!response.ok) {
      throw new Error(
        `GitHub API request failed: HTTP ${response.status}: ${response.statusText}`,
      );
    }

    try {
      return await response.json();
    } catch (err) {
      throw new Error(`GitHub API request failed: invalid JSON body: ${errorMessage(err)}`);
    }
  }

  async function listNotifications(
    sinceHours: number,
  ): Promise<ReadonlyArray<GitHubNotification>> {
    const params = new URLSearchParams({
      all: "true",
      since: formatSince(new Date(), sinceHours),
      per_page: String(options.perPage),
    });

    const body = await getJson(`${options.apiBaseUrl}/notifications?${params.toString()}`);

    const parsed = notificationListSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error("GitHub API returned an unexpected notifications payload");
    }

    return parsed.data;
  }

  async function fetchReleaseDetails(url: string): Promise<GitHubRelease | null> {
    try {
      const body = await getJson(url);
      const parsed = releaseSchema.safeParse(body);
      if (!parsed.success) {
        logger.warn({ url }, "release details payload not recognised, skipping");
        return null;
      }
      return parsed.data;
    } catch (err) {
      const message = errorMessage(err);
      logger.warn({ url, error: message }, "release details fetch failed, skipping");
      return null;
    }
  }

  async function filterToReleasePairs(
    notifications: ReadonlyArray<GitHubNotification>,
  ): Promise<ReadonlyArray<ReleasePair>> {
    const limit = pLimit(options.maxConcurrency);

    const candidates = notifications.flatMap((notification) => {
      const subject = notification.subject;
      if (subject?.type !== "Release" || !subject.url) return [];
      return [{ notification, url: subject.url }];
    });

    const lookups = await Promise.all(
      candidates.map(({ notification, url }) =>
        limit(async (): Promise<ReleasePair | null> => {
          const release = await fetchReleaseDetails(url);
          return release ? { notification, release } : null;
        }),
      ),
    );

    return lookups.filter((pair): pair is ReleasePair => pair !== null);
  }

  return { listNotifications, fetchReleaseDetails, filterToReleasePairs };
}

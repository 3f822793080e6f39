// pattern: Functional Core
import type { ReleasePair } from "../github/types";
import type { ReleaseRecord } from "./types";

/**
 * Normalizes a notification+release pair into a release record.
 * Missing or null fields become defaults; this never throws.
 */
export function extractReleaseRecord(pair: ReleasePair): ReleaseRecord {
  const { notification, release } = pair;

  return {
    repositoryName: notification.repository?.full_name ?? "Unknown",
    tagName: release.tag_name ?? "Unknown",
    releaseBody: release.body ?? "",
    releaseUrl: release.html_url ?? "",
    publishedAt: release.published_at ?? null,
  };
}

/**
 * Prefix shared by every per-release error string.
 */
export function describeRecord(record: ReleaseRecord): string {
  return `${record.repositoryName} ${record.tagName}`;
}

import { z } from "zod";

// GitHub payloads are only partially trusted: every field the pipeline reads is
// optional here, and extraction substitutes defaults.

export const notificationSchema = z
  .object({
    id: z.string().optional(),
    reason: z.string().optional(),
    updated_at: z.string().optional(),
    subject: z
      .object({
        title: z.string().nullish(),
        type: z.string().nullish(),
        url: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
    repository: z
      .object({
        full_name: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export const notificationListSchema = z.array(notificationSchema);

export const releaseSchema = z
  .object({
    tag_name: z.string().nullish(),
    name: z.string().nullish(),
    body: z.string().nullish(),
    html_url: z.string().nullish(),
    published_at: z.string().nullish(),
  })
  .passthrough();

export type GitHubNotification = z.infer<typeof notificationSchema>;
export type GitHubRelease = z.infer<typeof releaseSchema>;

/**
 * A release notification joined with the release it points at.
 */
export type ReleasePair = Readonly<{
  notification: GitHubNotification;
  release: GitHubRelease;
}>;

/**
 * Where raw notifications and release details come from.
 * `filterToReleasePairs` drops releases whose details cannot be fetched.
 */
export type NotificationSource = {
  readonly listNotifications: (
    sinceHours: number,
  ) => Promise<ReadonlyArray<GitHubNotification>>;
  readonly fetchReleaseDetails: (url: string) => Promise<GitHubRelease | null>;
  readonly filterToReleasePairs: (
    notifications: ReadonlyArray<GitHubNotification>,
  ) => Promise<ReadonlyArray<ReleasePair>>;
};

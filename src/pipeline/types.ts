export type ReleaseRecord = Readonly<{
  repositoryName: string;
  tagName: string;
  releaseBody: string;
  releaseUrl: string;
  publishedAt: string | null;
}>;

/**
 * Result of summarizing one record: a summary or an error, never both.
 */
export type SummarizationOutcome =
  | Readonly<{ record: ReleaseRecord; summary: string; error: null }>
  | Readonly<{ record: ReleaseRecord; summary: null; error: string }>;

export type DeliveryResult = Readonly<{
  sent: number;
  errors: ReadonlyArray<string>;
}>;

export type RunReport = Readonly<{
  notificationsTotal: number;
  releaseNotifications: number;
  sent: number;
  errors: ReadonlyArray<string> | null;
}>;

/**
 * Turns release notes into a summary. May reject with any detail.
 */
export type SummarizeFn = (
  repository: string,
  version: string,
  releaseNote: string,
) => Promise<string>;

/**
 * Posts one summary to the channel. Resolves `true` when the channel accepted it;
 * may reject with any detail.
 */
export type DeliverFn = (
  repository: string,
  version: string,
  summary: string,
  releaseUrl: string,
  publishedAt: string | null,
) => Promise<boolean>;

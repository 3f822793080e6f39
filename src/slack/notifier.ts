// pattern: Imperative Shell
import type { Logger } from "pino";
import type { DeliverFn } from "../pipeline/types";
import { errorMessage } from "../errors";

export type SlackNotifierOptions = {
  readonly webhookUrl: string;
  readonly timeoutMs: number;
};

/**
 * Plain-text release announcement. The release date line is only present when
 * the release carries a publish timestamp.
 */
export function formatReleaseMessage(
  repository: string,
  version: string,
  summary: string,
  releaseUrl: string,
  publishedAt: string | null,
): string {
  const lines = [
    `🆕 ${repository} ${version} has been released!`,
    "",
    `Repository: ${repository}`,
    `Version: ${version}`,
  ];

  if (publishedAt) {
    lines.push(`Released: ${publishedAt.slice(0, 10)}`);
  }

  lines.push(
    "",
    "📝 Highlights:",
    summary,
    "",
    `Release notes: ${releaseUrl}`,
    "-",
  );

  return lines.join("\n");
}

/**
 * Creates a delivery function that posts to a Slack incoming webhook.
 *
 * Resolves `true` only when Slack answers 2xx with the body `ok`. Transport
 * failures and non-2xx responses reject with `Slack notification failed: …`.
 */
export function createSlackNotifier(options: SlackNotifierOptions): DeliverFn {
  return async function deliver(
    repository,
    version,
    summary,
    releaseUrl,
    publishedAt,
  ): Promise<boolean> {
    const text = formatReleaseMessage(
      repository,
      version,
      summary,
      releaseUrl,
      publishedAt,
    );

    let response: Response;
    try {
      response = await fetch(options.webhookUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ text }),
        signal: AbortSignal.timeout(options.timeoutMs),
      });
    } catch (err) {
      const message = errorMessage(err);
      throw new Error(`Slack notification failed: ${message}`);
    }

    if (!response.ok) {
      throw new Error(
        `Slack notification failed: HTTP ${response.status}: ${response.statusText}`,
      );
    }

    const body = await response.text();
    return body === "ok";
  };
}

/**
 * Logs the message that would have been posted and reports it as accepted.
 */
export function createDryRunNotifier(logger: Logger): DeliverFn {
  return async function deliver(
    repository,
    version,
    summary,
    releaseUrl,
    publishedAt,
  ): Promise<boolean> {
    const text = formatReleaseMessage(
      repository,
      version,
      summary,
      releaseUrl,
      publishedAt,
    );
    logger.info({ repository, tag: version, text }, "dry run, slack post skipped");
    return true;
  };
}

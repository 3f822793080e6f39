// pattern: Imperative Shell
import type { Logger } from "pino";
import type { NotificationSource, ReleasePair } from "../github/types";
import { deliverAll } from "./deliver-all";
import { describeRecord, extractReleaseRecord } from "./extract";
import { buildReport } from "./report";
import { DEFAULT_SUMMARIZATION_CONCURRENCY, summarizeAll } from "./summarize-all";
import type { DeliverFn, ReleaseRecord, RunReport, SummarizeFn } from "./types";

export type PipelineDeps = {
  readonly source: NotificationSource;
  readonly summarize: SummarizeFn;
  readonly deliver: DeliverFn;
  readonly logger: Logger;
};

export type PipelineOptions = {
  readonly sampleMode?: boolean;
  readonly sinceHours?: number;
  readonly concurrency?: number;
};

/**
 * Sample mode keeps the first pair only; otherwise the list is reversed so
 * delivery runs oldest first.
 */
export function orderForDelivery(
  pairs: ReadonlyArray<ReleasePair>,
  sampleMode: boolean,
): Array<ReleasePair> {
  return sampleMode ? pairs.slice(0, 1) : [...pairs].reverse();
}

/**
 * Returns the first record whose `publishedAt` is earlier than a preceding one,
 * ignoring records without a timestamp, or null when the list is chronological.
 */
export function findOutOfOrderRecord(
  records: ReadonlyArray<ReleaseRecord>,
): ReleaseRecord | null {
  let latest = Number.NEGATIVE_INFINITY;

  for (const record of records) {
    if (record.publishedAt === null) continue;
    const time = Date.parse(record.publishedAt);
    if (Number.isNaN(time)) continue;
    if (time < latest) return record;
    latest = time;
  }

  return null;
}

/**
 * Runs one notification cycle: list → filter to releases → order → summarize
 * concurrently → deliver sequentially → report.
 *
 * Precondition: the source returns release pairs newest first (GitHub's
 * notification order). Reversal is what puts deliveries in chronological order;
 * when the published timestamps contradict that, a warning is logged and the
 * order is left as is.
 *
 * Per-release failures end up in the report. Only a failure to list
 * notifications or filter them rejects.
 */
export async function runReleasePipeline(
  deps: PipelineDeps,
  options: PipelineOptions = {},
): Promise<RunReport> {
  const { source, summarize, deliver, logger } = deps;
  const sampleMode = options.sampleMode ?? false;
  const sinceHours = options.sinceHours ?? 24;

  logger.info({ sinceHours }, "fetching notifications");
  const notifications = await source.listNotifications(sinceHours);
  logger.info({ count: notifications.length }, "notifications fetched");

  const pairs = await source.filterToReleasePairs(notifications);
  logger.info({ count: pairs.length }, "release notifications found");

  if (pairs.length === 0) {
    return buildReport(notifications.length, 0, 0, []);
  }

  const ordered = orderForDelivery(pairs, sampleMode);
  if (sampleMode) {
    logger.info("sample mode: limiting to 1 release");
  } else {
    logger.info("processing releases oldest first");
  }

  const records = ordered.map(extractReleaseRecord);

  if (!sampleMode) {
    const outOfOrder = findOutOfOrderRecord(records);
    if (outOfOrder) {
      logger.warn(
        { release: describeRecord(outOfOrder), publishedAt: outOfOrder.publishedAt },
        "notifications were not newest first, delivery order may not be chronological",
      );
    }
  }

  const outcomes = await summarizeAll(records, summarize, {
    concurrency: options.concurrency ?? DEFAULT_SUMMARIZATION_CONCURRENCY,
    logger,
  });

  const { sent, errors } = await deliverAll(outcomes, deliver, logger);
  const report = buildReport(notifications.length, records.length, sent, errors);

  logger.info(
    { sent, processed: records.length, errorCount: errors.length },
    "release pipeline complete",
  );

  return report;
}

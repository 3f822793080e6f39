// pattern: Imperative Shell
import pLimit from "p-limit";
import type { Logger } from "pino";
import { describeRecord } from "./extract";
import type { ReleaseRecord, SummarizationOutcome, SummarizeFn } from "./types";
import { errorMessage } from "../errors";

export const DEFAULT_SUMMARIZATION_CONCURRENCY = 10;

export type SummarizeAllOptions = {
  readonly concurrency?: number;
  readonly logger: Logger;
};

async function summarizeRecord(
  record: ReleaseRecord,
  summarize: SummarizeFn,
): Promise<SummarizationOutcome> {
  try {
    const summary = await summarize(
      record.repositoryName,
      record.tagName,
      record.releaseBody,
    );
    return { record, summary, error: null };
  } catch (err) {
    const message = errorMessage(err);
    return { record, summary: null, error: `${describeRecord(record)}: ${message}` };
  }
}

/**
 * Summarizes every record with at most `concurrency` calls in flight.
 *
 * Units finish in any order; each one files its outcome under its input index and
 * the map is drained by sorted index, so `result[i].record === records[i]`.
 * A failing unit becomes an errored outcome and never cancels its siblings.
 * Resolves only after every unit has settled.
 */
export async function summarizeAll(
  records: ReadonlyArray<ReleaseRecord>,
  summarize: SummarizeFn,
  options: SummarizeAllOptions,
): Promise<Array<SummarizationOutcome>> {
  const { logger } = options;
  const total = records.length;

  if (total === 0) {
    return [];
  }

  const concurrency = options.concurrency ?? DEFAULT_SUMMARIZATION_CONCURRENCY;
  logger.info({ total, concurrency }, "starting parallel summarization");

  const limit = pLimit(concurrency);
  const outcomes = new Map<number, SummarizationOutcome>();

  const units = records.map((record, index) =>
    limit(async () => {
      const outcome = await summarizeRecord(record, summarize);
      outcomes.set(index, outcome);

      const progress = `${index + 1}/${total}`;
      if (outcome.error !== null) {
        logger.error(
          { progress, repository: record.repositoryName, tag: record.tagName },
          "release summarization failed",
        );
      } else {
        logger.info(
          {
            progress,
            repository: record.repositoryName,
            tag: record.tagName,
            chars: outcome.summary.length,
          },
          "release summarized",
        );
      }
    }),
  );

  const settled = await Promise.allSettled(units);

  // A unit only rejects if something outside the summarize call threw.
  records.forEach((record, index) => {
    const result = settled[index];
    if (outcomes.has(index) || result?.status !== "rejected") return;

    const reason: unknown = result.reason;
    const message = errorMessage(reason);
    logger.error(
      { progress: `${index + 1}/${total}`, error: message },
      "unexpected summarization error",
    );
    outcomes.set(index, {
      record,
      summary: null,
      error: `${describeRecord(record)}: ${message}`,
    });
  });

  logger.info({ total }, "parallel summarization complete");

  return Array.from(outcomes.entries())
    .sort(([a], [b]) => a - b)
    .map(([, outcome]) => outcome);
}

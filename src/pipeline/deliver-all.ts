// pattern: Imperative Shell
import type { Logger } from "pino";
import { describeRecord } from "./extract";
import type { DeliverFn, DeliveryResult, SummarizationOutcome } from "./types";
import { errorMessage } from "../errors";

/**
 * Delivers summaries one at a time, in the order given.
 *
 * Summarization errors are carried into the error list without a delivery attempt.
 * A rejected or refused delivery is recorded and the walk moves on to the next
 * outcome; nothing here throws for a single release.
 */
export async function deliverAll(
  outcomes: ReadonlyArray<SummarizationOutcome>,
  deliver: DeliverFn,
  logger: Logger,
): Promise<DeliveryResult> {
  let sent = 0;
  const errors: Array<string> = [];
  const total = outcomes.length;

  for (const [index, outcome] of outcomes.entries()) {
    const { record } = outcome;
    const context = {
      progress: `${index + 1}/${total}`,
      repository: record.repositoryName,
      tag: record.tagName,
    };

    if (outcome.error !== null) {
      errors.push(outcome.error);
      logger.error({ ...context, error: outcome.error }, "skipping delivery, summarization failed");
      continue;
    }

    try {
      const accepted = await deliver(
        record.repositoryName,
        record.tagName,
        outcome.summary,
        record.releaseUrl,
        record.publishedAt,
      );

      if (accepted) {
        sent += 1;
        logger.info(context, "release summary delivered");
      } else {
        errors.push(`${describeRecord(record)}: delivery failed`);
        logger.error(context, "delivery not accepted");
      }
    } catch (err) {
      const message = errorMessage(err);
      errors.push(`${describeRecord(record)}: delivery error: ${message}`);
      logger.error({ ...context, error: message }, "delivery error");
    }
  }

  return { sent, errors };
}

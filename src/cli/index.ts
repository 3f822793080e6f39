import { resolve } from "node:path";
import cac from "cac";
import { z } from "zod";
import { loadConfig } from "../config";
import { createLogger } from "../logger";
import { invokeNotifier, isNotifierFailure } from "../notifier";
import type { InvocationPayload } from "../notifier";
import { errorMessage } from "../errors";

/** Options of the `run` command. */
export interface RunOptions {
  /** Process only the newest release. */
  sample: boolean;

  /** Look back this many hours for notifications. Unparsed flag value. */
  sinceHours?: number | string;

  /** Summarize but log messages instead of posting to Slack. */
  dryRun: boolean;

  /** Path of the YAML configuration file. */
  config: string;
}

const sinceHoursFlagSchema = z.coerce.number().int().positive();

/**
 * Maps CLI flags onto an invocation payload; unset flags fall back to config.
 * Throws when `--since-hours` is not a positive integer.
 */
export function toPayload(options: RunOptions): InvocationPayload {
  if (options.sinceHours === undefined) {
    return options.sample ? { sampleMode: true } : {};
  }

  const sinceHours = sinceHoursFlagSchema.safeParse(options.sinceHours);
  if (!sinceHours.success) {
    throw new Error(
      `--since-hours must be a positive integer, got "${String(options.sinceHours)}"`,
    );
  }

  return {
    ...(options.sample ? { sampleMode: true } : {}),
    sinceHours: sinceHours.data,
  };
}

/**
 * Parses argv and runs the matched command. Failures are written to stderr and
 * reflected in `process.exitCode`.
 */
export async function run(argv: ReadonlyArray<string> = process.argv): Promise<void> {
  const cli = cac("release-herald");

  cli
    .command("run", "Summarize recent GitHub releases and post them to Slack")
    .option("--sample", "Only process the newest release", { default: false })
    .option("--since-hours <hours>", "Look back this many hours")
    .option("--dry-run", "Log messages instead of posting to Slack", {
      default: false,
    })
    .option("--config <path>", "Configuration file", {
      default: process.env["CONFIG_PATH"] ?? "./config.yaml",
    })
    .action(async (options: RunOptions) => {
      const payload = toPayload(options);
      const logger = createLogger();
      const config = loadConfig(resolve(options.config));

      const response = await invokeNotifier(
        payload,
        { config, env: process.env, logger, dryRun: options.dryRun },
        "cli",
      );

      process.stdout.write(`${JSON.stringify(response, null, 2)}\n`);
      if (isNotifierFailure(response)) {
        process.exitCode = 1;
      }
    });

  cli.help();
  cli.parse([...argv], { run: false });

  try {
    await cli.runMatchedCommand();
  } catch (err) {
    const message = errorMessage(err);
    process.stderr.write(`release-herald: ${message}\n`);
    process.exitCode = 1;
  }
}


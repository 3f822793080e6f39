// pattern: Imperative Shell
import { z } from "zod";
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import { createGitHubClient } from "../github/client";
import type { NotificationSource } from "../github/types";
import { createLlmClient, createReleaseSummarizer } from "../llm/client";
import { runReleasePipeline } from "../pipeline/orchestrator";
import type { DeliverFn, SummarizeFn } from "../pipeline/types";
import { createDryRunNotifier, createSlackNotifier } from "../slack/notifier";
import { resolveCredentials } from "./credentials";
import type { Credentials, Environment } from "./credentials";
import type { RunHistory, RunTrigger } from "./history";
import { errorMessage } from "../errors";

export const invocationPayloadSchema = z.object({
  sampleMode: z.boolean().optional(),
  sinceHours: z.number().int().positive().optional(),
});

export type InvocationPayload = z.infer<typeof invocationPayloadSchema>;

export type NotifierSuccess = Readonly<{
  message: string;
  sampleMode: boolean;
  sinceHours: number;
  notificationsTotal: number;
  releaseNotificationsCount: number;
  sent: number;
  errors: ReadonlyArray<string> | null;
}>;

export type NotifierFailure = Readonly<{ error: string }>;

export type NotifierResponse = NotifierSuccess | NotifierFailure;

export function isNotifierFailure(
  response: NotifierResponse,
): response is NotifierFailure {
  return "error" in response;
}

export type NotifierServices = {
  readonly source: NotificationSource;
  readonly summarize: SummarizeFn;
  readonly deliver: DeliverFn;
};

export type ServiceFactory = (
  credentials: Credentials,
  config: AppConfig,
  logger: Logger,
) => NotifierServices;

export type NotifierDeps = {
  readonly config: AppConfig;
  readonly env: Environment;
  readonly logger: Logger;
  readonly dryRun?: boolean;
  readonly history?: RunHistory;
  /** Defaults to the GitHub, LLM and Slack clients. */
  readonly createServices?: ServiceFactory;
};

export const createDefaultServices: ServiceFactory = (
  credentials,
  config,
  logger,
) => ({
  source: createGitHubClient(
    { ...config.github, token: credentials.githubToken },
    logger,
  ),
  summarize: createReleaseSummarizer(createLlmClient(config), config.llm),
  deliver:
    credentials.delivery.mode === "slack"
      ? createSlackNotifier({
          webhookUrl: credentials.delivery.webhookUrl,
          timeoutMs: config.slack.timeoutMs,
        })
      : createDryRunNotifier(logger),
});

const payloadObjectSchema = z.record(z.string(), z.unknown());

function readField<T>(
  payload: Readonly<Record<string, unknown>>,
  field: keyof InvocationPayload,
  schema: z.ZodType<T | undefined>,
  fallback: T,
  logger: Logger,
): T {
  const result = schema.safeParse(payload[field]);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${field}: ${i.message}`).join("; ");
    logger.warn({ issues }, "invalid payload field, using default");
    return fallback;
  }

  return result.data ?? fallback;
}

/**
 * Reads run options from an invocation payload. Each field is validated on its
 * own: an invalid field falls back to its configured default and the others
 * are kept. A payload that is not an object falls back as a whole.
 */
export function parsePayload(
  payload: unknown,
  config: AppConfig,
  logger: Logger,
): { readonly sampleMode: boolean; readonly sinceHours: number } {
  const defaults = {
    sampleMode: config.run.sampleMode,
    sinceHours: config.run.sinceHours,
  };

  if (payload === undefined || payload === null) {
    return defaults;
  }

  const object = payloadObjectSchema.safeParse(payload);
  if (!object.success) {
    const issues = object.error.issues.map((i) => `payload: ${i.message}`).join("; ");
    logger.warn({ issues }, "invalid payload, using defaults");
    return defaults;
  }

  const { shape } = invocationPayloadSchema;
  return {
    sampleMode: readField(
      object.data,
      "sampleMode",
      shape.sampleMode,
      defaults.sampleMode,
      logger,
    ),
    sinceHours: readField(
      object.data,
      "sinceHours",
      shape.sinceHours,
      defaults.sinceHours,
      logger,
    ),
  };
}

async function execute(
  payload: unknown,
  deps: NotifierDeps,
): Promise<NotifierResponse> {
  const { config, logger } = deps;

  const resolved = resolveCredentials(deps.env, config.llm.provider, {
    dryRun: deps.dryRun,
  });
  if (!resolved.ok) {
    logger.error({ error: resolved.error }, "missing credentials");
    return { error: resolved.error };
  }

  const { sampleMode, sinceHours } = parsePayload(payload, config, logger);
  logger.info(
    { sampleMode, sinceHours, dryRun: deps.dryRun ?? false },
    "release notifier started",
  );

  try {
    const createServices = deps.createServices ?? createDefaultServices;
    const services = createServices(resolved.credentials, config, logger);

    const report = await runReleasePipeline(
      { ...services, logger },
      {
        sampleMode,
        sinceHours,
        concurrency: config.summarization.maxConcurrency,
      },
    );

    return {
      message:
        report.releaseNotifications === 0
          ? "No release notifications found"
          : "Release notifications processed",
      sampleMode,
      sinceHours,
      notificationsTotal: report.notificationsTotal,
      releaseNotificationsCount: report.releaseNotifications,
      sent: report.sent,
      errors: report.errors,
    };
  } catch (err) {
    const message = errorMessage(err);
    logger.error({ error: message }, "release notifier failed");
    return { error: message };
  }
}

/**
 * Runs the notifier once for an invocation payload (`{ sampleMode?, sinceHours? }`).
 *
 * Never rejects: missing credentials and anything that escapes the pipeline come
 * back as `{ error }`, per-release failures come back in `errors` of the report.
 * The response is recorded in the run history when one is given.
 */
export async function invokeNotifier(
  payload: unknown,
  deps: NotifierDeps,
  trigger: RunTrigger = "api",
): Promise<NotifierResponse> {
  const startedAt = new Date();
  const response = await execute(payload, deps);

  deps.history?.record({
    trigger,
    startedAt,
    finishedAt: new Date(),
    response,
  });

  if (!isNotifierFailure(response)) {
    deps.logger.info(
      {
        trigger,
        sent: response.sent,
        processed: response.releaseNotificationsCount,
      },
      "release notifier completed",
    );
  }

  return response;
}

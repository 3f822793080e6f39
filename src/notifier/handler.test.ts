import { describe, it, expect, vi } from "vitest";
import pino from "pino";
import { invokeNotifier, isNotifierFailure, parsePayload } from "./handler";
import type { NotifierDeps, NotifierServices, ServiceFactory } from "./handler";
import { createRunHistory } from "./history";
import type { NotificationSource, ReleasePair } from "../github/types";
import type { DeliverFn, SummarizeFn } from "../pipeline/types";
import { createMockLogger, createTestConfig, makePair } from "../test-utils/fixtures";

const env = {
  GITHUB_TOKEN: "test-github-token",
  OPENAI_API_KEY: "test-openai-key",
  SLACK_WEBHOOK_URL: "https://hooks.slack.test/services/test",
};

function createServices(pairs: ReadonlyArray<ReleasePair>, notificationCount = pairs.length) {
  const services = {
    source: {
      listNotifications: vi
        .fn<NotificationSource["listNotifications"]>()
        .mockResolvedValue(Array.from({ length: notificationCount }, (_, i) => ({ id: String(i) }))),
      fetchReleaseDetails: vi.fn<NotificationSource["fetchReleaseDetails"]>(),
      filterToReleasePairs: vi
        .fn<NotificationSource["filterToReleasePairs"]>()
        .mockResolvedValue(pairs),
    },
    summarize: vi.fn<SummarizeFn>().mockResolvedValue("summary"),
    deliver: vi.fn<DeliverFn>().mockResolvedValue(true),
  } satisfies NotifierServices;
  const factory = vi.fn<ServiceFactory>(() => services);

  return { services, factory };
}

describe("invokeNotifier", () => {
  const logger = pino({ level: "silent" });
  const config = createTestConfig();

  function deps(overrides: Partial<NotifierDeps>): NotifierDeps {
    return { config, env, logger, ...overrides };
  }

  it("should return the run report for a successful run", async () => {
    const { services, factory } = createServices(
      [makePair("c/d", "v2"), makePair("a/b", "v1")],
      5,
    );
    services.summarize.mockImplementation(async (repository) => {
      if (repository === "c/d") throw new Error("LLM summarization failed: overloaded");
      return "summary";
    });

    const response = await invokeNotifier(
      { sinceHours: 48 },
      deps({ createServices: factory }),
    );

    expect(response).toEqual({
      message: "Release notifications processed",
      sampleMode: false,
      sinceHours: 48,
      notificationsTotal: 5,
      releaseNotificationsCount: 2,
      sent: 1,
      errors: ["c/d v2: LLM summarization failed: overloaded"],
    });
    expect(services.source.listNotifications).toHaveBeenCalledWith(48);
  });

  it("should report when no releases were found", async () => {
    const { services, factory } = createServices([], 3);

    const response = await invokeNotifier({}, deps({ createServices: factory }));

    expect(response).toEqual({
      message: "No release notifications found",
      sampleMode: false,
      sinceHours: 24,
      notificationsTotal: 3,
      releaseNotificationsCount: 0,
      sent: 0,
      errors: null,
    });
    expect(services.summarize).not.toHaveBeenCalled();
    expect(services.deliver).not.toHaveBeenCalled();
  });

  it("should honour sample mode from the payload", async () => {
    const { services, factory } = createServices([
      makePair("x/newest", "v3"),
      makePair("x/older", "v2"),
    ]);

    const response = await invokeNotifier(
      { sampleMode: true },
      deps({ createServices: factory }),
    );

    expect(services.deliver).toHaveBeenCalledTimes(1);
    expect(services.deliver.mock.calls[0]?.[0]).toBe("x/newest");
    expect(response).toMatchObject({ sampleMode: true, releaseNotificationsCount: 1, sent: 1 });
  });

  it("should fail before building clients when a credential is missing", async () => {
    const { factory } = createServices([]);

    const response = await invokeNotifier(
      {},
      deps({ env: { GITHUB_TOKEN: "test-github-token" }, createServices: factory }),
    );

    expect(response).toEqual({ error: "OPENAI_API_KEY environment variable is not set" });
    expect(factory).not.toHaveBeenCalled();
  });

  it("should hand dry-run credentials to the service factory", async () => {
    const { factory } = createServices([]);
    const { SLACK_WEBHOOK_URL: _unused, ...envWithoutSlack } = env;

    await invokeNotifier(
      {},
      deps({ env: envWithoutSlack, dryRun: true, createServices: factory }),
    );

    expect(factory).toHaveBeenCalledWith(
      { githubToken: "test-github-token", delivery: { mode: "dry-run" } },
      config,
      logger,
    );
  });

  it("should turn an upstream failure into an error response", async () => {
    const { services, factory } = createServices([]);
    services.source.listNotifications.mockRejectedValue(
      new Error("GitHub API request failed: HTTP 503: Service Unavailable"),
    );

    const response = await invokeNotifier({}, deps({ createServices: factory }));

    expect(response).toEqual({
      error: "GitHub API request failed: HTTP 503: Service Unavailable",
    });
    expect(isNotifierFailure(response)).toBe(true);
  });

  it("should turn a failing service factory into an error response", async () => {
    const factory = vi.fn<ServiceFactory>(() => {
      throw new Error("unknown provider: zai");
    });

    const response = await invokeNotifier({}, deps({ createServices: factory }));

    expect(response).toEqual({ error: "unknown provider: zai" });
  });

  it("should record every run in the history with its trigger", async () => {
    const history = createRunHistory();
    const { factory } = createServices([]);

    const ok = await invokeNotifier({}, deps({ history, createServices: factory }), "http");
    const failed = await invokeNotifier({}, deps({ history, env: {} }), "schedule");

    const entries = history.list();
    expect(entries.map((e) => e.trigger)).toEqual(["schedule", "http"]);
    expect(entries[0]?.response).toBe(failed);
    expect(entries[1]?.response).toBe(ok);
  });
});

describe("parsePayload", () => {
  const config = createTestConfig({ run: { sinceHours: 12, sampleMode: false } });

  it("should use config defaults for a missing payload", () => {
    expect(parsePayload(undefined, config, createMockLogger())).toEqual({
      sampleMode: false,
      sinceHours: 12,
    });
  });

  it("should take the fields that are present", () => {
    expect(parsePayload({ sampleMode: true }, config, createMockLogger())).toEqual({
      sampleMode: true,
      sinceHours: 12,
    });
  });

  it("should keep a valid sampleMode when sinceHours is invalid", () => {
    const logger = createMockLogger();

    const options = parsePayload({ sampleMode: true, sinceHours: 0 }, createTestConfig(), logger);

    expect(options).toEqual({ sampleMode: true, sinceHours: 24 });
    expect(logger.warn).toHaveBeenCalledWith(
      { issues: "sinceHours: Number must be greater than 0" },
      "invalid payload field, using default",
    );
  });

  it("should fall back only for the invalid field and warn", () => {
    const logger = createMockLogger();

    expect(parsePayload({ sinceHours: "soon", sampleMode: true }, config, logger)).toEqual({
      sampleMode: true,
      sinceHours: 12,
    });
    expect(logger.warn).toHaveBeenCalledWith(
      { issues: "sinceHours: Expected number, received string" },
      "invalid payload field, using default",
    );
  });

  it("should keep a valid sinceHours when sampleMode is invalid", () => {
    const logger = createMockLogger();

    expect(parsePayload({ sampleMode: "yes", sinceHours: 48 }, config, logger)).toEqual({
      sampleMode: false,
      sinceHours: 48,
    });
    expect(logger.warn).toHaveBeenCalledWith(
      { issues: "sampleMode: Expected boolean, received string" },
      "invalid payload field, using default",
    );
  });

  it("should treat a NaN window as invalid", () => {
    expect(
      parsePayload({ sampleMode: true, sinceHours: Number.NaN }, config, createMockLogger()),
    ).toEqual({ sampleMode: true, sinceHours: 12 });
  });

  it("should fall back to all defaults when the payload is not an object", () => {
    const logger = createMockLogger();

    expect(parsePayload("sampleMode=true", config, logger)).toEqual({
      sampleMode: false,
      sinceHours: 12,
    });
    expect(logger.warn).toHaveBeenCalledWith(
      { issues: "payload: Expected object, received string" },
      "invalid payload, using defaults",
    );
  });
});

describe("invokeNotifier payload handling", () => {
  it("should stay in sample mode when the window is invalid", async () => {
    const { services, factory } = createServices([
      makePair("x/newest", "v3"),
      makePair("x/older", "v2"),
    ]);

    const response = await invokeNotifier(
      { sampleMode: true, sinceHours: 0 },
      {
        config: createTestConfig(),
        env,
        logger: pino({ level: "silent" }),
        createServices: factory,
      },
    );

    expect(services.source.listNotifications).toHaveBeenCalledWith(24);
    expect(services.deliver).toHaveBeenCalledTimes(1);
    expect(response).toMatchObject({ sampleMode: true, sinceHours: 24, sent: 1 });
  });
});

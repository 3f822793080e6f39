import { resolve } from "node:path";
import { createLogger } from "./logger";
import { loadConfig, parsePort } from "./config";
import type { AppConfig } from "./config";
import { createRunHistory, invokeNotifier } from "./notifier";
import type { InvokeFn } from "./api/context";
import { createNotifierScheduler } from "./scheduler";
import type { NotifierScheduler } from "./scheduler";
import { createApiServer } from "./api/server";
import { registerShutdownHandlers } from "./lifecycle";
import { errorMessage } from "./errors";

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";

async function main(): Promise<void> {
  const logger = createLogger();

  logger.info("release-herald starting");

  let config: AppConfig;
  let port: number;
  try {
    config = loadConfig(resolve(CONFIG_PATH));
    port = parsePort(process.env["PORT"]);
  } catch (err) {
    logger.fatal({ error: errorMessage(err) }, "configuration error");
    process.exit(1);
  }

  logger.info(
    { provider: config.llm.provider, model: config.llm.model },
    "config loaded",
  );

  const history = createRunHistory();
  const invoke: InvokeFn = (payload, trigger) =>
    invokeNotifier(payload, { config, env: process.env, logger, history }, trigger);

  const schedulers: Array<NotifierScheduler> = [];
  if (config.schedule.run) {
    schedulers.push(createNotifierScheduler(config.schedule.run, invoke, logger));
    logger.info({ schedule: config.schedule.run }, "notifier scheduler started");
  } else {
    logger.info("schedule.run not set, runs only on request");
  }

  const app = createApiServer({ config, logger, history, invoke });
  const server = app.listen(port, () => {
    logger.info({ port }, "api server listening");
  });

  registerShutdownHandlers({
    schedulers,
    closeServer: (done) => {
      server.close(() => done());
    },
    logger,
  });
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});

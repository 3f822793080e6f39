// pattern: Functional Core
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import type { NotifierResponse, RunHistory, RunTrigger } from "../notifier";

/**
 * Runs the notifier once with the given payload.
 */
export type InvokeFn = (
  payload: unknown,
  trigger: RunTrigger,
) => Promise<NotifierResponse>;

/**
 * Context shared by the HTTP routes and every tRPC procedure.
 */
export type AppContext = {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly history: RunHistory;
  readonly invoke: InvokeFn;
};

export {
  invokeNotifier,
  isNotifierFailure,
  parsePayload,
  createDefaultServices,
  invocationPayloadSchema,
} from "./handler";
export type {
  InvocationPayload,
  NotifierSuccess,
  NotifierFailure,
  NotifierResponse,
  NotifierServices,
  ServiceFactory,
  NotifierDeps,
} from "./handler";
export { resolveCredentials } from "./credentials";
export type { Credentials, CredentialsResult, DeliveryTarget, Environment } from "./credentials";
export { createRunHistory, DEFAULT_HISTORY_SIZE } from "./history";
export type { RunHistory, RunHistoryEntry, RunTrigger } from "./history";

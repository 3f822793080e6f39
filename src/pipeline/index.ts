export { extractReleaseRecord, describeRecord } from "./extract";
export { summarizeAll, DEFAULT_SUMMARIZATION_CONCURRENCY } from "./summarize-all";
export { deliverAll } from "./deliver-all";
export { buildReport } from "./report";
export {
  runReleasePipeline,
  orderForDelivery,
  findOutOfOrderRecord,
} from "./orchestrator";
export type { PipelineDeps, PipelineOptions } from "./orchestrator";
export type { SummarizeAllOptions } from "./summarize-all";
export type {
  ReleaseRecord,
  SummarizationOutcome,
  DeliveryResult,
  RunReport,
  SummarizeFn,
  DeliverFn,
} from "./types";

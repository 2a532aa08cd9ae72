export { JenkinsClient, API_SUFFIX } from "./client";
export type { HeadResult, JenkinsClientOptions } from "./client";
export { createDispatcher } from "./dispatcher";
export { decodePayload } from "./decoder";
export { DecodeError, JenkinsClientError, MissingHeaderError, TransportError } from "./errors";
export type {
  BuildPayload,
  BuildRefPayload,
  ComputerPayload,
  ComputerSetPayload,
  ExecutorPayload,
  JobListPayload,
  JobPayload,
  JobSummaryPayload,
  OfflineCausePayload,
  PayloadKind,
  PayloadTypes,
  PluginListPayload,
  PluginPayload
} from "./types";

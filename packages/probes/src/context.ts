import type { JenkinsClient } from "@ci-probes/jenkins-client";
import type { ComponentLogger } from "@ci-probes/logger";

/** The part of the client the probes call; tests hand in stand-ins. */
export type JenkinsApi = Pick<JenkinsClient, "baseUrl" | "getJson" | "requireHeader">;

export interface ProbeContext {
  client: JenkinsApi;
  logger?: ComponentLogger;
  /** Epoch milliseconds; defaults to `Date.now`. */
  now?: () => number;
}

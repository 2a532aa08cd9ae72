import type { Dispatcher } from "undici";
import { LogLevel, type AnyProbeConfig } from "@ci-probes/shared";
import { JenkinsClient } from "@ci-probes/jenkins-client";
import type { ComponentLogger } from "@ci-probes/logger";
import { runAgentsProbe } from "./agents/probe";
import type { AgentStateStore } from "./agents/stateStore";
import { runJobTimeProbe } from "./jobTime/probe";
import { runJobsProbe } from "./jobs/probe";
import { unknownResult, type ProbeResult } from "./report/reporter";
import { runVersionProbe } from "./version/probe";
import type { ProbeContext } from "./context";

export interface ProbeRunOptions {
  logger?: ComponentLogger;
  dispatcher?: Dispatcher;
  store?: AgentStateStore;
  now?: () => number;
}

function dispatch(config: AnyProbeConfig, context: ProbeContext, store?: AgentStateStore): Promise<ProbeResult> {
  switch (config.kind) {
    case "agents":
      return runAgentsProbe(config.probe, { ...context, store });
    case "jobs":
      return runJobsProbe(config.probe, context);
    case "jobTime":
      return runJobTimeProbe(config.probe, context);
    case "version":
      return runVersionProbe(config.probe, context);
  }
}

/**
 * Runs one probe against the configured instance. Never rejects: every
 * failure becomes an UNKNOWN result.
 */
export async function runProbe(config: AnyProbeConfig, options: ProbeRunOptions = {}): Promise<ProbeResult> {
  const logger = options.logger;
  const client = new JenkinsClient({
    ...config.http,
    logger: logger?.child("http"),
    dispatcher: options.dispatcher
  });
  logger?.log(LogLevel.DEBUG, "probe started", { kind: config.kind, baseUrl: client.baseUrl });
  try {
    const result = await dispatch(config, { client, logger: logger?.child(config.kind), now: options.now }, options.store);
    logger?.log(LogLevel.DEBUG, "probe finished", { kind: config.kind, severity: result.severity });
    return result;
  } catch (error) {
    const result = unknownResult(error);
    logger?.log(LogLevel.ERROR, "probe failed", { kind: config.kind, reason: result.message });
    return result;
  } finally {
    await client.close();
  }
}

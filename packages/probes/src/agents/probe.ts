import { LogLevel, type AgentsProbeConfig, type PercentThresholds } from "@ci-probes/shared";
import type { ComputerSetPayload } from "@ci-probes/jenkins-client";
import { resultFromVerdict, type PerfMetric, type ProbeResult } from "../report/reporter";
import type { ProbeContext } from "../context";
import { aggregate, type AggregateTotals } from "./aggregator";
import { toAgentSnapshot, type SimpleStatus } from "./snapshot";
import { FileAgentStateStore, instanceKeyFromUrl, type AgentStateStore } from "./stateStore";
import { evaluateAgentThresholds } from "./thresholds";
import { detectTransitions, summarizeTransitions, transitionDetail, type Transition } from "./transitions";

export const COMPUTERS_PATH = "/computer/api/json";
export const COMPUTERS_TREE =
  "computer[displayName,executors[idle],idle,offline,offlineCause[description],temporarilyOffline]";

export interface AgentsProbeContext extends ProbeContext {
  store?: AgentStateStore;
}

/** Lower bounds of online agents matching the offline percentages. */
function onlineBound(pct: number | undefined, total: number): number | undefined {
  return pct === undefined ? undefined : ((100 - pct) * total) / 100;
}

/** Upper bounds of running executors matching the utilization percentages. */
function executorBound(pct: number | undefined, total: number): number | undefined {
  return pct === undefined ? undefined : (pct * total) / 100;
}

export function agentMetrics(
  totals: AggregateTotals,
  thresholds: { offline: PercentThresholds; executors: PercentThresholds }
): PerfMetric[] {
  return [
    {
      label: "agents",
      value: totals.entityCount - totals.offlineCount,
      warning: onlineBound(thresholds.offline.warning, totals.entityCount),
      critical: onlineBound(thresholds.offline.critical, totals.entityCount),
      max: totals.entityCount
    },
    {
      label: "executors",
      value: totals.runningExecutorCount,
      warning: executorBound(thresholds.executors.warning, totals.executorCount),
      critical: executorBound(thresholds.executors.critical, totals.executorCount),
      max: totals.executorCount
    }
  ];
}

/**
 * Evaluates one computer set payload. Kept separate from the fetch so that
 * the whole pipeline can run against recorded payloads.
 */
export async function evaluateComputers(
  payload: ComputerSetPayload,
  settings: AgentsProbeConfig,
  options: { instanceKey: string; store: AgentStateStore; context: ProbeContext }
): Promise<ProbeResult> {
  const logger = options.context.logger;
  const { totals, agents, statuses } = aggregate(payload.computer.map(toAgentSnapshot), {
    agentName: settings.agentName
  });
  logger?.log(LogLevel.DEBUG, "agents aggregated", { ...totals });

  if (totals.entityCount === 0) {
    return resultFromVerdict(evaluateAgentThresholds({ totals, agents, thresholds: settings, agentName: settings.agentName }));
  }

  const previous = settings.stateful ? await options.store.load(options.instanceKey) : new Map<string, SimpleStatus>();
  await options.store.save(options.instanceKey, statuses);

  let transitions: Transition[] = [];
  if (settings.stateful && previous.size > 0) {
    transitions = detectTransitions(previous, statuses);
  }
  const changed = transitions.filter(transition => transition.kind !== "unchanged");
  if (changed.length > 0) {
    logger?.log(LogLevel.INFO, "agent transitions detected", {
      transitions: changed.map(transition => `${transition.name}:${transition.kind}`)
    });
  }

  const verdict = evaluateAgentThresholds({
    totals,
    agents,
    thresholds: settings,
    transitions: summarizeTransitions(transitions),
    agentName: settings.agentName
  });

  const details = agents.map(agent => agent.detail);
  for (const transition of changed) {
    const detail = transitionDetail(transition);
    if (detail) {
      details.push(detail);
    }
  }
  return resultFromVerdict(verdict, agentMetrics(totals, settings), details);
}

export async function runAgentsProbe(settings: AgentsProbeConfig, context: AgentsProbeContext): Promise<ProbeResult> {
  const store =
    context.store ??
    new FileAgentStateStore({ stateDir: settings.stateDir, logger: context.logger?.child("state") });
  const payload = await context.client.getJson("computers", COMPUTERS_PATH, COMPUTERS_TREE);
  return evaluateComputers(payload, settings, {
    instanceKey: instanceKeyFromUrl(context.client.baseUrl),
    store,
    context
  });
}

import { Severity, okVerdict, worstVerdict, type PercentThresholds, type Verdict } from "@ci-probes/shared";
import type { AgentEvaluation, AggregateTotals } from "./aggregator";

export interface AgentThresholds {
  offline: PercentThresholds;
  executors: PercentThresholds;
}

export interface AgentThresholdInput {
  totals: AggregateTotals;
  agents: readonly AgentEvaluation[];
  thresholds: AgentThresholds;
  transitions?: Verdict;
  agentName?: string;
}

type Comparison = (value: number, bound: number) => boolean;

const atLeast: Comparison = (value, bound) => value >= bound;
const above: Comparison = (value, bound) => value > bound;

function grade(
  value: number,
  thresholds: PercentThresholds,
  compare: Comparison,
  message: (bound: number) => string
): Verdict {
  if (thresholds.critical !== undefined && compare(value, thresholds.critical)) {
    return { severity: Severity.CRITICAL, message: message(thresholds.critical) };
  }
  if (thresholds.warning !== undefined && compare(value, thresholds.warning)) {
    return { severity: Severity.WARNING, message: message(thresholds.warning) };
  }
  return okVerdict();
}

export function evaluateAgentUtilization(agent: AgentEvaluation, thresholds: PercentThresholds): Verdict {
  if (agent.utilizationPct === undefined) {
    return okVerdict();
  }
  return grade(
    agent.utilizationPct,
    thresholds,
    atLeast,
    bound => `agent ${agent.name} has ${agent.runningExecutorCount} / ${agent.executorCount} running executors >= ${bound}%`
  );
}

export function evaluateOfflineRatio(totals: AggregateTotals, thresholds: PercentThresholds): Verdict {
  if (totals.entityCount === 0) {
    return okVerdict();
  }
  const ratio = (totals.offlineCount * 100) / totals.entityCount;
  return grade(
    ratio,
    thresholds,
    above,
    bound => `${totals.offlineCount} agents offline / ${totals.entityCount} > ${bound}%`
  );
}

export function evaluateExecutorRatio(totals: AggregateTotals, thresholds: PercentThresholds): Verdict {
  if (totals.executorCount === 0) {
    return okVerdict();
  }
  const ratio = (totals.runningExecutorCount * 100) / totals.executorCount;
  return grade(
    ratio,
    thresholds,
    atLeast,
    bound => `${totals.runningExecutorCount} / ${totals.executorCount} running executors >= ${bound}%`
  );
}

/**
 * Ordered evaluation: per-agent utilization, transitions, offline ratio,
 * executor ratio. The most severe verdict wins and the earliest rule keeps
 * the message on ties.
 */
export function evaluateAgentThresholds(input: AgentThresholdInput): Verdict {
  const { totals, thresholds } = input;
  if (totals.entityCount === 0) {
    return okVerdict(input.agentName !== undefined ? `No agent named ${input.agentName}` : "No agent");
  }

  const verdict = worstVerdict([
    ...input.agents.map(agent => evaluateAgentUtilization(agent, thresholds.executors)),
    ...(input.transitions ? [input.transitions] : []),
    evaluateOfflineRatio(totals, thresholds.offline),
    evaluateExecutorRatio(totals, thresholds.executors)
  ]);

  if (verdict.severity === Severity.OK) {
    const online = totals.entityCount - totals.offlineCount;
    return okVerdict(`${online} online agents (over ${totals.entityCount} agents)`);
  }
  return verdict;
}

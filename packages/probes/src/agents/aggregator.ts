import { statusOf, type AgentSnapshot, type SimpleStatus, type StatusMap } from "./snapshot";

export interface AggregateTotals {
  entityCount: number;
  offlineCount: number;
  executorCount: number;
  runningExecutorCount: number;
}

export interface AgentEvaluation {
  name: string;
  status: SimpleStatus;
  executorCount: number;
  runningExecutorCount: number;
  /** Undefined for agents without executors. */
  utilizationPct?: number;
  detail: string;
}

export interface Aggregate {
  totals: AggregateTotals;
  agents: AgentEvaluation[];
  statuses: StatusMap;
}

export interface AggregateOptions {
  agentName?: string;
}

export function emptyTotals(): AggregateTotals {
  return { entityCount: 0, offlineCount: 0, executorCount: 0, runningExecutorCount: 0 };
}

export function describeAgent(snapshot: AgentSnapshot, running: number): string {
  let detail = `${snapshot.name}, ${running}/${snapshot.executorStates.length} executors`;
  if (snapshot.offline) {
    detail += ", OFFLINE";
  } else if (!snapshot.idle) {
    detail += ", working";
  }
  if (snapshot.temporarilyOffline) {
    detail += ", temp offline";
  }
  if (snapshot.offlineCause) {
    detail += ` cause: ${snapshot.offlineCause}`;
  }
  return detail;
}

export function evaluateAgent(snapshot: AgentSnapshot): AgentEvaluation {
  const executorCount = snapshot.executorStates.length;
  const runningExecutorCount = snapshot.executorStates.filter(idle => !idle).length;
  return {
    name: snapshot.name,
    status: statusOf(snapshot),
    executorCount,
    runningExecutorCount,
    utilizationPct: executorCount > 0 ? (runningExecutorCount * 100) / executorCount : undefined,
    detail: describeAgent(snapshot, runningExecutorCount)
  };
}

/**
 * Folds one poll into totals, per-agent evaluations and the status map to
 * persist. When `agentName` is given every figure covers that agent only.
 */
export function aggregate(snapshots: Iterable<AgentSnapshot>, options: AggregateOptions = {}): Aggregate {
  const totals = emptyTotals();
  const agents: AgentEvaluation[] = [];
  const statuses = new Map<string, SimpleStatus>();

  for (const snapshot of snapshots) {
    if (options.agentName !== undefined && snapshot.name !== options.agentName) {
      continue;
    }
    const evaluation = evaluateAgent(snapshot);
    totals.entityCount += 1;
    totals.offlineCount += snapshot.offline ? 1 : 0;
    totals.executorCount += evaluation.executorCount;
    totals.runningExecutorCount += evaluation.runningExecutorCount;
    agents.push(evaluation);
    statuses.set(snapshot.name, evaluation.status);
  }

  return { totals, agents, statuses };
}

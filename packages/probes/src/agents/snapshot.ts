import type { ComputerPayload } from "@ci-probes/jenkins-client";

export type SimpleStatus = "online" | "offline";

/** Insertion ordered agent name to status map, as polled or as persisted. */
export type StatusMap = ReadonlyMap<string, SimpleStatus>;

export interface AgentSnapshot {
  name: string;
  /** One entry per executor, `true` when that executor is idle. */
  executorStates: boolean[];
  idle: boolean;
  offline: boolean;
  temporarilyOffline: boolean;
  offlineCause?: string;
}

export function isSimpleStatus(value: string): value is SimpleStatus {
  return value === "online" || value === "offline";
}

export function statusOf(snapshot: Pick<AgentSnapshot, "offline">): SimpleStatus {
  return snapshot.offline ? "offline" : "online";
}

export function toAgentSnapshot(computer: ComputerPayload): AgentSnapshot {
  const executorStates = (computer.executors ?? []).map(executor => executor.idle);
  const description = computer.offlineCause?.description?.trim();
  return {
    name: computer.displayName,
    executorStates,
    idle: computer.idle ?? executorStates.every(idle => idle),
    offline: computer.offline,
    temporarilyOffline: computer.temporarilyOffline ?? false,
    offlineCause: description ? description : undefined
  };
}

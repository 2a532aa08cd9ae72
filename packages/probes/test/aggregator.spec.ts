import { describe, expect, it } from "vitest";
import { aggregate, describeAgent } from "../src/agents/aggregator";
import { toAgentSnapshot, type AgentSnapshot } from "../src/agents/snapshot";

const snapshots: AgentSnapshot[] = [
  { name: "linux-1", executorStates: [false, true], idle: false, offline: false, temporarilyOffline: false },
  {
    name: "win-1",
    executorStates: [true],
    idle: true,
    offline: true,
    temporarilyOffline: true,
    offlineCause: "Disconnected by admin"
  },
  { name: "built-in", executorStates: [], idle: true, offline: false, temporarilyOffline: false }
];

describe("toAgentSnapshot", () => {
  it("maps a computer payload", () => {
    expect(
      toAgentSnapshot({
        displayName: "linux-2",
        offline: false,
        executors: [{ idle: false }, { idle: true }],
        offlineCause: { description: "  " }
      })
    ).toEqual({
      name: "linux-2",
      executorStates: [false, true],
      idle: false,
      offline: false,
      temporarilyOffline: false,
      offlineCause: undefined
    });
  });

  it("keeps the offline cause description", () => {
    const snapshot = toAgentSnapshot({
      displayName: "mac-1",
      offline: true,
      idle: true,
      temporarilyOffline: true,
      offlineCause: { description: "Low disk space" }
    });
    expect(snapshot.executorStates).toEqual([]);
    expect(snapshot.offlineCause).toBe("Low disk space");
    expect(snapshot.temporarilyOffline).toBe(true);
  });

  it("treats a null offline cause as absent", () => {
    expect(toAgentSnapshot({ displayName: "a", offline: false, offlineCause: null }).offlineCause).toBeUndefined();
  });
});

describe("aggregate", () => {
  it("folds totals, evaluations and statuses in poll order", () => {
    const { totals, agents, statuses } = aggregate(snapshots);

    expect(totals).toEqual({ entityCount: 3, offlineCount: 1, executorCount: 3, runningExecutorCount: 1 });
    expect(agents.map(agent => agent.detail)).toEqual([
      "linux-1, 1/2 executors, working",
      "win-1, 0/1 executors, OFFLINE, temp offline cause: Disconnected by admin",
      "built-in, 0/0 executors"
    ]);
    expect(agents.map(agent => agent.utilizationPct)).toEqual([50, 0, undefined]);
    expect([...statuses]).toEqual([
      ["linux-1", "online"],
      ["win-1", "offline"],
      ["built-in", "online"]
    ]);
  });

  it("computes every figure over the named agent only", () => {
    const { totals, agents, statuses } = aggregate(snapshots, { agentName: "win-1" });

    expect(totals).toEqual({ entityCount: 1, offlineCount: 1, executorCount: 1, runningExecutorCount: 0 });
    expect(agents).toHaveLength(1);
    expect([...statuses]).toEqual([["win-1", "offline"]]);
  });

  it("returns empty totals when the named agent is unknown", () => {
    const { totals, agents, statuses } = aggregate(snapshots, { agentName: "missing" });

    expect(totals).toEqual({ entityCount: 0, offlineCount: 0, executorCount: 0, runningExecutorCount: 0 });
    expect(agents).toEqual([]);
    expect(statuses.size).toBe(0);
  });

  it("does not flag an offline agent as working", () => {
    const offlineBusy: AgentSnapshot = {
      name: "busy",
      executorStates: [false],
      idle: false,
      offline: true,
      temporarilyOffline: false
    };
    expect(describeAgent(offlineBusy, 1)).toBe("busy, 1/1 executors, OFFLINE");
  });
});

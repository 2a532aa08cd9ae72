import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MockAgent } from "undici";
import { LogLevel, Severity, type AgentsProbeConfig, type ProbeConfig } from "@ci-probes/shared";
import { JenkinsClient, type ComputerPayload } from "@ci-probes/jenkins-client";
import { StructuredLogger, createMemorySink } from "@ci-probes/logger";
import { runAgentsProbe } from "../src/agents/probe";
import { MemoryAgentStateStore } from "../src/agents/stateStore";
import { renderReport } from "../src/report/reporter";
import { runProbe } from "../src/runner";

const BASE = "http://jenkins.test";

const builtIn: ComputerPayload = {
  displayName: "built-in",
  executors: [{ idle: false }, { idle: true }],
  idle: false,
  offline: false,
  offlineCause: null,
  temporarilyOffline: false
};

const linuxOffline: ComputerPayload = {
  displayName: "linux-1",
  executors: [{ idle: true }],
  idle: true,
  offline: true,
  offlineCause: { description: "Agent went offline during the build" },
  temporarilyOffline: false
};

const linuxOnline: ComputerPayload = {
  displayName: "linux-1",
  executors: [{ idle: true }],
  idle: true,
  offline: false,
  offlineCause: null,
  temporarilyOffline: false
};

function settings(overrides: Partial<AgentsProbeConfig> = {}): AgentsProbeConfig {
  return { stateful: true, stateDir: "/unused", offline: {}, executors: {}, ...overrides };
}

describe("agents probe", () => {
  let mockAgent: MockAgent;
  let client: JenkinsClient;
  let store: MemoryAgentStateStore;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
    client = new JenkinsClient({ baseUrl: BASE, timeoutMs: 1_000, proxy: { mode: "none" }, dispatcher: mockAgent });
    store = new MemoryAgentStateStore();
  });

  afterEach(async () => {
    await mockAgent.close();
  });

  function replyComputers(computer: ComputerPayload[], status = 200) {
    mockAgent
      .get(BASE)
      .intercept({ path: path => path.startsWith("/computer/api/json?tree="), method: "GET" })
      .reply(status, { _class: "hudson.model.ComputerSet", computer });
  }

  it("reports online agents with metrics and detail lines", async () => {
    replyComputers([builtIn, linuxOffline]);

    const result = await runAgentsProbe(settings(), { client, store });

    expect(renderReport(result, { metrics: true })).toBe(
      [
        "OK: 1 online agents (over 2 agents)|agents=1;;;2 executors=1;;;3",
        "built-in, 1/2 executors, working",
        "linux-1, 0/1 executors, OFFLINE cause: Agent went offline during the build"
      ].join("\n")
    );
    expect([...(await store.load("jenkins.test"))]).toEqual([
      ["built-in", "online"],
      ["linux-1", "offline"]
    ]);
  });

  it("warns when an agent came back online since the previous run", async () => {
    replyComputers([builtIn, linuxOffline]);
    replyComputers([builtIn, linuxOnline]);

    await runAgentsProbe(settings(), { client, store });
    const result = await runAgentsProbe(settings(), { client, store });

    expect(result.severity).toBe(Severity.WARNING);
    expect(result.message).toBe("Agent linux-1 turned online");
    expect(result.details).toEqual([
      "built-in, 1/2 executors, working",
      "linux-1, 0/1 executors",
      "linux-1: turned online"
    ]);
  });

  it("ignores status changes unless stateful", async () => {
    replyComputers([builtIn, linuxOffline]);
    replyComputers([builtIn, linuxOnline]);

    await runAgentsProbe(settings({ stateful: false }), { client, store });
    const result = await runAgentsProbe(settings({ stateful: false }), { client, store });

    expect(result.severity).toBe(Severity.OK);
    expect(result.message).toBe("2 online agents (over 2 agents)");
    expect((await store.load("jenkins.test")).get("linux-1")).toBe("online");
  });

  it("applies the offline ratio thresholds", async () => {
    replyComputers([builtIn, linuxOffline]);

    const result = await runAgentsProbe(settings({ offline: { critical: 40 } }), { client, store });

    expect(renderReport(result, { metrics: true }).split("\n")[0]).toBe(
      "CRITICAL: 1 agents offline / 2 > 40%|agents=1;;1.2;2 executors=1;;;3"
    );
  });

  it("returns early without saving when the named agent is missing", async () => {
    replyComputers([builtIn, linuxOffline]);

    const result = await runAgentsProbe(settings({ agentName: "nope" }), { client, store });

    expect(result).toEqual({ severity: Severity.OK, message: "No agent named nope", metrics: [], details: [] });
    expect((await store.load("jenkins.test")).size).toBe(0);
  });

  it("turns fetch failures into UNKNOWN through the runner", async () => {
    mockAgent
      .get(BASE)
      .intercept({ path: path => path.startsWith("/computer/api/json"), method: "GET" })
      .reply(500, "boom");
    const sink = createMemorySink();
    const logger = new StructuredLogger({ runId: "run", baseComponent: "cli", level: LogLevel.DEBUG, sinks: [sink] });
    const config: ProbeConfig<"agents"> = {
      kind: "agents",
      http: { baseUrl: BASE, timeoutMs: 1_000, proxy: { mode: "none" } },
      output: { perfdata: true },
      logging: { level: LogLevel.DEBUG, format: "text" },
      probe: settings()
    };

    const result = await runProbe(config, { logger, dispatcher: mockAgent, store });
    await logger.stop();

    expect(result.severity).toBe(Severity.UNKNOWN);
    expect(result.message).toMatch(/^can't get http:\/\/jenkins\.test\/computer\/api\/json\?tree=\S+ \(500/);
    expect(sink.has(LogLevel.ERROR, "probe failed")).toBe(true);
  });
});

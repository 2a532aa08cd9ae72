import { describe, expect, it } from "vitest";
import { ConfigError, Severity } from "@ci-probes/shared";
import { DecodeError, MissingHeaderError, TransportError } from "@ci-probes/jenkins-client";
import {
  exitCodeOf,
  formatMetric,
  formatNumber,
  renderReport,
  unknownResult,
  type ProbeResult
} from "../src/report/reporter";

describe("formatMetric", () => {
  it("keeps empty middle fields and drops trailing ones", () => {
    expect(formatMetric({ label: "agents", value: 3, critical: 3, max: 4 })).toBe("agents=3;;3;4");
    expect(formatMetric({ label: "jobs", value: 12, warning: 10 })).toBe("jobs=12;10");
    expect(formatMetric({ label: "passed", value: 2 })).toBe("passed=2");
  });

  it("prints at most two decimals", () => {
    expect(formatNumber(66.666)).toBe("66.67");
    expect(formatNumber(2.5)).toBe("2.5");
    expect(formatNumber(4)).toBe("4");
  });
});

describe("renderReport", () => {
  const result: ProbeResult = {
    severity: Severity.OK,
    message: "3 online agents (over 4 agents)",
    metrics: [
      { label: "agents", value: 3, critical: 3, max: 4 },
      { label: "executors", value: 1 }
    ],
    details: ["a, 1/2 executors, working", "b, 0/1 executors, OFFLINE"]
  };

  it("renders status, metrics and detail lines", () => {
    expect(renderReport(result, { metrics: true })).toBe(
      "OK: 3 online agents (over 4 agents)|agents=3;;3;4 executors=1\na, 1/2 executors, working\nb, 0/1 executors, OFFLINE"
    );
  });

  it("omits metrics when suppressed", () => {
    expect(renderReport(result, { metrics: false })).toBe(
      "OK: 3 online agents (over 4 agents)\na, 1/2 executors, working\nb, 0/1 executors, OFFLINE"
    );
  });
});

describe("unknownResult", () => {
  it("describes transport failures", () => {
    const result = unknownResult(new TransportError("404 Not Found", "http://jenkins.test/api/json", { status: 404 }));
    expect(result).toEqual({
      severity: Severity.UNKNOWN,
      message: "can't get http://jenkins.test/api/json (404 Not Found)",
      metrics: [],
      details: []
    });
    expect(exitCodeOf(result)).toBe(3);
  });

  it("describes decode failures", () => {
    expect(unknownResult(new DecodeError("invalid JSON: bad token", "http://jenkins.test/api/json")).message).toBe(
      "can't parse JSON content (invalid JSON: bad token) from http://jenkins.test/api/json"
    );
    expect(unknownResult(new MissingHeaderError(["X-Jenkins", "X-Hudson"], "http://jenkins.test/")).message).toBe(
      "can't find X-Jenkins or X-Hudson header in HTTP response"
    );
  });

  it("passes configuration messages through and wraps anything else", () => {
    expect(unknownResult(new ConfigError("Invalid agents probe configuration: /probe/stateDir must NOT have fewer than 1 characters")).message).toBe(
      "Invalid agents probe configuration: /probe/stateDir must NOT have fewer than 1 characters"
    );
    expect(unknownResult(new Error("boom")).message).toBe("internal error (boom)");
    expect(unknownResult("plain").message).toBe("internal error (plain)");
  });
});

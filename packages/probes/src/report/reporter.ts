import { ConfigError, Severity, exitCodeFor, type Verdict } from "@ci-probes/shared";
import { DecodeError, MissingHeaderError, TransportError } from "@ci-probes/jenkins-client";

export interface PerfMetric {
  label: string;
  value: number;
  warning?: number;
  critical?: number;
  max?: number;
}

export interface ProbeResult {
  severity: Severity;
  message: string;
  metrics: PerfMetric[];
  details: string[];
}

export interface RenderOptions {
  metrics: boolean;
}

export function resultFromVerdict(verdict: Verdict, metrics: PerfMetric[] = [], details: string[] = []): ProbeResult {
  return { severity: verdict.severity, message: verdict.message, metrics, details };
}

/** Prints at most two decimals, without trailing zeros. */
export function formatNumber(value: number): string {
  return String(Math.round(value * 100) / 100);
}

/** `label=value;warn;crit;max` with trailing empty fields dropped. */
export function formatMetric(metric: PerfMetric): string {
  const fields = [metric.value, metric.warning, metric.critical, metric.max].map(field =>
    field === undefined ? "" : formatNumber(field)
  );
  while (fields.length > 1 && fields[fields.length - 1] === "") {
    fields.pop();
  }
  return `${metric.label}=${fields.join(";")}`;
}

export function renderReport(result: ProbeResult, options: RenderOptions): string {
  let status = `${result.severity}: ${result.message}`;
  if (options.metrics && result.metrics.length > 0) {
    status += `|${result.metrics.map(formatMetric).join(" ")}`;
  }
  return [status, ...result.details].join("\n");
}

export function exitCodeOf(result: ProbeResult): number {
  return exitCodeFor(result.severity);
}

/** Maps any failure of a probe run to its UNKNOWN result. */
export function unknownResult(error: unknown): ProbeResult {
  return { severity: Severity.UNKNOWN, message: describeFailure(error), metrics: [], details: [] };
}

function describeFailure(error: unknown): string {
  if (error instanceof TransportError) {
    return `can't get ${error.url} (${error.message})`;
  }
  if (error instanceof MissingHeaderError) {
    return error.message;
  }
  if (error instanceof DecodeError) {
    return `can't parse JSON content (${error.message}) from ${error.url}`;
  }
  if (error instanceof ConfigError) {
    return error.message;
  }
  return `internal error (${error instanceof Error ? error.message : String(error)})`;
}

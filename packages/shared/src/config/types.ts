import type { LogLevel } from "../observability";

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

export type ProbeKind = "agents" | "jobs" | "jobTime" | "version";

export type ProxyConfig =
  | { mode: "env" }
  | { mode: "none" }
  | { mode: "explicit"; url: string };

export interface BasicAuthConfig {
  username: string;
  password: string;
}

export interface HttpConfig {
  baseUrl: string;
  timeoutMs: number;
  proxy: ProxyConfig;
  auth?: BasicAuthConfig;
}

export interface OutputConfig {
  perfdata: boolean;
}

export type LogFormat = "json" | "text";

export interface LoggingConfig {
  level: LogLevel;
  format: LogFormat;
  dir?: string;
}

/** Percentages; an absent bound disables its rule. */
export interface PercentThresholds {
  warning?: number;
  critical?: number;
}

export interface CountThresholds {
  warning?: number;
  critical?: number;
}

export interface AgentsProbeConfig {
  agentName?: string;
  stateful: boolean;
  stateDir: string;
  offline: PercentThresholds;
  executors: PercentThresholds;
}

export interface JobsProbeConfig {
  count: CountThresholds;
  failedRatio: PercentThresholds;
}

export interface JobTimeProbeConfig {
  jobName?: string;
  overrun: PercentThresholds;
}

export interface VersionProbeConfig {
  minimum: {
    warning?: string;
    critical?: string;
  };
}

export interface ProbeSettings {
  agents: AgentsProbeConfig;
  jobs: JobsProbeConfig;
  jobTime: JobTimeProbeConfig;
  version: VersionProbeConfig;
}

export interface ProbeConfig<K extends ProbeKind = ProbeKind> {
  kind: K;
  http: HttpConfig;
  output: OutputConfig;
  logging: LoggingConfig;
  probe: ProbeSettings[K];
}

/** One member per probe kind, so that narrowing on `kind` narrows `probe`. */
export type AnyProbeConfig = { [K in ProbeKind]: ProbeConfig<K> }[ProbeKind];

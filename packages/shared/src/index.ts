export * from "./health";
export * from "./observability";
export * from "./errors";
export * from "./env/validator";
export * from "./env/schema";
export { assertProbeConfig, validateProbeConfig } from "./config/loader";
export type {
  AgentsProbeConfig,
  AnyProbeConfig,
  BasicAuthConfig,
  CountThresholds,
  HttpConfig,
  JobTimeProbeConfig,
  JobsProbeConfig,
  LogFormat,
  LoggingConfig,
  OutputConfig,
  PercentThresholds,
  ProbeConfig,
  ProbeKind,
  ProbeSettings,
  ProxyConfig,
  ValidationResult,
  VersionProbeConfig
} from "./config/types";

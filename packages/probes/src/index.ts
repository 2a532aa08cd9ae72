export * from "./agents/snapshot";
export * from "./agents/aggregator";
export * from "./agents/stateStore";
export * from "./agents/transitions";
export * from "./agents/thresholds";
export * from "./agents/probe";
export * from "./jobs/probe";
export * from "./jobTime/probe";
export * from "./version/probe";
export * from "./report/reporter";
export type { JenkinsApi, ProbeContext } from "./context";
export { runProbe } from "./runner";

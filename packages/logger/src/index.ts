export { StructuredLogger } from "./structuredLogger";
export type { ComponentLogger, StructuredLoggerOptions } from "./structuredLogger";
export { createProbeLogger } from "./factory";
export type { ProbeLoggerOptions } from "./factory";
export { createConsoleSink, formatText } from "./sinks/consoleSink";
export { createFileSink } from "./sinks/fileSink";
export { createMemorySink } from "./sinks/memorySink";
export type { MemorySink } from "./sinks/memorySink";
export { redactPayload } from "./redaction";
export type { LogSink } from "./sinks/types";

import { nanoid } from "nanoid";
import type { LoggingConfig } from "@ci-probes/shared";
import { StructuredLogger } from "./structuredLogger";
import { createConsoleSink } from "./sinks/consoleSink";
import { createFileSink } from "./sinks/fileSink";
import type { LogSink } from "./sinks/types";

export interface ProbeLoggerOptions {
  component: string;
  runId?: string;
  extraSinks?: LogSink[];
  defaultContext?: Record<string, unknown>;
}

/**
 * Builds the logger for one probe run: a stderr console sink, plus a JSON
 * lines file sink when a log directory is configured.
 */
export function createProbeLogger(config: LoggingConfig, options: ProbeLoggerOptions): StructuredLogger {
  const runId = options.runId ?? nanoid(10);
  const sinks: LogSink[] = [createConsoleSink({ level: config.level, format: config.format })];
  if (config.dir) {
    sinks.push(createFileSink({ runId, level: config.level, outputDir: config.dir, logger: console }));
  }
  sinks.push(...(options.extraSinks ?? []));
  return new StructuredLogger({
    runId,
    baseComponent: options.component,
    level: config.level,
    sinks,
    defaultContext: options.defaultContext
  });
}

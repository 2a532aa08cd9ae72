import { LogLevel, shouldLog, type LogFormat, type StructuredLogEvent } from "@ci-probes/shared";
import type { LogSink } from "./types";

interface ConsoleSinkOptions {
  level: LogLevel;
  format?: LogFormat;
  consoleImpl?: Pick<Console, "debug" | "info" | "warn" | "error">;
}

// stdout carries the probe report, so diagnostics always go to stderr.
const stderrConsole = new console.Console({ stdout: process.stderr, stderr: process.stderr });

export function formatText(event: StructuredLogEvent): string {
  const context = event.payload && Object.keys(event.payload).length
    ? " " + Object.entries(event.payload)
      .map(([key, value]) => `${key}=${typeof value === "string" ? value : JSON.stringify(value)}`)
      .join(" ")
    : "";
  return `[${event.level}] ${event.component}: ${event.event}${context}`;
}

export function createConsoleSink(options: ConsoleSinkOptions): LogSink {
  const consoleImpl = options.consoleImpl ?? stderrConsole;
  const format = options.format ?? "text";
  return {
    name: "console",
    level: options.level,
    async publish(event: StructuredLogEvent) {
      if (!shouldLog(event.level, options.level)) {
        return;
      }
      const line = format === "json" ? JSON.stringify(event) : formatText(event);
      switch (event.level) {
        case LogLevel.DEBUG:
          consoleImpl.debug(line);
          break;
        case LogLevel.WARN:
          consoleImpl.warn(line);
          break;
        case LogLevel.ERROR:
        case LogLevel.CRITICAL:
          consoleImpl.error(line);
          break;
        default:
          consoleImpl.info(line);
      }
    }
  };
}

import { LogLevel, shouldLog, type StructuredLogEvent } from "@ci-probes/shared";
import type { LogSink } from "./types";

export interface MemorySink extends LogSink {
  readonly events: StructuredLogEvent[];
  has(level: LogLevel, event: string): boolean;
}

export function createMemorySink(level: LogLevel = LogLevel.DEBUG): MemorySink {
  const events: StructuredLogEvent[] = [];
  return {
    name: "memory",
    level,
    events,
    async publish(event: StructuredLogEvent) {
      if (shouldLog(event.level, level)) {
        events.push(event);
      }
    },
    has(target: LogLevel, event: string) {
      return events.some(entry => entry.level === target && entry.event === event);
    }
  };
}

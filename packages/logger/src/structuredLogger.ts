import {
  LogLevel,
  createStructuredEvent,
  shouldLog,
  type StructuredLogEvent
} from "@ci-probes/shared";
import { redactPayload } from "./redaction";
import type { LogSink } from "./sinks/types";

export interface StructuredLoggerOptions {
  runId: string;
  baseComponent: string;
  level: LogLevel;
  sinks: LogSink[];
  queueSize?: number;
  defaultContext?: Record<string, unknown>;
  onDrop?: (event: StructuredLogEvent) => void;
}

interface LogOptions {
  component?: string;
}

export type ComponentLogger = Pick<StructuredLogger, "log" | "child">;

export class StructuredLogger {
  private readonly queue: StructuredLogEvent[] = [];
  private draining: Promise<void> | null = null;
  private stopped = false;
  private readonly queueSize: number;
  private readonly defaultContext: Record<string, unknown>;

  constructor(private readonly options: StructuredLoggerOptions) {
    this.queueSize = Math.max(100, options.queueSize ?? 1000);
    this.defaultContext = options.defaultContext ?? {};
  }

  get runId(): string {
    return this.options.runId;
  }

  async start() {
    await Promise.all(
      this.options.sinks.map(async sink => {
        if (sink.start) {
          await sink.start();
        }
      })
    );
  }

  async stop() {
    await this.flushOutstanding();
    this.stopped = true;
    await Promise.all(
      this.options.sinks.map(async sink => {
        if (sink.stop) {
          await sink.stop();
        }
      })
    );
  }

  async flushOutstanding() {
    while (this.queue.length > 0 || this.draining) {
      await (this.draining ?? this.drainQueue());
    }
    await Promise.all(
      this.options.sinks.map(async sink => {
        if (sink.flush) {
          await sink.flush();
        }
      })
    );
  }

  log(
    level: LogLevel,
    event: string,
    payload?: Record<string, unknown>,
    logOptions?: LogOptions
  ) {
    if (this.stopped) {
      return;
    }
    if (!shouldLog(level, this.options.level)) {
      return;
    }
    const structured = createStructuredEvent({
      runId: this.options.runId,
      component: logOptions?.component ?? this.options.baseComponent,
      level,
      event,
      payload: redactPayload({ ...this.defaultContext, ...payload })
    });
    if (this.queue.length >= this.queueSize) {
      this.options.onDrop?.(structured);
      return;
    }
    this.queue.push(structured);
    if (!this.draining) {
      void this.drainQueue();
    }
  }

  child(component: string, defaultContext?: Record<string, unknown>): ComponentLogger {
    const mergedContext = {
      ...this.defaultContext,
      ...(defaultContext ?? {})
    };
    return {
      log: (level, event, payload, options) => {
        this.log(
          level,
          event,
          { ...mergedContext, ...payload },
          { ...options, component }
        );
      },
      child: (nextComponent: string, childContext?: Record<string, unknown>) => {
        return this.child(nextComponent, {
          ...mergedContext,
          ...(childContext ?? {})
        });
      }
    };
  }

  private drainQueue(): Promise<void> {
    if (this.draining) {
      return this.draining;
    }
    this.draining = this.publishQueued().finally(() => {
      this.draining = null;
    });
    return this.draining;
  }

  private async publishQueued() {
    let next = this.queue.shift();
    while (next) {
      const event = next;
      await Promise.allSettled(
        this.options.sinks.map(async sink => {
          try {
            await sink.publish(event);
          } catch (error) {
            if (sink.name === "console") {
              return;
            }
            process.stderr.write(
              `[structured-logger] sink ${sink.name} failed: ${error instanceof Error ? error.message : String(error)}\n`
            );
          }
        })
      );
      next = this.queue.shift();
    }
  }
}

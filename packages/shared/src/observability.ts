export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
  CRITICAL = "critical"
}

export const LOG_LEVELS: readonly LogLevel[] = [
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
  LogLevel.CRITICAL
];

const levelOrder: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
  [LogLevel.CRITICAL]: 50
};

export function shouldLog(target: LogLevel, minimum: LogLevel): boolean {
  return levelOrder[target] >= levelOrder[minimum];
}

export function parseLogLevel(value: string): LogLevel | undefined {
  return LOG_LEVELS.find(level => level === value.trim().toLowerCase());
}

export interface StructuredLogEvent<TPayload = Record<string, unknown>> {
  runId: string;
  component: string;
  event: string;
  level: LogLevel;
  timestamp: number;
  payload?: TPayload;
}

interface StructuredEventOptions<TPayload> {
  runId: string;
  component: string;
  level: LogLevel;
  event: string;
  payload?: TPayload;
  timestamp?: number;
}

export function createStructuredEvent<TPayload = Record<string, unknown>>(
  options: StructuredEventOptions<TPayload>
): StructuredLogEvent<TPayload> {
  return {
    runId: options.runId,
    component: options.component,
    level: options.level,
    event: options.event,
    timestamp: options.timestamp ?? Date.now(),
    payload: options.payload
  };
}

export interface ExecutorPayload {
  idle: boolean;
}

export interface OfflineCausePayload {
  description?: string | null;
}

export interface ComputerPayload {
  displayName: string;
  executors?: ExecutorPayload[];
  idle?: boolean;
  offline: boolean;
  offlineCause?: OfflineCausePayload | null;
  temporarilyOffline?: boolean;
}

export interface ComputerSetPayload {
  computer: ComputerPayload[];
}

export interface JobSummaryPayload {
  name: string;
  color?: string;
  url?: string;
}

export interface JobListPayload {
  jobs: JobSummaryPayload[];
}

export interface BuildRefPayload {
  number: number;
  url?: string;
}

export interface JobPayload {
  name: string;
  buildable?: boolean;
  lastBuild?: BuildRefPayload | null;
  lastCompletedBuild?: BuildRefPayload | null;
}

export interface BuildPayload {
  building: boolean;
  timestamp: number;
  estimatedDuration?: number;
}

export interface PluginPayload {
  longName: string;
  version: string;
  active?: boolean;
  enabled?: boolean;
  hasUpdate?: boolean;
}

export interface PluginListPayload {
  plugins: PluginPayload[];
}

export interface PayloadTypes {
  computers: ComputerSetPayload;
  jobs: JobListPayload;
  job: JobPayload;
  build: BuildPayload;
  plugins: PluginListPayload;
}

export type PayloadKind = keyof PayloadTypes;

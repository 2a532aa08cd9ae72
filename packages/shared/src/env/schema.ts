import type { ProbeKind } from "../config/types";

export const ENV_PREFIX = "JENKINS_PROBE_";

export type EnvSchema = {
  known: string[];
  secret?: string[];
};

const COMMON_VARS = [
  "DEBUG",
  "TIMEOUT",
  "PROXY",
  "NOPROXY",
  "NOPERFDATA",
  "USER",
  "PASSWORD",
  "LOG_LEVEL",
  "LOG_FORMAT",
  "LOG_DIR"
];

export const ENV_SCHEMAS: Record<ProbeKind, EnvSchema> = {
  agents: {
    known: [
      ...COMMON_VARS,
      "STATEFUL",
      "STATEFULL",
      "STATE_DIR",
      "WARNING",
      "CRITICAL",
      "EXECUTOR_WARN",
      "EXECUTOR_CRIT",
      "AGENT_NAME",
      "SLAVE_NAME"
    ],
    secret: ["PASSWORD"]
  },
  jobs: {
    known: [...COMMON_VARS, "WARNING", "CRITICAL", "FAILEDWARN", "FAILEDCRIT"],
    secret: ["PASSWORD"]
  },
  jobTime: {
    known: [...COMMON_VARS, "WARNING", "CRITICAL", "JOB"],
    secret: ["PASSWORD"]
  },
  version: {
    known: [...COMMON_VARS, "WARNING", "CRITICAL"],
    secret: ["PASSWORD"]
  }
};

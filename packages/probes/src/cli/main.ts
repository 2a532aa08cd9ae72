#!/usr/bin/env node
import os from "node:os";
import yargs, { type Argv } from "yargs";
import { hideBin } from "yargs/helpers";
import type { Dispatcher } from "undici";
import {
  ConfigError,
  ENV_PREFIX,
  ENV_SCHEMAS,
  LOG_LEVELS,
  LogLevel,
  assertEnvVars,
  assertProbeConfig,
  getUnknownEnvVars,
  parseLogLevel,
  type AnyProbeConfig,
  type HttpConfig,
  type LogFormat,
  type LoggingConfig,
  type ProbeKind,
  type ProxyConfig
} from "@ci-probes/shared";
import { createProbeLogger, type LogSink, type StructuredLogger } from "@ci-probes/logger";
import type { AgentStateStore } from "../agents/stateStore";
import { exitCodeOf, renderReport, unknownResult, type ProbeResult } from "../report/reporter";
import { runProbe } from "../runner";

type EnvSource = Record<string, string | undefined>;

export interface CliDependencies {
  env?: EnvSource;
  dispatcher?: Dispatcher;
  store?: AgentStateStore;
  now?: () => number;
  write?: (text: string) => void;
  extraSinks?: LogSink[];
}

interface CommonArgs {
  url: string;
  debug: boolean;
  timeout: number;
  proxy?: string;
  noproxy: boolean;
  noperfdata: boolean;
  user?: string;
  password?: string;
  "log-level": string;
  "log-format": string;
  "log-dir"?: string;
}

const COMMAND_KINDS: Record<string, ProbeKind> = {
  agents: "agents",
  jobs: "jobs",
  "job-time": "jobTime",
  version: "version"
};

/** `-1` is the documented way to switch a threshold off. */
function threshold(value: number | undefined): number | undefined {
  return value === undefined || value === -1 ? undefined : value;
}

function versionThreshold(value: string | undefined): string | undefined {
  return value === undefined || value === "" || value === "-1" ? undefined : value;
}

function logFormat(value: string): LogFormat {
  return value === "json" ? "json" : "text";
}

function proxyConfig(args: CommonArgs): ProxyConfig {
  if (args.proxy) {
    return { mode: "explicit", url: args.proxy };
  }
  return args.noproxy ? { mode: "none" } : { mode: "env" };
}

function httpConfig(args: CommonArgs): HttpConfig {
  const http: HttpConfig = {
    baseUrl: args.url,
    timeoutMs: Math.round(args.timeout * 1000),
    proxy: proxyConfig(args)
  };
  if (args.user !== undefined) {
    http.auth = { username: args.user, password: args.password ?? "" };
  }
  return http;
}

function loggingConfig(args: CommonArgs): LoggingConfig {
  return {
    level: args.debug ? LogLevel.DEBUG : parseLogLevel(args["log-level"]) ?? LogLevel.WARN,
    format: logFormat(args["log-format"]),
    dir: args["log-dir"]
  };
}

function baseConfig(args: CommonArgs) {
  return {
    http: httpConfig(args),
    output: { perfdata: !args.noperfdata },
    logging: loggingConfig(args)
  };
}

/**
 * Option values taken from the probe's known `JENKINS_PROBE_*` variables,
 * e.g. `JENKINS_PROBE_EXECUTOR_WARN` for `--executor-warn`. Command line
 * values and the `--config` file take precedence.
 */
export function envOptions(kind: ProbeKind, env: EnvSource): Record<string, string> {
  const known = new Set(ENV_SCHEMAS[kind].known);
  const options: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value === undefined || !key.startsWith(ENV_PREFIX)) {
      continue;
    }
    const name = key.slice(ENV_PREFIX.length);
    if (known.has(name)) {
      options[name.toLowerCase().replace(/_/g, "-")] = value;
    }
  }
  return options;
}

function withCommonOptions<T>(argv: Argv<T>, defaults: Record<string, string>) {
  return argv
    .config(defaults)
    .positional("url", { type: "string", demandOption: true, describe: "Jenkins base url" })
    .option("debug", { alias: "d", type: "boolean", default: false, describe: "Log debug traces to stderr" })
    .option("timeout", { alias: "t", type: "number", default: 10, describe: "Request timeout in seconds" })
    .option("proxy", { type: "string", describe: "Proxy url for HTTP requests" })
    .option("noproxy", { type: "boolean", default: false, describe: "Ignore HTTP_PROXY and friends" })
    .option("noperfdata", { type: "boolean", default: false, describe: "Do not output performance data" })
    .option("user", { alias: "u", type: "string", describe: "User for HTTP basic authentication" })
    .option("password", { alias: "p", type: "string", describe: "Password for HTTP basic authentication" })
    .option("log-level", {
      type: "string",
      choices: [...LOG_LEVELS],
      default: LogLevel.WARN,
      describe: "Minimum level of log lines; --debug lowers it to debug"
    })
    .option("log-format", {
      type: "string",
      choices: ["text", "json"],
      default: "text",
      describe: "Format of log lines on stderr"
    })
    .option("log-dir", { type: "string", describe: "Also write JSON log lines to this directory" });
}

class CliRun {
  result?: ProbeResult;
  perfdata = true;

  constructor(private readonly deps: CliDependencies) {}

  async execute(build: () => AnyProbeConfig): Promise<void> {
    let logger: StructuredLogger | undefined;
    try {
      const config = assertProbeConfig(build());
      this.perfdata = config.output.perfdata;
      logger = createProbeLogger(config.logging, {
        component: "cli",
        extraSinks: this.deps.extraSinks,
        defaultContext: { probe: config.kind }
      });
      await logger.start();
      for (const name of getUnknownEnvVars(config.kind, this.deps.env ?? process.env)) {
        logger.log(LogLevel.WARN, "unknown environment variable", { name });
      }
      this.result = await runProbe(config, {
        logger,
        dispatcher: this.deps.dispatcher,
        store: this.deps.store,
        now: this.deps.now
      });
    } catch (error) {
      this.result = unknownResult(error);
    } finally {
      await logger?.stop();
    }
  }
}

export function buildCli(argv: string[], run: CliRun, env: EnvSource) {
  return yargs(argv)
    .scriptName("jenkins-probe")
    .config("config", "JSON file with option values")
    .middleware(args => {
      const command = args._[0];
      const kind = typeof command === "string" ? COMMAND_KINDS[command] : undefined;
      if (kind) {
        assertEnvVars(kind, env);
      }
    }, true)
    .command(
      "agents <url>",
      "Check agent availability, executor usage and status changes",
      builder =>
        withCommonOptions(builder, envOptions("agents", env))
          .option("stateful", {
            alias: ["s", "statefull"],
            type: "boolean",
            default: false,
            describe: "Report agents that changed status since the previous run"
          })
          .option("state-dir", { type: "string", default: os.tmpdir(), describe: "Directory of the status files" })
          .option("warning", { alias: "w", type: "number", default: -1, describe: "Offline agents % for WARNING" })
          .option("critical", { alias: "c", type: "number", default: -1, describe: "Offline agents % for CRITICAL" })
          .option("executor-warn", { type: "number", default: -1, describe: "Running executors % for WARNING" })
          .option("executor-crit", { type: "number", default: -1, describe: "Running executors % for CRITICAL" })
          .option("agent-name", { alias: ["n", "slave-name"], type: "string", describe: "Only check this agent" }),
      args =>
        run.execute(() => ({
          kind: "agents",
          ...baseConfig(args),
          probe: {
            agentName: args["agent-name"],
            stateful: args.stateful,
            stateDir: args["state-dir"],
            offline: { warning: threshold(args.warning), critical: threshold(args.critical) },
            executors: { warning: threshold(args["executor-warn"]), critical: threshold(args["executor-crit"]) }
          }
        }))
    )
    .command(
      "jobs <url>",
      "Check the number of jobs and the ratio of failed ones",
      builder =>
        withCommonOptions(builder, envOptions("jobs", env))
          .option("warning", { alias: "w", type: "number", default: -1, describe: "Jobs count for WARNING" })
          .option("critical", { alias: "c", type: "number", default: -1, describe: "Jobs count for CRITICAL" })
          .option("failedwarn", { type: "number", default: -1, describe: "Failed jobs % for WARNING" })
          .option("failedcrit", { type: "number", default: -1, describe: "Failed jobs % for CRITICAL" }),
      args =>
        run.execute(() => ({
          kind: "jobs",
          ...baseConfig(args),
          probe: {
            count: { warning: threshold(args.warning), critical: threshold(args.critical) },
            failedRatio: { warning: threshold(args.failedwarn), critical: threshold(args.failedcrit) }
          }
        }))
    )
    .command(
      "job-time <url>",
      "Check running builds against their usual duration",
      builder =>
        withCommonOptions(builder, envOptions("jobTime", env))
          .option("warning", { alias: "w", type: "number", default: -1, describe: "Overrun % for WARNING" })
          .option("critical", { alias: "c", type: "number", default: -1, describe: "Overrun % for CRITICAL" })
          .option("job", { alias: "j", type: "string", describe: "Only check this job" }),
      args =>
        run.execute(() => ({
          kind: "jobTime",
          ...baseConfig(args),
          probe: {
            jobName: args.job,
            overrun: { warning: threshold(args.warning), critical: threshold(args.critical) }
          }
        }))
    )
    .command(
      "version <url>",
      "Check the Jenkins version and plugins waiting for an update",
      builder =>
        withCommonOptions(builder, envOptions("version", env))
          .option("warning", { alias: "w", type: "string", describe: "Minimum version for OK" })
          .option("critical", { alias: "c", type: "string", describe: "Minimum version for WARNING" }),
      args =>
        run.execute(() => ({
          kind: "version",
          ...baseConfig(args),
          probe: {
            minimum: { warning: versionThreshold(args.warning), critical: versionThreshold(args.critical) }
          }
        }))
    )
    .demandCommand(1, "Missing probe command")
    .fail((message, error) => {
      throw error ?? new ConfigError(message);
    })
    .exitProcess(false)
    .help()
    .version()
    .strict();
}

/** Runs the CLI and returns the exit code; the report goes to `write`. */
export async function main(argv: string[] = hideBin(process.argv), deps: CliDependencies = {}): Promise<number> {
  const write: (text: string) => void =
    deps.write ??
    (text => {
      process.stdout.write(text);
    });
  const run = new CliRun(deps);
  try {
    await buildCli(argv, run, deps.env ?? process.env).parseAsync();
  } catch (error) {
    run.result = unknownResult(error);
  }
  // --help and --version print their own output and run no probe.
  if (!run.result) {
    return 0;
  }
  write(`${renderReport(run.result, { metrics: run.perfdata })}\n`);
  return exitCodeOf(run.result);
}

if (require.main === module) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      process.stdout.write(`${renderReport(unknownResult(error), { metrics: false })}\n`);
      process.exitCode = 3;
    });
}

export { CliRun };

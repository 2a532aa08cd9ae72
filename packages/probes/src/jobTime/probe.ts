import {
  LogLevel,
  Severity,
  escalate,
  okVerdict,
  type JobTimeProbeConfig,
  type PercentThresholds,
  type Verdict
} from "@ci-probes/shared";
import { API_SUFFIX } from "@ci-probes/jenkins-client";
import { resultFromVerdict, type ProbeResult } from "../report/reporter";
import type { ProbeContext } from "../context";

export const JOB_LIST_TREE = "jobs[name,url]";
export const JOB_TREE = "name,buildable,lastBuild[number,url],lastCompletedBuild[number]";
export const BUILD_TREE = "building,timestamp,estimatedDuration";
export const DEFAULT_USUAL_DURATION_MS = 20 * 60 * 1000;

export interface RunningBuild {
  jobName: string;
  number: number;
  durationMs: number;
  usualDurationMs: number;
}

export function apiPath(url: string): string {
  return `${url.replace(/\/+$/, "")}${API_SUFFIX}`;
}

export function jobPath(name: string): string {
  return `/job/${encodeURIComponent(name)}`;
}

export function usualDuration(estimatedDuration: number | undefined): number {
  return estimatedDuration !== undefined && estimatedDuration > 0 ? estimatedDuration : DEFAULT_USUAL_DURATION_MS;
}

export function evaluateBuildDuration(build: RunningBuild, overrun: PercentThresholds): Verdict {
  const exceeds = (pct: number) => build.durationMs > build.usualDurationMs * (1 + pct / 100);
  const message = (level: string, pct: number) =>
    `job: ${build.jobName}, build=${build.number}, duration=${build.durationMs}ms exceeds ${level} threshold (${pct}%) of usual duration=${build.usualDurationMs}ms`;
  if (overrun.critical !== undefined && exceeds(overrun.critical)) {
    return { severity: Severity.CRITICAL, message: message("critical", overrun.critical) };
  }
  if (overrun.warning !== undefined && exceeds(overrun.warning)) {
    return { severity: Severity.WARNING, message: message("warning", overrun.warning) };
  }
  return okVerdict();
}

/** Returns the running build of a job, or undefined when nothing is building. */
export async function findRunningBuild(jobUrl: string, context: ProbeContext): Promise<RunningBuild | undefined> {
  const logger = context.logger;
  const job = await context.client.getJson("job", apiPath(jobUrl), JOB_TREE);
  if (job.buildable === false) {
    logger?.log(LogLevel.DEBUG, "job skipped", { job: job.name, reason: "disabled" });
    return undefined;
  }
  const lastBuild = job.lastBuild;
  if (!lastBuild) {
    logger?.log(LogLevel.DEBUG, "job skipped", { job: job.name, reason: "no build" });
    return undefined;
  }
  if (job.lastCompletedBuild?.number === lastBuild.number) {
    logger?.log(LogLevel.DEBUG, "job skipped", { job: job.name, build: lastBuild.number, reason: "completed" });
    return undefined;
  }

  const buildUrl = lastBuild.url ?? `${jobUrl.replace(/\/+$/, "")}/${lastBuild.number}`;
  const build = await context.client.getJson("build", apiPath(buildUrl), BUILD_TREE);
  if (!build.building) {
    logger?.log(LogLevel.DEBUG, "job skipped", { job: job.name, build: lastBuild.number, reason: "not building" });
    return undefined;
  }
  const now = context.now ?? Date.now;
  return {
    jobName: job.name,
    number: lastBuild.number,
    durationMs: now() - build.timestamp,
    usualDurationMs: usualDuration(build.estimatedDuration)
  };
}

async function listJobUrls(context: ProbeContext): Promise<string[]> {
  const { jobs } = await context.client.getJson("jobs", API_SUFFIX, JOB_LIST_TREE);
  return jobs.map(job => job.url ?? jobPath(job.name));
}

/**
 * Checks how long running builds have been going compared to their
 * estimated duration. Every job is inspected and the worst verdict wins.
 */
export async function runJobTimeProbe(settings: JobTimeProbeConfig, context: ProbeContext): Promise<ProbeResult> {
  const jobUrls = settings.jobName !== undefined ? [jobPath(settings.jobName)] : await listJobUrls(context);

  let verdict = okVerdict(`job: ${settings.jobName ?? "(All)"}`);
  const details: string[] = [];
  let running = 0;
  for (const jobUrl of jobUrls) {
    const build = await findRunningBuild(jobUrl, context);
    if (!build) {
      continue;
    }
    running += 1;
    details.push(
      `${build.jobName}, build=${build.number}, duration=${build.durationMs}ms, usual duration=${build.usualDurationMs}ms`
    );
    verdict = escalate(verdict, evaluateBuildDuration(build, settings.overrun));
  }

  return resultFromVerdict(verdict, [{ label: "running", value: running }], details);
}

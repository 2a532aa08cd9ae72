import { LogLevel, Severity, okVerdict, type JobsProbeConfig, type Verdict } from "@ci-probes/shared";
import { API_SUFFIX, type JobSummaryPayload } from "@ci-probes/jenkins-client";
import { formatNumber, resultFromVerdict, type PerfMetric, type ProbeResult } from "../report/reporter";
import type { ProbeContext } from "../context";

export const JOBS_TREE = "jobs[color,name]";

export interface JobCounts {
  total: number;
  passed: number;
  failed: number;
  disabled: number;
  /** Active jobs that are neither passed nor failed: building, aborted, never built. */
  running: number;
}

export function countJobs(jobs: readonly JobSummaryPayload[]): JobCounts {
  let passed = 0;
  let failed = 0;
  let disabled = 0;
  for (const job of jobs) {
    switch (job.color) {
      case "blue":
        passed += 1;
        break;
      case "red":
        failed += 1;
        break;
      case "disabled":
        disabled += 1;
        break;
      default:
        break;
    }
  }
  const active = jobs.length - disabled;
  return { total: jobs.length, passed, failed, disabled, running: active - passed - failed };
}

export function failedRatio(counts: JobCounts): number {
  const active = counts.total - counts.disabled;
  return active > 0 ? (counts.failed * 100) / active : 0;
}

export function evaluateJobCounts(counts: JobCounts, settings: JobsProbeConfig): Verdict {
  const { count, failedRatio: ratioThresholds } = settings;
  if (count.critical !== undefined && counts.total > count.critical) {
    return {
      severity: Severity.CRITICAL,
      message: `jobs count: ${counts.total} exceeds critical threshold: ${count.critical}`
    };
  }
  if (count.warning !== undefined && counts.total > count.warning) {
    return {
      severity: Severity.WARNING,
      message: `jobs count: ${counts.total} exceeds warning threshold: ${count.warning}`
    };
  }
  const ratio = failedRatio(counts);
  const ratioMessage = `jobs count: ${counts.total}, failed jobs ratio: ${formatNumber(ratio)}%`;
  if (ratioThresholds.critical !== undefined && ratio > ratioThresholds.critical) {
    return { severity: Severity.CRITICAL, message: ratioMessage };
  }
  if (ratioThresholds.warning !== undefined && ratio > ratioThresholds.warning) {
    return { severity: Severity.WARNING, message: ratioMessage };
  }
  return okVerdict(`jobs count: ${counts.total}`);
}

export function jobMetrics(counts: JobCounts, settings: JobsProbeConfig): PerfMetric[] {
  return [
    { label: "jobs", value: counts.total, warning: settings.count.warning, critical: settings.count.critical },
    { label: "passed", value: counts.passed },
    { label: "failed", value: counts.failed },
    { label: "disabled", value: counts.disabled },
    { label: "running", value: counts.running }
  ];
}

export async function runJobsProbe(settings: JobsProbeConfig, context: ProbeContext): Promise<ProbeResult> {
  const payload = await context.client.getJson("jobs", API_SUFFIX, JOBS_TREE);
  const counts = countJobs(payload.jobs);
  context.logger?.log(LogLevel.DEBUG, "jobs counted", { ...counts });
  return resultFromVerdict(evaluateJobCounts(counts, settings), jobMetrics(counts, settings));
}

import { LogLevel, Severity, okVerdict, type Verdict, type VersionProbeConfig } from "@ci-probes/shared";
import { API_SUFFIX, type PluginPayload } from "@ci-probes/jenkins-client";
import { resultFromVerdict, type PerfMetric, type ProbeResult } from "../report/reporter";
import type { ProbeContext } from "../context";

export const VERSION_HEADERS = ["X-Jenkins", "X-Hudson"];
export const PLUGIN_MANAGER_PATH = `/pluginManager${API_SUFFIX}`;
export const PLUGINS_TREE = "plugins[active,enabled,hasUpdate,longName,version]";
/** First release whose plugin manager exposes `hasUpdate`. */
export const PLUGIN_QUERY_MIN_VERSION = "1.466";

function segments(version: string): number[] {
  return version
    .trim()
    .split(".")
    .map(part => {
      const numeric = Number.parseInt(part, 10);
      return Number.isNaN(numeric) ? 0 : numeric;
    });
}

/** Numeric, segment by segment; missing segments count as zero. */
export function compareVersions(a: string, b: string): number {
  const left = segments(a);
  const right = segments(b);
  for (let i = 0; i < Math.max(left.length, right.length); i += 1) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) {
      return diff < 0 ? -1 : 1;
    }
  }
  return 0;
}

export function evaluateVersion(version: string, settings: VersionProbeConfig): Verdict {
  const { critical, warning } = settings.minimum;
  if (critical !== undefined && compareVersions(version, critical) < 0) {
    return { severity: Severity.CRITICAL, message: `Jenkins version: ${version} < crit: ${critical}` };
  }
  if (warning !== undefined && compareVersions(version, warning) < 0) {
    return { severity: Severity.WARNING, message: `Jenkins version: ${version} < warn: ${warning}` };
  }
  return okVerdict(`Jenkins version: ${version}`);
}

export function pluginsNeedingUpdate(plugins: readonly PluginPayload[]): PluginPayload[] {
  return plugins.filter(plugin => plugin.enabled === true && plugin.active === true && plugin.hasUpdate === true);
}

export async function runVersionProbe(settings: VersionProbeConfig, context: ProbeContext): Promise<ProbeResult> {
  const header = await context.client.requireHeader("/", VERSION_HEADERS);
  const version = header.value;
  context.logger?.log(LogLevel.DEBUG, "version header read", { header: header.name, version });
  const verdict = evaluateVersion(version, settings);

  if (compareVersions(version, PLUGIN_QUERY_MIN_VERSION) < 0) {
    return resultFromVerdict(verdict);
  }

  const { plugins } = await context.client.getJson("plugins", PLUGIN_MANAGER_PATH, PLUGINS_TREE);
  const outdated = pluginsNeedingUpdate(plugins);
  const metrics: PerfMetric[] = [
    { label: "plugins", value: plugins.length },
    { label: "updates", value: outdated.length }
  ];
  return resultFromVerdict(
    {
      severity: verdict.severity,
      message: `${verdict.message} ${plugins.length} plugins installed (${outdated.length} need update)`
    },
    metrics,
    outdated.map(plugin => `${plugin.longName}, v=${plugin.version}`)
  );
}

export enum Severity {
  OK = "OK",
  WARNING = "WARNING",
  CRITICAL = "CRITICAL",
  UNKNOWN = "UNKNOWN"
}

/**
 * Severities a threshold rule can produce. UNKNOWN sits outside this order and
 * is reserved for fetch, decode and internal failures.
 */
export type GradedSeverity = Severity.OK | Severity.WARNING | Severity.CRITICAL;

export const EXIT_CODES: Record<Severity, number> = {
  [Severity.OK]: 0,
  [Severity.WARNING]: 1,
  [Severity.CRITICAL]: 2,
  [Severity.UNKNOWN]: 3
};

const severityOrder: Record<GradedSeverity, number> = {
  [Severity.OK]: 0,
  [Severity.WARNING]: 1,
  [Severity.CRITICAL]: 2
};

export interface Verdict {
  severity: GradedSeverity;
  message: string;
}

export function okVerdict(message = ""): Verdict {
  return { severity: Severity.OK, message };
}

function compareSeverity(a: GradedSeverity, b: GradedSeverity): number {
  return severityOrder[a] - severityOrder[b];
}

export function isMoreSevere(candidate: GradedSeverity, current: GradedSeverity): boolean {
  return compareSeverity(candidate, current) > 0;
}

/**
 * Max-severity-wins reduction. On a tie the verdict already held is kept, so
 * the first rule to reach a level owns the message.
 */
export function escalate(current: Verdict, candidate: Verdict): Verdict {
  return isMoreSevere(candidate.severity, current.severity) ? candidate : current;
}

export function worstVerdict(verdicts: Iterable<Verdict>, initial: Verdict = okVerdict()): Verdict {
  let worst = initial;
  for (const verdict of verdicts) {
    worst = escalate(worst, verdict);
  }
  return worst;
}

export function exitCodeFor(severity: Severity): number {
  return EXIT_CODES[severity];
}

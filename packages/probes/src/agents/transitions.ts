import { Severity, isMoreSevere, okVerdict, type GradedSeverity, type Verdict } from "@ci-probes/shared";
import type { SimpleStatus, StatusMap } from "./snapshot";

export type TransitionKind = "unchanged" | "turnedOffline" | "turnedOnline" | "appeared" | "removed";

export interface Transition {
  kind: TransitionKind;
  name: string;
  /** Current status, or the last stored one for removed agents. */
  status: SimpleStatus;
}

const TRANSITION_SEVERITY: Record<TransitionKind, GradedSeverity> = {
  unchanged: Severity.OK,
  turnedOffline: Severity.CRITICAL,
  turnedOnline: Severity.WARNING,
  appeared: Severity.WARNING,
  removed: Severity.WARNING
};

export function transitionSeverity(transition: Transition): GradedSeverity {
  return TRANSITION_SEVERITY[transition.kind];
}

export function transitionMessage(transition: Transition): string {
  switch (transition.kind) {
    case "turnedOffline":
      return `Agent ${transition.name} turned offline`;
    case "turnedOnline":
      return `Agent ${transition.name} turned online`;
    case "appeared":
      return `New ${transition.name} agent (${transition.status})`;
    case "removed":
      return `Agent ${transition.name} removed`;
    case "unchanged":
      return "";
  }
}

export function transitionDetail(transition: Transition): string | undefined {
  switch (transition.kind) {
    case "turnedOffline":
      return `${transition.name}: turned offline`;
    case "turnedOnline":
      return `${transition.name}: turned online`;
    case "appeared":
      return `${transition.name}: new ${transition.status} agent`;
    case "removed":
      return `${transition.name}: removed agent`;
    case "unchanged":
      return undefined;
  }
}

/**
 * Compares the stored statuses with the current poll. Current agents come
 * first in poll order, then agents that disappeared in stored order.
 */
export function detectTransitions(previous: StatusMap, current: StatusMap): Transition[] {
  const transitions: Transition[] = [];
  for (const [name, status] of current) {
    const before = previous.get(name);
    if (before === undefined) {
      transitions.push({ kind: "appeared", name, status });
    } else if (before === status) {
      transitions.push({ kind: "unchanged", name, status });
    } else {
      transitions.push({ kind: status === "offline" ? "turnedOffline" : "turnedOnline", name, status });
    }
  }
  for (const [name, status] of previous) {
    if (!current.has(name)) {
      transitions.push({ kind: "removed", name, status });
    }
  }
  return transitions;
}

/** Worst transition wins; among equals the last one reported owns the message. */
export function summarizeTransitions(transitions: Iterable<Transition>): Verdict {
  let summary = okVerdict();
  for (const transition of transitions) {
    const severity = transitionSeverity(transition);
    if (severity === Severity.OK) {
      continue;
    }
    if (!isMoreSevere(summary.severity, severity)) {
      summary = { severity, message: transitionMessage(transition) };
    }
  }
  return summary;
}

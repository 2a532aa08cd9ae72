import type { ProbeKind } from "../config/types";
import { ConfigError } from "../errors";
import { ENV_PREFIX, ENV_SCHEMAS } from "./schema";

type EnvSource = Record<string, string | undefined>;

const PLACEHOLDER_PATTERNS = [/CHANGE_ME/i, /REPLACE_ME/i, /^<.*>$/];

export class EnvValidationError extends ConfigError {
  constructor(kind: ProbeKind, public readonly placeholders: string[]) {
    super(
      `[env] Placeholder values in environment variables for ${kind}: ${placeholders
        .sort()
        .join(", ")}`,
      placeholders
    );
    this.name = "EnvValidationError";
  }
}

/** Prefixed variables the probe does not read, usually typos. */
export function getUnknownEnvVars(kind: ProbeKind, source: EnvSource = process.env): string[] {
  const known = new Set(ENV_SCHEMAS[kind].known.map(name => `${ENV_PREFIX}${name}`));
  return Object.keys(source)
    .filter(key => key.startsWith(ENV_PREFIX) && !known.has(key))
    .sort();
}

export function getPlaceholderEnvVars(kind: ProbeKind, source: EnvSource = process.env): string[] {
  const secrets = ENV_SCHEMAS[kind].secret ?? [];
  return secrets
    .map(name => `${ENV_PREFIX}${name}`)
    .filter(key => {
      const value = source[key];
      if (value === undefined) {
        return false;
      }
      const trimmed = value.trim();
      return PLACEHOLDER_PATTERNS.some(pattern => pattern.test(trimmed));
    });
}

export function assertEnvVars(kind: ProbeKind, source: EnvSource = process.env): void {
  const placeholders = getPlaceholderEnvVars(kind, source);
  if (placeholders.length) {
    throw new EnvValidationError(kind, placeholders);
  }
}

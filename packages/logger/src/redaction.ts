const REDACTED = "[REDACTED]";

const REDACTED_KEYS = new Set(["password", "authorization", "proxy-authorization"]);

const CREDENTIALS_IN_URL = /^(https?:\/\/)([^/@\s]+)@/i;

/**
 * Masks secrets in a log payload: values under a redacted key (matched case
 * insensitively, at any depth) and credentials embedded in URL strings.
 */
export function redactPayload(payload: Record<string, unknown>): Record<string, unknown> {
  const clone: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(payload)) {
    clone[key] = REDACTED_KEYS.has(key.toLowerCase()) ? REDACTED : redactValue(value);
  }
  return clone;
}

function redactValue(value: unknown): unknown {
  if (typeof value === "string") {
    return value.replace(CREDENTIALS_IN_URL, `$1${REDACTED}@`);
  }
  if (Array.isArray(value)) {
    return value.map(redactValue);
  }
  if (isPlainRecord(value)) {
    return redactPayload(value);
  }
  return value;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && Object.getPrototypeOf(value) === Object.prototype;
}

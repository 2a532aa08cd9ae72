import Ajv from "ajv";
import type { ValidateFunction } from "ajv";
import buildSchema from "./schemas/build.schema.json";
import computersSchema from "./schemas/computers.schema.json";
import jobSchema from "./schemas/job.schema.json";
import jobsSchema from "./schemas/jobs.schema.json";
import pluginsSchema from "./schemas/plugins.schema.json";
import { DecodeError } from "./errors";
import type { PayloadKind, PayloadTypes } from "./types";

// Jenkins adds members such as `_class`, so unknown properties are kept.
const ajv = new Ajv({ allErrors: true, strict: false, removeAdditional: false, useDefaults: false });

const validators: { [K in PayloadKind]: ValidateFunction<PayloadTypes[K]> } = {
  build: ajv.compile<PayloadTypes["build"]>(buildSchema),
  computers: ajv.compile<PayloadTypes["computers"]>(computersSchema),
  job: ajv.compile<PayloadTypes["job"]>(jobSchema),
  jobs: ajv.compile<PayloadTypes["jobs"]>(jobsSchema),
  plugins: ajv.compile<PayloadTypes["plugins"]>(pluginsSchema)
};

/**
 * Parses a JSON API response and checks it against the schema of the
 * expected payload.
 */
export function decodePayload<K extends PayloadKind>(kind: K, raw: string, url: string): PayloadTypes[K] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DecodeError(`invalid JSON: ${reason.replace(/\n/g, " ")}`, url, [], error);
  }

  const validate: ValidateFunction<PayloadTypes[K]> = validators[kind];
  if (validate(parsed)) {
    return parsed;
  }
  const schemaErrors = (validate.errors ?? []).map(err => `${err.instancePath || "."} ${err.message ?? "validation error"}`);
  throw new DecodeError(`unexpected ${kind} payload: ${schemaErrors.join("; ")}`, url, schemaErrors);
}

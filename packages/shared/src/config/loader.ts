import Ajv2020 from "ajv/dist/2020";
import type { ValidateFunction } from "ajv";
import probeConfigSchema from "./schema/probe-config.schema.json";
import { ConfigError } from "../errors";
import type { ProbeConfig, ProbeKind, ValidationResult } from "./types";

const ajv = new Ajv2020({ allErrors: true, strict: false });
ajv.addSchema(probeConfigSchema);

const validateRoot = compile(probeConfigSchema.$id);
const probeValidators: Record<ProbeKind, ValidateFunction> = {
  agents: compile(`${probeConfigSchema.$id}#/$defs/agents`),
  jobs: compile(`${probeConfigSchema.$id}#/$defs/jobs`),
  jobTime: compile(`${probeConfigSchema.$id}#/$defs/jobTime`),
  version: compile(`${probeConfigSchema.$id}#/$defs/version`)
};

function compile(ref: string): ValidateFunction {
  return ajv.compile({ $ref: ref });
}

function describeErrors(validateFn: ValidateFunction, prefix = ""): string[] {
  return (validateFn.errors ?? []).map(
    err => `${prefix}${err.instancePath || "/"} ${err.message ?? "validation error"}`
  );
}

/**
 * Validates a probe configuration and returns a structured result without
 * throwing. Undefined members are dropped first, as they would be in a config
 * file, so optional thresholds may be left undefined.
 */
export function validateProbeConfig(config: ProbeConfig): ValidationResult {
  const document: unknown = JSON.parse(JSON.stringify(config));
  const errors: string[] = [];
  if (!validateRoot(document)) {
    errors.push(...describeErrors(validateRoot));
  }
  const validateProbe = probeValidators[config.kind];
  if (!validateProbe(JSON.parse(JSON.stringify(config.probe)))) {
    errors.push(...describeErrors(validateProbe, "/probe"));
  }
  return errors.length ? { valid: false, errors } : { valid: true };
}

export function assertProbeConfig<C extends ProbeConfig>(config: C): Readonly<C> {
  const result = validateProbeConfig(config);
  if (!result.valid) {
    throw new ConfigError(`Invalid ${config.kind} probe configuration: ${(result.errors ?? []).join("; ")}`, result.errors ?? []);
  }
  return Object.freeze(config);
}

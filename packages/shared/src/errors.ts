export class ProbeError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "ProbeError";
  }
}

export class ConfigError extends ProbeError {
  readonly problems: string[];

  constructor(message: string, problems: string[] = [], cause?: unknown) {
    super(message, { cause });
    this.name = "ConfigError";
    this.problems = problems;
  }
}

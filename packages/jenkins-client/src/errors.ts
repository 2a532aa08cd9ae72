import { ProbeError } from "@ci-probes/shared";

export class JenkinsClientError extends ProbeError {
  readonly url: string;

  constructor(message: string, url: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = "JenkinsClientError";
    this.url = url;
  }
}

/** The request failed, timed out or answered with a non-success status. */
export class TransportError extends JenkinsClientError {
  readonly status?: number;

  constructor(message: string, url: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, url, { cause: options.cause });
    this.name = "TransportError";
    this.status = options.status;
  }
}

/** The response arrived but its content is not what the probe expects. */
export class DecodeError extends JenkinsClientError {
  readonly schemaErrors: string[];

  constructor(message: string, url: string, schemaErrors: string[] = [], cause?: unknown) {
    super(message, url, { cause });
    this.name = "DecodeError";
    this.schemaErrors = schemaErrors;
  }
}

/** A response lacked the header a probe reads its answer from. */
export class MissingHeaderError extends DecodeError {
  readonly headers: string[];

  constructor(headers: string[], url: string) {
    super(`can't find ${headers.join(" or ")} header in HTTP response`, url);
    this.name = "MissingHeaderError";
    this.headers = headers;
  }
}

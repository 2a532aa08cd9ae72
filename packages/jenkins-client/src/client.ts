import { fetch, type Dispatcher } from "undici";
import { LogLevel, type BasicAuthConfig, type HttpConfig } from "@ci-probes/shared";
import type { ComponentLogger } from "@ci-probes/logger";
import { decodePayload } from "./decoder";
import { createDispatcher } from "./dispatcher";
import { MissingHeaderError, TransportError } from "./errors";
import type { PayloadKind, PayloadTypes } from "./types";

export const API_SUFFIX = "/api/json";

export interface JenkinsClientOptions extends HttpConfig {
  logger?: ComponentLogger;
  /** Overrides the proxy-derived dispatcher; tests pass an undici MockAgent. */
  dispatcher?: Dispatcher;
}

export interface HeadResult {
  url: string;
  status: number;
  headers: Record<string, string>;
}

interface RawResponse {
  url: string;
  status: number;
  headers: Record<string, string>;
  body: string;
}

/**
 * Minimal Jenkins JSON API client. Each call makes exactly one request
 * bounded by the configured timeout; failures surface as TransportError or
 * DecodeError and are never retried.
 */
export class JenkinsClient {
  readonly baseUrl: string;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly timeoutMs: number;
  private readonly authorization?: string;
  private readonly logger?: ComponentLogger;

  constructor(options: JenkinsClientOptions) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl);
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
    this.authorization = options.auth ? basicAuthorization(options.auth) : undefined;
    this.ownsDispatcher = !options.dispatcher;
    this.dispatcher = options.dispatcher ?? createDispatcher(options.proxy);
  }

  /** Resolves a path against the base url; absolute urls are kept as given. */
  resolve(pathOrUrl: string, tree?: string): string {
    const absolute = /^https?:\/\//i.test(pathOrUrl)
      ? pathOrUrl
      : `${this.baseUrl}${pathOrUrl.startsWith("/") ? "" : "/"}${pathOrUrl}`;
    const url = new URL(absolute);
    if (tree) {
      url.searchParams.set("tree", tree);
    }
    return url.toString();
  }

  async getJson<K extends PayloadKind>(kind: K, pathOrUrl: string, tree?: string): Promise<PayloadTypes[K]> {
    const response = await this.send("GET", this.resolve(pathOrUrl, tree));
    const payload = decodePayload(kind, response.body, response.url);
    this.logger?.log(LogLevel.DEBUG, "payload decoded", { kind, url: response.url });
    return payload;
  }

  async head(pathOrUrl: string): Promise<HeadResult> {
    const { url, status, headers } = await this.send("HEAD", this.resolve(pathOrUrl));
    return { url, status, headers };
  }

  /** Returns the first non-empty header among `names`, or throws MissingHeaderError. */
  async requireHeader(pathOrUrl: string, names: string[]): Promise<{ name: string; value: string }> {
    const result = await this.head(pathOrUrl);
    for (const name of names) {
      const value = result.headers[name.toLowerCase()]?.trim();
      if (value) {
        return { name, value };
      }
    }
    throw new MissingHeaderError(names, result.url);
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  private async send(method: "GET" | "HEAD", url: string): Promise<RawResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const headers: Record<string, string> = { accept: "application/json" };
    if (this.authorization) {
      headers.authorization = this.authorization;
    }
    this.logger?.log(LogLevel.DEBUG, `${method} request`, { url, timeoutMs: this.timeoutMs });
    const startedAt = Date.now();
    try {
      const response = await fetch(url, {
        method,
        headers,
        signal: controller.signal,
        dispatcher: this.dispatcher
      });
      const body = method === "HEAD" ? "" : await response.text();
      const responseHeaders: Record<string, string> = {};
      response.headers.forEach((value, name) => {
        responseHeaders[name.toLowerCase()] = value;
      });
      this.logger?.log(LogLevel.DEBUG, `${method} response`, {
        url,
        status: response.status,
        latencyMs: Date.now() - startedAt
      });
      if (!response.ok) {
        throw new TransportError(`${response.status} ${response.statusText}`.trim(), url, {
          status: response.status
        });
      }
      return { url, status: response.status, headers: responseHeaders, body };
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new TransportError(`timeout after ${this.timeoutMs}ms`, url, { cause: error });
      }
      throw new TransportError(describeFetchError(error), url, { cause: error });
    } finally {
      clearTimeout(timer);
    }
  }
}

function normalizeBaseUrl(input: string): string {
  return input.replace(/\/+$/, "");
}

function basicAuthorization(auth: BasicAuthConfig): string {
  return `Basic ${Buffer.from(`${auth.username}:${auth.password}`).toString("base64")}`;
}

// undici reports connection failures as "fetch failed" with the reason in `cause`.
function describeFetchError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const cause: unknown = error.cause;
  if (cause instanceof Error && cause.message) {
    return `${error.message}: ${cause.message}`;
  }
  return error.message;
}

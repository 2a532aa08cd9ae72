import { tmpdir } from "node:os";
import path from "node:path";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { LogLevel } from "@ci-probes/shared";
import type { ComponentLogger } from "@ci-probes/logger";
import { isSimpleStatus, type SimpleStatus, type StatusMap } from "./snapshot";

export const STATE_FILE_PREFIX = "jenkins_slaves_";
export const STATE_FILE_SUFFIX = ".log";

export interface AgentStateStore {
  load(instanceKey: string): Promise<StatusMap>;
  save(instanceKey: string, statuses: StatusMap): Promise<void>;
}

export interface FileSystemApi {
  readFile(path: string, encoding: BufferEncoding): Promise<string>;
  writeFile(path: string, data: string): Promise<void>;
  mkdir(path: string, options: { recursive: boolean }): Promise<string | undefined>;
}

const defaultFs: FileSystemApi = {
  readFile,
  writeFile,
  mkdir
};

export interface FileAgentStateStoreOptions {
  stateDir?: string;
  fs?: FileSystemApi;
  logger?: ComponentLogger;
  now?: () => Date;
}

/**
 * Derives the per-instance key from the Jenkins url, e.g.
 * `https://ci.example.test:8443/jenkins/` becomes `ci.example.test_8443_jenkins`.
 */
export function instanceKeyFromUrl(url: string): string {
  return url
    .replace(/\/$/, "")
    .replace(/^http\w*:\/\//, "")
    .replace(/[/ :,;]+/g, "_");
}

export function parseStatusLines(raw: string): Map<string, SimpleStatus> {
  const statuses = new Map<string, SimpleStatus>();
  for (const line of raw.split(/\r?\n/)) {
    if (!line || line.startsWith("#")) {
      continue;
    }
    const separator = line.lastIndexOf("=");
    if (separator < 0) {
      continue;
    }
    const status = line.slice(separator + 1).trim();
    if (!isSimpleStatus(status)) {
      continue;
    }
    statuses.set(line.slice(0, separator), status);
  }
  return statuses;
}

export function formatStatusLines(statuses: StatusMap, savedAt: Date): string {
  const lines = [`# agent statuses saved ${savedAt.toISOString()}`];
  for (const [name, status] of statuses) {
    lines.push(`${name}=${status}`);
  }
  return `${lines.join("\n")}\n`;
}

/** Keeps one `name=status` file per monitored instance. */
export class FileAgentStateStore implements AgentStateStore {
  readonly stateDir: string;
  private readonly fs: FileSystemApi;
  private readonly logger?: ComponentLogger;
  private readonly now: () => Date;

  constructor(options: FileAgentStateStoreOptions = {}) {
    this.stateDir = options.stateDir ?? tmpdir();
    this.fs = options.fs ?? defaultFs;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  filePath(instanceKey: string): string {
    return path.join(this.stateDir, `${STATE_FILE_PREFIX}${instanceKey}${STATE_FILE_SUFFIX}`);
  }

  async load(instanceKey: string): Promise<StatusMap> {
    const file = this.filePath(instanceKey);
    try {
      const raw = await this.fs.readFile(file, "utf-8");
      const statuses = parseStatusLines(raw);
      this.logger?.log(LogLevel.DEBUG, "state loaded", { file, agents: statuses.size });
      return statuses;
    } catch (error) {
      this.logger?.log(LogLevel.DEBUG, "state unavailable", { file, reason: reasonOf(error) });
      return new Map<string, SimpleStatus>();
    }
  }

  async save(instanceKey: string, statuses: StatusMap): Promise<void> {
    const file = this.filePath(instanceKey);
    try {
      await this.fs.mkdir(this.stateDir, { recursive: true });
      await this.fs.writeFile(file, formatStatusLines(statuses, this.now()));
      this.logger?.log(LogLevel.DEBUG, "state saved", { file, agents: statuses.size });
    } catch (error) {
      this.logger?.log(LogLevel.DEBUG, "state save failed", { file, reason: reasonOf(error) });
    }
  }
}

/** In-process store for tests and embedders that keep no files. */
export class MemoryAgentStateStore implements AgentStateStore {
  private readonly entries = new Map<string, StatusMap>();

  async load(instanceKey: string): Promise<StatusMap> {
    return new Map<string, SimpleStatus>(this.entries.get(instanceKey) ?? []);
  }

  async save(instanceKey: string, statuses: StatusMap): Promise<void> {
    this.entries.set(instanceKey, new Map<string, SimpleStatus>(statuses));
  }
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

import { createWriteStream, type WriteStream } from "node:fs";
import { mkdir, readdir, stat, unlink } from "node:fs/promises";
import path from "node:path";
import { LogLevel, shouldLog, type StructuredLogEvent } from "@ci-probes/shared";
import type { LogSink } from "./types";

interface FileSinkOptions {
  runId: string;
  level: LogLevel;
  outputDir: string;
  maxFiles?: number;
  logger?: Pick<Console, "warn" | "error">;
}

const FILE_PREFIX = "jenkins-probe-";

/**
 * Appends JSON lines to `<outputDir>/jenkins-probe-<runId>.jsonl`, one file
 * per probe run, keeping only the `maxFiles` most recent run files. A file
 * that cannot be opened or written disables the sink for the rest of the run.
 */
export function createFileSink(options: FileSinkOptions): LogSink {
  const sink = new RunFileSink(options);
  return {
    name: "file",
    level: options.level,
    start: () => sink.start(),
    stop: () => sink.stop(),
    flush: () => sink.flush(),
    publish: event => sink.publish(event)
  };
}

class RunFileSink {
  private readonly maxFiles: number;
  private stream: WriteStream | null = null;
  private started = false;

  constructor(private readonly options: FileSinkOptions) {
    this.maxFiles = Math.max(1, options.maxFiles ?? 50);
  }

  get filePath(): string {
    return path.join(this.options.outputDir, `${FILE_PREFIX}${this.options.runId}.jsonl`);
  }

  async start() {
    if (this.started) {
      return;
    }
    await mkdir(this.options.outputDir, { recursive: true });
    const stream = createWriteStream(this.filePath, { flags: "a" });
    stream.on("error", error => {
      this.options.logger?.error?.("File sink failed", error);
      if (this.stream === stream) {
        this.stream = null;
      }
    });
    this.stream = stream;
    this.started = true;
    await new Promise<void>(resolve => {
      stream.once("open", () => resolve());
      stream.once("error", () => resolve());
    });
    await this.pruneOldFiles();
  }

  async stop() {
    const stream = this.stream;
    if (stream) {
      await new Promise<void>(resolve => {
        stream.end(() => resolve());
      });
      this.stream = null;
    }
    this.started = false;
  }

  async flush() {
    const stream = this.stream;
    if (!stream || !stream.writableNeedDrain) {
      return;
    }
    await new Promise<void>(resolve => {
      stream.once("drain", () => resolve());
    });
  }

  async publish(event: StructuredLogEvent) {
    if (!shouldLog(event.level, this.options.level)) {
      return;
    }
    if (!this.started) {
      await this.start();
    }
    const stream = this.stream;
    if (!stream) {
      return;
    }
    const payload = JSON.stringify(event) + "\n";
    await new Promise<void>((resolve, reject) => {
      stream.write(payload, error => {
        if (error) {
          this.options.logger?.error?.("File sink write failed", error);
          reject(error);
          return;
        }
        resolve();
      });
    });
  }

  private async pruneOldFiles() {
    try {
      const entries = await readdir(this.options.outputDir);
      const files = await Promise.all(
        entries
          .filter(entry => entry.startsWith(FILE_PREFIX) && entry.endsWith(".jsonl"))
          .map(async entry => {
            const fullPath = path.join(this.options.outputDir, entry);
            const info = await stat(fullPath);
            return { fullPath, mtime: info.mtimeMs };
          })
      );
      if (files.length <= this.maxFiles) {
        return;
      }
      const current = this.filePath;
      const sorted = files
        .filter(file => file.fullPath !== current)
        .sort((a, b) => b.mtime - a.mtime);
      const toDelete = sorted.slice(this.maxFiles - 1);
      await Promise.allSettled(
        toDelete.map(file => unlink(file.fullPath).catch(error => {
          this.options.logger?.warn?.("Failed to remove old log file", error);
        }))
      );
    } catch (error) {
      this.options.logger?.warn?.("Failed to prune log files", error);
    }
  }
}

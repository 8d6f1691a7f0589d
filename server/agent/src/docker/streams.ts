import readline from "node:readline";
import { PassThrough, Readable } from "node:stream";
import type Docker from "dockerode";
import type { ResourceKind, StreamFactory } from "../hub/types";
import type { ContainerRecord } from "../inventory/types";
import { AsyncQueue } from "../lib/async-queue";
import { createLogger } from "../lib/logger";
import { type LogEntry, type LogStream, parseLogLine } from "./logs";
import { type MetricSet, parseStatsLine, toMetricSet } from "./metrics";

const logger = createLogger("docker-streams");

export interface DockerStreamOptions {
  /** Lines of history sent before following the log. */
  logTail: number;
}

function destroy(stream: NodeJS.ReadableStream): void {
  if (stream instanceof Readable) stream.destroy();
}

/**
 * Run `onAbort` once when `signal` aborts (immediately if it already has).
 * Returns a function that removes the listener.
 */
function whenAborted(signal: AbortSignal, onAbort: () => void): () => void {
  if (signal.aborted) {
    onAbort();
    return () => {};
  }
  signal.addEventListener("abort", onAbort, { once: true });
  return () => signal.removeEventListener("abort", onAbort);
}

/**
 * Opens live metrics and log streams through the engine API.
 */
export class DockerStreamFactory implements StreamFactory {
  constructor(
    private docker: Docker,
    private options: DockerStreamOptions,
  ) {}

  open(
    container: ContainerRecord,
    kind: ResourceKind,
    signal: AbortSignal,
  ): AsyncIterable<unknown> {
    return kind === "metrics"
      ? this.metrics(container.id, signal)
      : this.logs(container.id, signal);
  }

  private async *metrics(
    id: string,
    signal: AbortSignal,
  ): AsyncGenerator<MetricSet> {
    const stream = await this.docker.getContainer(id).stats({ stream: true });
    const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });
    const stop = () => {
      rl.close();
      destroy(stream);
    };
    const release = whenAborted(signal, stop);
    logger.debug({ cid: id }, "metrics stream opened");

    try {
      for await (const line of rl) {
        const sample = parseStatsLine(line);
        if (sample) yield toMetricSet(sample);
      }
    } finally {
      release();
      stop();
      logger.debug({ cid: id }, "metrics stream closed");
    }
  }

  private async *logs(id: string, signal: AbortSignal): AsyncGenerator<LogEntry> {
    const container = this.docker.getContainer(id);
    const info = await container.inspect();
    const stream = await container.logs({
      follow: true,
      stdout: true,
      stderr: true,
      timestamps: true,
      tail: this.options.logTail,
    });

    const entries = new AsyncQueue<LogEntry>();
    const readers: readline.Interface[] = [];
    let open = 0;

    const follow = (input: NodeJS.ReadableStream, name: LogStream) => {
      const rl = readline.createInterface({ input, crlfDelay: Infinity });
      open++;
      rl.on("line", (line) => entries.push(parseLogLine(line, name)));
      rl.on("close", () => {
        open--;
        if (open === 0) entries.close();
      });
      readers.push(rl);
    };

    if (info.Config.Tty) {
      // TTY containers send one raw stream without multiplexing headers
      follow(stream, "stdout");
    } else {
      const stdout = new PassThrough();
      const stderr = new PassThrough();
      this.docker.modem.demuxStream(stream, stdout, stderr);
      stream.on("end", () => {
        stdout.end();
        stderr.end();
      });
      follow(stdout, "stdout");
      follow(stderr, "stderr");
    }

    stream.on("error", (err: Error) => {
      logger.warn({ err, cid: id }, "log stream error");
      entries.close();
    });

    const stop = () => {
      for (const rl of readers) rl.close();
      destroy(stream);
      entries.close();
    };
    const release = whenAborted(signal, stop);
    logger.debug({ cid: id, tty: info.Config.Tty }, "log stream opened");

    try {
      for await (const entry of entries) {
        yield entry;
      }
    } finally {
      release();
      stop();
      logger.debug({ cid: id }, "log stream closed");
    }
  }
}

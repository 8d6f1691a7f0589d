import readline from "node:readline";
import { Readable } from "node:stream";
import type Docker from "dockerode";
import { AsyncQueue } from "../lib/async-queue";
import { asString, isRecord } from "../lib/guards";
import { createLogger } from "../lib/logger";

const logger = createLogger("docker-events");

/** The fields of an engine notification the agent acts on. */
export interface EngineEvent {
  type: string;
  status: string;
  id: string;
}

export interface EventSource {
  init(): Promise<void>;
  get(): AsyncIterable<EngineEvent>;
  close(): void;
}

/**
 * Parse one line of the engine's event stream. Newer API versions drop the
 * legacy `status`/`id` fields in favour of `Action`/`Actor.ID`.
 */
export function parseEngineEvent(line: string): EngineEvent | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith("{")) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;

  const actor = isRecord(parsed.Actor) ? parsed.Actor : {};
  const event: EngineEvent = {
    type: asString(parsed.Type),
    status: asString(parsed.status) || asString(parsed.Action),
    id: asString(parsed.id) || asString(actor.ID),
  };
  if (!event.type || !event.status) return null;
  return event;
}

/**
 * Engine event stream read through dockerode. `get()` yields parsed events
 * until the engine closes the stream or `close()` is called.
 */
export class DockerEventSource implements EventSource {
  private queue: AsyncQueue<EngineEvent> | null = null;
  private stream: NodeJS.ReadableStream | null = null;
  private rl: readline.Interface | null = null;

  constructor(private docker: Docker) {}

  async init(): Promise<void> {
    if (this.queue) return;

    const stream = await this.docker.getEvents();
    const queue = new AsyncQueue<EngineEvent>();
    const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });

    rl.on("line", (line) => {
      const event = parseEngineEvent(line);
      if (event) {
        queue.push(event);
      } else if (line.trim()) {
        logger.debug({ line: line.slice(0, 200) }, "ignoring event line");
      }
    });
    rl.on("close", () => {
      logger.info("engine event stream closed");
      queue.close();
    });
    stream.on("error", (err: Error) => {
      logger.error({ err }, "engine event stream error");
      rl.close();
    });

    this.stream = stream;
    this.rl = rl;
    this.queue = queue;
    logger.info("listening for engine events");
  }

  get(): AsyncIterable<EngineEvent> {
    if (!this.queue) {
      throw new Error("Event source not initialized");
    }
    return this.queue;
  }

  close(): void {
    this.rl?.close();
    if (this.stream instanceof Readable) {
      this.stream.destroy();
    }
    this.queue?.close();
    this.rl = null;
    this.stream = null;
  }
}

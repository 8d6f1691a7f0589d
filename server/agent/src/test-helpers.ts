import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { AppServices } from "./app";
import { MIGRATIONS_DIR } from "./config";
import type { AppDatabase } from "./db/connection";
import { readMigrations } from "./db/migrate";
import * as schema from "./db/schema";
import type { EngineEvent, EventSource } from "./docker/events";
import type { About, HostInspector, Volume } from "./docker/host";
import type { Client } from "./hub/client";
import { Hub } from "./hub/hub";
import type { ResourceKind, ResponseFrame, StreamFactory } from "./hub/types";
import type {
  ContainerLookup,
  ContainerRecord,
  ContainerSummary,
  ImageRecord,
  InventoryEngine,
} from "./inventory/types";
import { ContainerStore } from "./inventory/container-store";
import { ImageStore } from "./inventory/image-store";
import { AsyncQueue } from "./lib/async-queue";
import { SnapshotService } from "./services/snapshot.service";

/**
 * Create an in-memory test database with schema applied.
 */
export function createTestDatabase(): {
  db: AppDatabase;
  sqlite: Database.Database;
} {
  const sqlite = new Database(":memory:");
  sqlite.pragma("foreign_keys = ON");

  for (const { statements } of readMigrations(MIGRATIONS_DIR)) {
    for (const statement of statements) {
      sqlite.exec(statement);
    }
  }

  const db = drizzle(sqlite, { schema });
  return { db, sqlite };
}

/** Let pending promise chains and stream callbacks settle. */
export function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function makeSummary(
  overrides: Partial<ContainerSummary> = {},
): ContainerSummary {
  return {
    id: "c1",
    name: "web",
    image: "nginx:1.27",
    imageId: "sha256:img1",
    state: "running",
    status: "Up 2 minutes",
    createdAt: "2024-01-01T00:00:00.000Z",
    ...overrides,
  };
}

export function makeContainer(
  overrides: Partial<ContainerRecord> = {},
): ContainerRecord {
  return {
    ...makeSummary(overrides),
    updatedAt: "2024-01-01T00:00:00.000Z",
    ...overrides,
  };
}

/**
 * Container lookup over a fixed set of records.
 */
export class FakeContainers implements ContainerLookup {
  private records = new Map<string, ContainerRecord>();

  constructor(records: ContainerRecord[] = []) {
    for (const record of records) this.records.set(record.id, record);
  }

  get(id: string): ContainerRecord | undefined {
    return this.records.get(id);
  }

  set(record: ContainerRecord): void {
    this.records.set(record.id, record);
  }
}

export interface OpenedStream {
  container: ContainerRecord;
  kind: ResourceKind;
  signal: AbortSignal;
  /** Push samples here; closing ends the stream. */
  queue: AsyncQueue<unknown>;
}

/**
 * Stream factory whose streams are fed by the test. A stream ends when its
 * signal aborts, like the engine-backed streams do.
 */
export class FakeStreamFactory implements StreamFactory {
  readonly opened: OpenedStream[] = [];

  open(
    container: ContainerRecord,
    kind: ResourceKind,
    signal: AbortSignal,
  ): AsyncIterable<unknown> {
    const queue = new AsyncQueue<unknown>();
    signal.addEventListener("abort", () => queue.close(), { once: true });
    this.opened.push({ container, kind, signal, queue });
    return queue;
  }

  /** Streams opened for `cid` and `kind`, oldest first. */
  streamsFor(cid: string, kind: ResourceKind): OpenedStream[] {
    return this.opened.filter((s) => s.container.id === cid && s.kind === kind);
  }

  /** Most recently opened stream. */
  last(): OpenedStream {
    const stream = this.opened[this.opened.length - 1];
    if (!stream) throw new Error("no stream opened");
    return stream;
  }
}

/**
 * Take every frame currently buffered for `client` without waiting.
 */
export async function takeFrames(client: Client): Promise<ResponseFrame[]> {
  const iterator = client.frames()[Symbol.asyncIterator]();
  const frames: ResponseFrame[] = [];
  while (client.pending > 0) {
    const result = await iterator.next();
    if (result.done) break;
    frames.push(result.value);
  }
  return frames;
}

/**
 * Inventory engine backed by in-memory lists. Set `failNext` to make the
 * next call reject.
 */
export class FakeEngine implements InventoryEngine {
  containers: ContainerSummary[] = [];
  images: ImageRecord[] = [];
  failNext: Error | null = null;
  inspectCalls: string[] = [];

  async listContainers(): Promise<ContainerSummary[]> {
    this.maybeFail();
    return this.containers.map((c) => ({ ...c }));
  }

  async inspectContainer(id: string): Promise<ContainerSummary> {
    this.inspectCalls.push(id);
    this.maybeFail();
    const found = this.containers.find(
      (c) => c.id === id || c.id.startsWith(id),
    );
    if (!found) {
      throw Object.assign(new Error(`no such container: ${id}`), {
        statusCode: 404,
      });
    }
    return { ...found };
  }

  async listImages(): Promise<ImageRecord[]> {
    this.maybeFail();
    return this.images.map((i) => ({ ...i, tags: [...i.tags] }));
  }

  private maybeFail(): void {
    const err = this.failNext;
    if (err) {
      this.failNext = null;
      throw err;
    }
  }
}

export class FakeHostInspector implements HostInspector {
  aboutCalls = 0;
  failAbout = false;
  failVolumes = false;
  aboutValue: About = {
    version: "27.0.1",
    apiVersion: "1.46",
    os: "linux",
    imageCount: 1,
    containerCount: 1,
  };
  volumeList: Volume[] = [];

  async about(): Promise<About> {
    this.aboutCalls++;
    if (this.failAbout) throw new Error("about unavailable");
    return { ...this.aboutValue };
  }

  async volumes(): Promise<Volume[]> {
    if (this.failVolumes) throw new Error("volumes unavailable");
    return this.volumeList.map((v) => ({ ...v }));
  }
}

/**
 * Event source the test pushes engine events into.
 */
export class FakeEventSource implements EventSource {
  readonly queue = new AsyncQueue<EngineEvent>();
  initialized = false;
  failInit: Error | null = null;

  async init(): Promise<void> {
    if (this.failInit) throw this.failInit;
    this.initialized = true;
  }

  get(): AsyncIterable<EngineEvent> {
    return this.queue;
  }

  emit(event: EngineEvent): void {
    this.queue.push(event);
  }

  close(): void {
    this.queue.close();
  }
}

/**
 * Services for route tests: two containers and one image loaded from a
 * fake engine, an in-memory database and a hub over fake streams.
 */
export async function createTestServices(): Promise<{
  services: AppServices;
  sqlite: Database.Database;
  engine: FakeEngine;
}> {
  const { db, sqlite } = createTestDatabase();
  const engine = new FakeEngine();
  engine.containers = [
    makeSummary({ id: "aaa111", name: "web" }),
    makeSummary({ id: "bbb222", name: "db", state: "stopped", status: "Exited (0)" }),
  ];
  engine.images = [
    {
      id: "sha256:img1",
      tags: ["nginx:1.27"],
      size: 1024,
      createdAt: "2024-01-01T00:00:00.000Z",
    },
  ];

  const images = new ImageStore(engine);
  await images.init();
  const containers = new ContainerStore(engine);
  await containers.init(images.byId);

  const services: AppServices = {
    db,
    controller: {
      about: {
        version: "27.0.1",
        apiVersion: "1.46",
        os: "linux",
        imageCount: 1,
        containerCount: 2,
      },
      volumes: [],
    },
    containers,
    images,
    snapshotService: new SnapshotService(db),
    hub: new Hub({ containers, streams: new FakeStreamFactory() }),
  };
  return { services, sqlite, engine };
}

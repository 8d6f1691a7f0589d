import { InventoryError, type InventoryOperation } from "../lib/errors";
import { AsyncQueue } from "../lib/async-queue";
import { createLogger } from "../lib/logger";
import type {
  ContainerInventory,
  ContainerRecord,
  ContainerSummary,
  ImageLookup,
  InventoryEngine,
} from "./types";

const log = createLogger("containers");

/**
 * In-memory container inventory. Records are created once per container id
 * and updated in place, so references held elsewhere stay current. Every
 * mutation publishes a snapshot of the changed records on the broadcast
 * queue.
 */
export class ContainerStore implements ContainerInventory {
  private containers = new Map<string, ContainerRecord>();
  private feed = new AsyncQueue<ContainerRecord[]>();
  private imageById: ImageLookup = () => undefined;

  constructor(private engine: InventoryEngine) {}

  async init(imageById?: ImageLookup): Promise<void> {
    if (imageById) this.imageById = imageById;

    const summaries = await this.query("init", undefined, () =>
      this.engine.listContainers(),
    );
    const now = new Date().toISOString();
    for (const summary of summaries) {
      this.containers.set(summary.id, this.toRecord(summary, now));
    }

    log.info({ count: this.containers.size }, "containers loaded");
    if (this.containers.size > 0) {
      this.publish([...this.containers.values()]);
    }
  }

  list(): ContainerRecord[] {
    return [...this.containers.values()].sort((a, b) =>
      a.name.localeCompare(b.name),
    );
  }

  /**
   * Look a container up by full id, by name, or by an unambiguous id prefix.
   */
  get(id: string): ContainerRecord | undefined {
    if (!id) return undefined;

    const exact = this.containers.get(id);
    if (exact) return exact;

    let match: ContainerRecord | undefined;
    for (const record of this.containers.values()) {
      if (record.name === id) return record;
      if (record.id.startsWith(id)) {
        if (match) return undefined;
        match = record;
      }
    }
    return match;
  }

  async add(id: string): Promise<void> {
    const summary = await this.query("add", id, () =>
      this.engine.inspectContainer(id),
    );
    const now = new Date().toISOString();
    const existing = this.containers.get(summary.id);

    if (existing) {
      Object.assign(existing, this.toRecord(summary, now));
      this.publish([existing]);
      return;
    }

    const record = this.toRecord(summary, now);
    this.containers.set(record.id, record);
    this.publish([record]);
  }

  async stop(id: string): Promise<void> {
    const record = this.require("stop", id);
    record.state = "stopped";
    record.status = "stopped";
    record.updatedAt = new Date().toISOString();

    try {
      const summary = await this.engine.inspectContainer(record.id);
      record.status = summary.status;
    } catch (err) {
      log.debug({ err, cid: record.id }, "status refresh after stop failed");
    }

    this.publish([record]);
  }

  async remove(id: string): Promise<void> {
    const record = this.require("remove", id);
    this.containers.delete(record.id);
    record.state = "removed";
    record.status = "removed";
    record.updatedAt = new Date().toISOString();
    this.publish([record]);
  }

  broadcast(): AsyncIterable<ContainerRecord[]> {
    return this.feed;
  }

  close(): void {
    this.feed.close();
  }

  // Batches carry copies: a batch written late still holds the state it
  // was published with.
  private publish(records: ContainerRecord[]): void {
    this.feed.push(records.map((record) => ({ ...record })));
  }

  private require(operation: InventoryOperation, id: string): ContainerRecord {
    const record = this.get(id);
    if (!record) {
      throw new InventoryError("container not tracked", operation, id);
    }
    return record;
  }

  private async query<T>(
    operation: InventoryOperation,
    id: string | undefined,
    fn: () => Promise<T>,
  ): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new InventoryError(message, operation, id, { cause: err });
    }
  }

  private toRecord(summary: ContainerSummary, now: string): ContainerRecord {
    // Containers created from an untagged reference report the image digest
    const image = summary.image.startsWith("sha256:")
      ? (this.imageById(summary.imageId)?.tags[0] ?? summary.image)
      : summary.image;
    return { ...summary, image, updatedAt: now };
  }
}

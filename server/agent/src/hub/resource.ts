import type { ContainerRecord } from "../inventory/types";
import { createLogger } from "../lib/logger";
import type { Client } from "./client";
import type { ResourceKind, ResponseFrame, StreamFactory } from "./types";

const logger = createLogger("resource");

/**
 * Registry side of a resource: the hub. Both calls are synchronous so the
 * receiver check and the removal cannot interleave with a subscribe.
 */
export interface ResourceOwner {
  /** Remove `resource` if it still has no receivers. */
  removeResource(container: ContainerRecord, resource: Resource): boolean;
}

/**
 * One live stream for one (container, kind) pair, fanned out to every
 * receiver. The stream is opened once by `setStreamer` and never restarted.
 */
export class Resource {
  private receivers: Client[] = [];
  private source: AsyncIterable<unknown> | null = null;
  private abort = new AbortController();

  constructor(
    readonly containerId: string,
    readonly kind: ResourceKind,
    private streams: StreamFactory,
  ) {}

  /**
   * Bind the underlying stream. Must be called exactly once, before `pump`.
   */
  setStreamer(container: ContainerRecord): void {
    if (this.source) {
      throw new Error(
        `Stream already bound for ${this.containerId}:${this.kind}`,
      );
    }
    this.source = this.streams.open(container, this.kind, this.abort.signal);
  }

  /**
   * Add a receiver. A client already in the list is not added twice.
   */
  addReceiver(client: Client): boolean {
    if (this.receivers.includes(client)) return false;
    this.receivers.push(client);
    return true;
  }

  removeReceiver(client: Client): boolean {
    const idx = this.receivers.indexOf(client);
    if (idx === -1) return false;
    this.receivers.splice(idx, 1);
    return true;
  }

  hasReceiver(client: Client): boolean {
    return this.receivers.includes(client);
  }

  get receiverCount(): number {
    return this.receivers.length;
  }

  /** Snapshot of the current receivers, in subscription order. */
  listReceivers(): Client[] {
    return [...this.receivers];
  }

  get closed(): boolean {
    return this.abort.signal.aborted;
  }

  /**
   * Stop the underlying stream. Safe to call more than once.
   */
  quit(): void {
    if (this.abort.signal.aborted) return;
    this.abort.abort();
    logger.debug({ cid: this.containerId, kind: this.kind }, "resource quit");
  }

  /**
   * Push one frame to every receiver without waiting on any of them.
   * Receivers whose queue is closed are pruned. Returns the number of
   * receivers that accepted the frame.
   */
  deliver(frame: ResponseFrame): number {
    let delivered = 0;
    for (const client of [...this.receivers]) {
      if (client.deliver(frame)) {
        delivered++;
      } else {
        this.removeReceiver(client);
        logger.debug(
          { cid: this.containerId, kind: this.kind, clientId: client.id },
          "pruned closed receiver",
        );
      }
    }
    return delivered;
  }

  /**
   * Fan-out loop. Runs until a delivery round finds no receivers and the
   * owner reclaims the resource, or until the underlying stream ends.
   */
  async pump(container: ContainerRecord, owner: ResourceOwner): Promise<void> {
    if (!this.source) {
      throw new Error(`No stream bound for ${this.containerId}:${this.kind}`);
    }

    try {
      for await (const content of this.source) {
        if (this.closed) break;

        this.deliver({ cid: this.containerId, type: this.kind, content });

        if (this.receivers.length === 0 && owner.removeResource(container, this)) {
          logger.debug(
            { cid: this.containerId, kind: this.kind },
            "no receivers left, reclaimed",
          );
          this.quit();
          return;
        }
      }
    } catch (err) {
      if (!this.closed) {
        logger.warn(
          { err, cid: this.containerId, kind: this.kind },
          "resource stream failed",
        );
      }
    }

    // The stream is gone: nothing more will reach the remaining receivers.
    this.quit();
    this.receivers = [];
    owner.removeResource(container, this);
  }
}

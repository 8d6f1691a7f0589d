import { randomUUID } from "node:crypto";
import { AsyncQueue } from "../lib/async-queue";
import type { Endpoints, ResourceKind, ResponseFrame } from "./types";

/** Frames buffered per connection before the oldest are dropped. */
export const DEFAULT_CLIENT_QUEUE_SIZE = 256;

export interface ClientOptions {
  id?: string;
  queueSize?: number;
}

/**
 * Per-connection handle. Any number of resources write into its queue; the
 * connection's writer is the only reader. Receiver lists compare clients by
 * identity, `id` only labels log lines.
 */
export class Client {
  readonly id: string;
  private queue: AsyncQueue<ResponseFrame>;

  constructor(
    private endpoints: Endpoints,
    options: ClientOptions = {},
  ) {
    this.id = options.id ?? randomUUID();
    this.queue = new AsyncQueue({
      capacity: options.queueSize ?? DEFAULT_CLIENT_QUEUE_SIZE,
      overflow: "drop-oldest",
    });
  }

  /**
   * Enqueue a frame without waiting. Returns false once the client is closed.
   */
  deliver(frame: ResponseFrame): boolean {
    return this.queue.push(frame);
  }

  frames(): AsyncIterable<ResponseFrame> {
    return this.queue;
  }

  subscribe(resource: ResourceKind, cid: string): void {
    this.endpoints.subscribe({ resource, cid, client: this });
  }

  unsubscribe(resource: ResourceKind, cid: string): void {
    this.endpoints.unsubscribe({ resource, cid, client: this });
  }

  /**
   * Close the queue and ask the hub to drop this client everywhere.
   */
  leave(): void {
    this.close();
    this.endpoints.leave(this);
  }

  close(): void {
    this.queue.close();
  }

  get closed(): boolean {
    return this.queue.isClosed;
  }

  get pending(): number {
    return this.queue.size;
  }

  get dropped(): number {
    return this.queue.dropped;
  }
}

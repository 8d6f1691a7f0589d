import type { ContainerLookup, ContainerRecord } from "../inventory/types";
import { AsyncQueue } from "../lib/async-queue";
import { createLogger } from "../lib/logger";
import { Client, type ClientOptions } from "./client";
import { Resource, type ResourceOwner } from "./resource";
import type {
  Demand,
  Endpoints,
  HubCommand,
  ResourceKind,
  ResponseFrame,
  StreamFactory,
} from "./types";

const logger = createLogger("hub");

export interface HubDeps {
  containers: ContainerLookup;
  streams: StreamFactory;
  clientQueueSize?: number;
}

export interface HubStats {
  containers: number;
  resources: number;
  receivers: number;
}

/**
 * Subscription hub. Owns the registry of live resources per container and
 * handles every subscribe/unsubscribe/leave/relay through one control loop,
 * so one underlying stream exists per (container, kind) no matter how many
 * clients watch it.
 *
 * Unknown container ids are dropped silently: the demanding client gets no
 * frame and no error.
 */
export class Hub implements ResourceOwner {
  private registry = new Map<ContainerRecord, Resource[]>();
  private inbox = new AsyncQueue<HubCommand>();
  readonly endpoints: Endpoints;

  constructor(private deps: HubDeps) {
    this.endpoints = {
      subscribe: (demand) => this.post({ type: "subscribe", demand }),
      unsubscribe: (demand) => this.post({ type: "unsubscribe", demand }),
      leave: (client) => this.post({ type: "leave", client }),
      relay: (frame) => this.post({ type: "relay", frame }),
    };
  }

  createClient(options: Omit<ClientOptions, "queueSize"> = {}): Client {
    return new Client(this.endpoints, {
      ...options,
      queueSize: this.deps.clientQueueSize,
    });
  }

  /**
   * Control loop. Resolves once the hub is closed.
   */
  async run(): Promise<void> {
    logger.info("hub running");
    for await (const command of this.inbox) {
      this.dispatch(command);
    }
    logger.info("hub stopped");
  }

  private dispatch(command: HubCommand): void {
    switch (command.type) {
      case "subscribe":
        this.subscribe(command.demand);
        break;
      case "unsubscribe":
        this.unsubscribe(command.demand);
        break;
      case "leave":
        this.clientLeave(command.client);
        break;
      case "relay":
        this.relay(command.frame);
        break;
    }
  }

  subscribe(demand: Demand): void {
    const { cid, resource: kind, client } = demand;
    logger.debug({ cid, kind, clientId: client.id }, "subscribe");

    const container = this.deps.containers.get(cid);
    if (!container) {
      logger.warn({ cid, kind, clientId: client.id }, "container not found");
      return;
    }

    const existing = this.resource(cid, kind);
    if (existing) {
      if (!existing.addReceiver(client)) {
        logger.debug({ cid, kind, clientId: client.id }, "already subscribed");
      }
      return;
    }

    const created = new Resource(container.id, kind, this.deps.streams);
    created.addReceiver(client);
    const list = this.registry.get(container) ?? [];
    list.push(created);
    this.registry.set(container, list);
    logger.info({ cid, kind }, "resource created");

    try {
      created.setStreamer(container);
    } catch (err) {
      logger.error({ err, cid, kind }, "failed to open resource stream");
      created.quit();
      this.detach(container, created);
      return;
    }

    created.pump(container, this).catch((err) => {
      logger.error({ err, cid, kind }, "resource pump failed");
      created.quit();
      this.detach(container, created);
    });
  }

  unsubscribe(demand: Demand): void {
    const { cid, resource: kind, client } = demand;
    logger.debug({ cid, kind, clientId: client.id }, "unsubscribe");

    const found = this.resource(cid, kind);
    if (!found) return;
    found.removeReceiver(client);
  }

  /**
   * Remove a client from every receiver list. A dropped connection does not
   * know what it was subscribed to, so the whole registry is scanned.
   */
  clientLeave(client: Client): void {
    let removed = 0;
    for (const list of this.registry.values()) {
      for (const res of list) {
        if (res.removeReceiver(client)) removed++;
      }
    }
    logger.debug({ clientId: client.id, removed }, "client left");
  }

  /**
   * Deliver one frame to every distinct receiver of any resource of
   * `frame.cid`.
   */
  relay(frame: ResponseFrame): void {
    const container = this.deps.containers.get(frame.cid);
    if (!container) return;

    const seen = new Set<Client>();
    for (const res of this.registry.get(container) ?? []) {
      for (const client of res.listReceivers()) {
        if (seen.has(client)) continue;
        seen.add(client);
        client.deliver(frame);
      }
    }
  }

  /**
   * Remove a resource from the registry if its receiver list is still empty.
   * The check and the removal happen in the same synchronous step.
   */
  removeResource(container: ContainerRecord, resource: Resource): boolean {
    if (resource.receiverCount > 0) return false;
    const removed = this.detach(container, resource);
    if (removed) {
      logger.info(
        { cid: resource.containerId, kind: resource.kind },
        "resource removed",
      );
    }
    return removed;
  }

  /**
   * Find the live resource of kind `kind` for container `cid`.
   */
  resource(cid: string, kind: ResourceKind): Resource | undefined {
    const container = this.deps.containers.get(cid);
    if (!container) return undefined;
    return this.registry
      .get(container)
      ?.find((res) => res.kind === kind && !res.closed);
  }

  stats(): HubStats {
    let resources = 0;
    let receivers = 0;
    for (const list of this.registry.values()) {
      resources += list.length;
      for (const res of list) receivers += res.receiverCount;
    }
    return { containers: this.registry.size, resources, receivers };
  }

  /**
   * Stop every resource and end the control loop.
   */
  close(): void {
    this.inbox.close();
    for (const list of this.registry.values()) {
      for (const res of list) res.quit();
    }
    this.registry.clear();
  }

  private post(command: HubCommand): void {
    if (!this.inbox.push(command)) {
      logger.debug({ type: command.type }, "hub closed, command dropped");
    }
  }

  private detach(container: ContainerRecord, resource: Resource): boolean {
    const list = this.registry.get(container);
    if (!list) return false;
    const idx = list.indexOf(resource);
    if (idx === -1) return false;
    list.splice(idx, 1);
    if (list.length === 0) this.registry.delete(container);
    return true;
  }
}

import type { ContainerRecord } from "../inventory/types";
import type { Client } from "./client";

export const RESOURCE_KINDS = ["metrics", "logs"] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

const RESOURCE_KIND_SET: ReadonlySet<string> = new Set<ResourceKind>(
  RESOURCE_KINDS,
);

export function isResourceKind(value: unknown): value is ResourceKind {
  return typeof value === "string" && RESOURCE_KIND_SET.has(value);
}

/** A client's request to start or stop receiving one resource. */
export interface Demand {
  resource: ResourceKind;
  cid: string;
  client: Client;
}

/** One sample of one resource, shared by reference across its receivers. */
export interface ResponseFrame<T = unknown> {
  cid: string;
  type: ResourceKind;
  content: T;
}

export type HubCommand =
  | { type: "subscribe"; demand: Demand }
  | { type: "unsubscribe"; demand: Demand }
  | { type: "leave"; client: Client }
  | { type: "relay"; frame: ResponseFrame };

/**
 * Inbound side of the hub. Every call is queued and handled in order by the
 * hub's control loop.
 */
export interface Endpoints {
  subscribe(demand: Demand): void;
  unsubscribe(demand: Demand): void;
  leave(client: Client): void;
  relay(frame: ResponseFrame): void;
}

/**
 * Opens the underlying live stream of one resource. The returned sequence
 * ends when the source ends or when `signal` aborts.
 */
export interface StreamFactory {
  open(
    container: ContainerRecord,
    kind: ResourceKind,
    signal: AbortSignal,
  ): AsyncIterable<unknown>;
}

export type ContainerState = "running" | "stopped" | "removed";

/**
 * A tracked container. The inventory keeps one object per container id for
 * the container's whole lifetime, so the object itself can serve as a map key.
 */
export interface ContainerRecord {
  id: string;
  name: string;
  image: string;
  imageId: string;
  state: ContainerState;
  status: string;
  createdAt: string;
  updatedAt: string;
}

export interface ImageRecord {
  id: string;
  tags: string[];
  size: number;
  createdAt: string;
}

export type ImageLookup = (id: string) => ImageRecord | undefined;

export interface ContainerLookup {
  get(id: string): ContainerRecord | undefined;
}

export interface ContainerInventory extends ContainerLookup {
  list(): ContainerRecord[];
  add(id: string): Promise<void>;
  stop(id: string): Promise<void>;
  remove(id: string): Promise<void>;
  /** Batches of records changed by a mutation, in mutation order. */
  broadcast(): AsyncIterable<ContainerRecord[]>;
  /** End the broadcast queue. */
  close(): void;
}

export interface ImageInventory {
  list(): ImageRecord[];
  byId: ImageLookup;
}

export type ContainerSummary = Omit<ContainerRecord, "updatedAt">;

/**
 * Engine queries the inventory stores are built from.
 */
export interface InventoryEngine {
  listContainers(): Promise<ContainerSummary[]>;
  inspectContainer(id: string): Promise<ContainerSummary>;
  listImages(): Promise<ImageRecord[]>;
}

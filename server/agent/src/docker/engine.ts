import type Docker from "dockerode";
import type {
  ContainerState,
  ContainerSummary,
  ImageRecord,
  InventoryEngine,
} from "../inventory/types";

const RUNNING_STATES = new Set(["running", "restarting", "paused"]);

export function toContainerState(engineState: string): ContainerState {
  return RUNNING_STATES.has(engineState.toLowerCase()) ? "running" : "stopped";
}

function trimName(name: string): string {
  return name.startsWith("/") ? name.slice(1) : name;
}

export function fromContainerInfo(info: Docker.ContainerInfo): ContainerSummary {
  return {
    id: info.Id,
    name: trimName(info.Names[0] ?? info.Id.slice(0, 12)),
    image: info.Image,
    imageId: info.ImageID,
    state: toContainerState(info.State),
    status: info.Status,
    createdAt: new Date(info.Created * 1000).toISOString(),
  };
}

export function fromInspectInfo(
  info: Docker.ContainerInspectInfo,
): ContainerSummary {
  return {
    id: info.Id,
    name: trimName(info.Name),
    image: info.Config.Image,
    imageId: info.Image,
    state: toContainerState(info.State.Status),
    status: info.State.Status,
    createdAt: info.Created,
  };
}

export function fromImageInfo(info: Docker.ImageInfo): ImageRecord {
  return {
    id: info.Id,
    tags: (info.RepoTags ?? []).filter((tag) => tag !== "<none>:<none>"),
    size: info.Size,
    createdAt: new Date(info.Created * 1000).toISOString(),
  };
}

/**
 * Inventory queries answered by dockerode.
 */
export class DockerEngine implements InventoryEngine {
  constructor(private docker: Docker) {}

  async listContainers(): Promise<ContainerSummary[]> {
    const containers = await this.docker.listContainers({ all: true });
    return containers.map(fromContainerInfo);
  }

  async inspectContainer(id: string): Promise<ContainerSummary> {
    const info = await this.docker.getContainer(id).inspect();
    return fromInspectInfo(info);
  }

  async listImages(): Promise<ImageRecord[]> {
    const images = await this.docker.listImages();
    return images.map(fromImageInfo);
  }
}

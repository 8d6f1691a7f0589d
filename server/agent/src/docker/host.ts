import type Docker from "dockerode";
import { asNumber, asString, isRecord } from "../lib/guards";

/** Aggregate host summary. */
export interface About {
  version: string;
  apiVersion: string;
  os: string;
  imageCount: number;
  containerCount: number;
}

export interface Volume {
  name: string;
  mountpoint: string;
  driver: string;
  created: string;
  /** Number of containers using the volume, -1 when unknown. */
  usedBy: number;
  /** Size in bytes, -1 when unknown. */
  size: number;
}

export interface HostInspector {
  about(): Promise<About>;
  volumes(): Promise<Volume[]>;
}

/**
 * Host-level queries answered by the engine API.
 */
export class DockerHostInspector implements HostInspector {
  constructor(private docker: Docker) {}

  async about(): Promise<About> {
    const version = await this.docker.version();
    const info: unknown = await this.docker.info();
    return {
      version: version.Version,
      apiVersion: version.ApiVersion,
      os: version.Os,
      imageCount: isRecord(info) ? asNumber(info.Images) : 0,
      containerCount: isRecord(info) ? asNumber(info.Containers) : 0,
    };
  }

  async volumes(): Promise<Volume[]> {
    const result: unknown = await this.docker.listVolumes();
    if (!isRecord(result) || !Array.isArray(result.Volumes)) return [];
    return result.Volumes.filter(isRecord).map(toVolume);
  }
}

export function toVolume(raw: Record<string, unknown>): Volume {
  // Usage data is only filled for `system df` requests; otherwise null
  const usage = isRecord(raw.UsageData) ? raw.UsageData : null;
  return {
    name: asString(raw.Name),
    mountpoint: asString(raw.Mountpoint),
    driver: asString(raw.Driver),
    created: asString(raw.CreatedAt),
    usedBy: usage ? asNumber(usage.RefCount, -1) : -1,
    size: usage ? asNumber(usage.Size, -1) : -1,
  };
}

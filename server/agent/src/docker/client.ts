import Docker from "dockerode";

/** Resolve Docker socket from DOCKER_HOST env or default path. */
export function resolveDockerSocket(explicit?: string): string {
  if (explicit) return explicit;
  const dockerHost = process.env.DOCKER_HOST;
  if (dockerHost) {
    // DOCKER_HOST can be unix:///path/to/sock or just /path/to/sock
    return dockerHost.replace(/^unix:\/\//, "");
  }
  return "/var/run/docker.sock";
}

export function createDockerClient(socketPath?: string): Docker {
  return new Docker({ socketPath: resolveDockerSocket(socketPath) });
}

import Docker from 'dockerode';
import { RuntimeUnavailableError } from './errors.js';

export interface ContainerSummary {
  id: string;
  names: string[];
  image: string;
}

export interface PortBinding {
  hostIp?: string;
  hostPort?: string;
}

export interface ContainerDetails {
  id: string;
  name: string;
  image: string;
  env: string[];
  // keyed like docker does it: "14002/tcp"
  ports: Record<string, PortBinding[]>;
}

// what discovery needs from a container runtime, nothing more
export interface ContainerBackend {
  ping(): Promise<void>;
  listRunning(): Promise<ContainerSummary[]>;
  inspect(id: string): Promise<ContainerDetails>;
}

export const DEFAULT_DOCKER_HOST = process.platform === 'win32'
  ? 'npipe:////./pipe/docker_engine'
  : 'unix:///var/run/docker.sock';

// DOCKER_HOST style strings to dockerode options
export function dockerOptionsFromHost(dockerHost: string = DEFAULT_DOCKER_HOST): Docker.DockerOptions {
  if (dockerHost.startsWith('unix://')) {
    return { socketPath: dockerHost.slice('unix://'.length) };
  }

  if (dockerHost.startsWith('npipe://')) {
    return { socketPath: dockerHost.slice('npipe://'.length) };
  }

  if (dockerHost.startsWith('tcp://') || dockerHost.startsWith('http://') || dockerHost.startsWith('https://')) {
    const url = new URL(dockerHost.replace(/^tcp:/, 'http:'));
    return {
      host: url.hostname,
      port: url.port ? parseInt(url.port, 10) : 2375,
      protocol: url.protocol === 'https:' ? 'https' : 'http',
    };
  }

  // bare path
  return { socketPath: dockerHost };
}

export class DockerBackend implements ContainerBackend {
  private docker: Docker;
  private dockerHost: string;

  constructor(dockerHost: string = DEFAULT_DOCKER_HOST) {
    this.dockerHost = dockerHost;
    this.docker = new Docker(dockerOptionsFromHost(dockerHost));
  }

  async ping(): Promise<void> {
    try {
      await this.docker.ping();
    } catch (err) {
      throw new RuntimeUnavailableError(`docker not reachable at ${this.dockerHost}`, { cause: err });
    }
  }

  async listRunning(): Promise<ContainerSummary[]> {
    let containers: Docker.ContainerInfo[];
    try {
      containers = await this.docker.listContainers({
        filters: { status: ['running'] }
      });
    } catch (err) {
      throw new RuntimeUnavailableError(`failed to list containers at ${this.dockerHost}`, { cause: err });
    }

    return containers.map(c => ({
      id: c.Id,
      names: (c.Names ?? []).map(n => n.replace(/^\//, '')),
      image: c.Image
    }));
  }

  async inspect(id: string): Promise<ContainerDetails> {
    const info = await this.docker.getContainer(id).inspect();

    const ports: Record<string, PortBinding[]> = {};
    for (const [portKey, bindings] of Object.entries(info.NetworkSettings?.Ports ?? {})) {
      // docker reports exposed but unpublished ports as null
      ports[portKey] = (bindings ?? []).map(b => ({ hostIp: b.HostIp, hostPort: b.HostPort }));
    }

    return {
      id: info.Id,
      name: info.Name.replace(/^\//, ''),
      image: info.Config?.Image ?? '',
      env: info.Config?.Env ?? [],
      ports
    };
  }
}

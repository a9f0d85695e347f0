// container discovery - finds storage node containers, works out their ports
// from docker metadata and asks each one for its status document

import type { Logger } from 'pino';
import { ContainerBackend, ContainerDetails, ContainerSummary } from '../lib/docker.js';
import { buildNodeRecord, DEFAULT_DATA_PORT, DEFAULT_STATUS_PORT } from '../lib/node-record.js';
import { StatusProbe } from '../lib/status-probe.js';
import { Discoverer, NodeRecord } from '../lib/types.js';

export const DEFAULT_IMAGE_ALLOWLIST = ['storjlabs/storagenode', 'storj/storagenode'];
export const DEFAULT_NAME_HINTS = ['storj', 'storagenode'];

// dashboards live somewhere in here when they are not on the default port
export const STATUS_PORT_RANGE: [number, number] = [14000, 15000];

// published ports are expected on loopback
const CONTAINER_HOST = '127.0.0.1';

interface ContainerDiscovererOptions {
  backend: ContainerBackend;
  probe: StatusProbe;
  logger: Logger;
  imageAllowlist?: string[];
  nameHints?: string[];
}

function parsePort(value: string | undefined): number | null {
  if (!value || !/^\d+$/.test(value)) return null;
  const port = parseInt(value, 10);
  return port > 0 && port <= 65535 ? port : null;
}

function mappedHostPort(details: ContainerDetails, containerPort: number): number | null {
  const bindings = details.ports[`${containerPort}/tcp`];
  if (!bindings || bindings.length === 0) return null;
  return parsePort(bindings[0].hostPort);
}

// "CONSOLE_ADDRESS=0.0.0.0:14002" -> 14002
function envAddressPort(details: ContainerDetails, variable: string): number | null {
  const prefix = `${variable}=`;
  const entry = details.env.find(e => e.startsWith(prefix));
  if (!entry) return null;

  const address = entry.slice(prefix.length);
  const colon = address.lastIndexOf(':');
  if (colon === -1) return null;
  return parsePort(address.slice(colon + 1));
}

function rangeMappedPort(details: ContainerDetails, [low, high]: [number, number]): number | null {
  for (const [portKey, bindings] of Object.entries(details.ports)) {
    if (!portKey.endsWith('/tcp') || bindings.length === 0) continue;
    const containerPort = parsePort(portKey.split('/')[0]);
    if (containerPort !== null && containerPort >= low && containerPort <= high) {
      const hostPort = parsePort(bindings[0].hostPort);
      if (hostPort !== null) return hostPort;
    }
  }
  return null;
}

// mapped default port, then CONSOLE_ADDRESS, then anything mapped in the dashboard range
export function resolveStatusPort(details: ContainerDetails): number | null {
  return mappedHostPort(details, DEFAULT_STATUS_PORT)
    ?? envAddressPort(details, 'CONSOLE_ADDRESS')
    ?? rangeMappedPort(details, STATUS_PORT_RANGE);
}

export function resolveDataPort(details: ContainerDetails): number {
  return mappedHostPort(details, DEFAULT_DATA_PORT)
    ?? envAddressPort(details, 'ADDRESS')
    ?? DEFAULT_DATA_PORT;
}

export class ContainerDiscoverer implements Discoverer {
  readonly name = 'docker';
  private backend: ContainerBackend;
  private probe: StatusProbe;
  private logger: Logger;
  private imageAllowlist: string[];
  private nameHints: string[];

  constructor(options: ContainerDiscovererOptions) {
    this.backend = options.backend;
    this.probe = options.probe;
    this.logger = options.logger;
    this.imageAllowlist = options.imageAllowlist ?? DEFAULT_IMAGE_ALLOWLIST;
    this.nameHints = (options.nameHints ?? DEFAULT_NAME_HINTS).map(h => h.toLowerCase());
  }

  // image allowlist OR name hint, either one is enough
  isCandidate(container: ContainerSummary): boolean {
    const repository = container.image.split('@')[0].replace(/:[^/:]+$/, '');
    if (this.imageAllowlist.includes(repository)) {
      return true;
    }
    return container.names.some(name => {
      const lower = name.toLowerCase();
      return this.nameHints.some(hint => lower.includes(hint));
    });
  }

  async discover(): Promise<NodeRecord[]> {
    let candidates: ContainerSummary[];
    try {
      await this.backend.ping();
      const running = await this.backend.listRunning();
      candidates = running.filter(c => this.isCandidate(c));
    } catch (err) {
      this.logger.error({ err }, 'container runtime unavailable, skipping docker discovery');
      return [];
    }

    this.logger.info({ count: candidates.length }, 'found storage node containers');

    const results = await Promise.all(candidates.map(c => this.inspectCandidate(c)));
    return results.filter((r): r is NodeRecord => r !== null);
  }

  private async inspectCandidate(container: ContainerSummary): Promise<NodeRecord | null> {
    let details: ContainerDetails;
    try {
      details = await this.backend.inspect(container.id);
    } catch (err) {
      this.logger.error({ err, containerId: container.id }, 'failed to inspect container');
      return null;
    }

    const statusPort = resolveStatusPort(details);
    if (statusPort === null) {
      this.logger.warn({ container: details.name }, 'no dashboard port found for container');
      return null;
    }

    const doc = await this.probe.probe(CONTAINER_HOST, statusPort);
    if (!doc) {
      this.logger.warn({ container: details.name, port: statusPort }, 'could not fetch node data from container');
      return null;
    }

    return buildNodeRecord(
      doc,
      {
        name: details.name,
        address: CONTAINER_HOST,
        statusPort,
        dataPort: resolveDataPort(details),
      },
      'CONTAINER',
      {
        containerId: details.id,
        containerName: details.name,
        image: details.image,
      }
    );
  }
}

// port scan discovery - asks every port on a host for a status document

import type { Logger } from 'pino';
import { buildNodeRecord, DEFAULT_DATA_PORT } from '../lib/node-record.js';
import { StatusProbe } from '../lib/status-probe.js';
import { Discoverer, NodeRecord } from '../lib/types.js';

export interface ScanTarget {
  host: string;
  ports: number[];
}

interface PortScanDiscovererOptions {
  probe: StatusProbe;
  logger: Logger;
  // fixed target when used as a discoverer
  target?: ScanTarget;
}

export class PortScanDiscoverer implements Discoverer {
  readonly name = 'port-scan';
  private probe: StatusProbe;
  private logger: Logger;
  private target?: ScanTarget;

  constructor(options: PortScanDiscovererOptions) {
    this.probe = options.probe;
    this.logger = options.logger;
    this.target = options.target;
  }

  async discover(): Promise<NodeRecord[]> {
    if (!this.target) {
      throw new Error('port scan discoverer has no target');
    }
    return this.scan(this.target.host, this.target.ports);
  }

  // port lists are small, so every port gets probed at once
  async scan(host: string, ports: number[]): Promise<NodeRecord[]> {
    this.logger.debug({ host, ports: ports.length }, 'scanning ports');

    const results = await Promise.all(ports.map(async port => {
      const doc = await this.probe.probe(host, port);
      if (!doc) return null;

      return buildNodeRecord(
        doc,
        {
          name: `Node-${port}`,
          address: host,
          statusPort: port,
          dataPort: DEFAULT_DATA_PORT,
        },
        'PORT_SCAN'
      );
    }));

    return results.filter((r): r is NodeRecord => r !== null);
  }
}

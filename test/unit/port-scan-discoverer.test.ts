import { StatusProbe } from '../../src/lib/status-probe';
import { PortScanDiscoverer } from '../../src/services/port-scan-discoverer';
import { fakeNetwork, statusDoc } from '../helpers/fake-network';
import { silentLogger } from '../helpers/logger';

describe('PortScanDiscoverer', () => {
  const nodes = {
    '192.168.1.20:14000': { doc: statusDoc('node-a') },
    '192.168.1.20:14002': { doc: statusDoc('node-b', { disqualified: true }) },
    '192.168.1.20:14003': { status: 404 }
  };

  it('turns every answering port into a record', async () => {
    const network = fakeNetwork(nodes);
    const scanner = new PortScanDiscoverer({
      probe: new StatusProbe({ logger: silentLogger, fetch: network.fetch }),
      logger: silentLogger
    });

    const records = await scanner.scan('192.168.1.20', [14000, 14001, 14002, 14003]);

    expect(network.statusCalls.sort()).toEqual([
      '192.168.1.20:14000',
      '192.168.1.20:14001',
      '192.168.1.20:14002',
      '192.168.1.20:14003'
    ]);
    expect(records).toHaveLength(2);

    const byPort = new Map(records.map(r => [r.statusPort, r]));
    expect(byPort.get(14000)).toMatchObject({
      nodeId: 'node-a',
      name: 'Node-14000',
      address: '192.168.1.20',
      dataPort: 28967,
      health: 'ONLINE',
      origin: 'PORT_SCAN'
    });
    expect(byPort.get(14002)).toMatchObject({ nodeId: 'node-b', name: 'Node-14002', health: 'DISQUALIFIED' });
    expect(byPort.get(14000)?.originMetadata).toBeUndefined();
  });

  it('probes all ports at once', async () => {
    const network = fakeNetwork(nodes);
    const scanner = new PortScanDiscoverer({
      probe: new StatusProbe({ logger: silentLogger, fetch: network.fetch }),
      logger: silentLogger
    });

    await scanner.scan('192.168.1.20', [14000, 14001, 14002, 14003]);

    expect(network.maxConcurrentProbes()).toBe(4);
  });

  it('scans its bound target when used as a discoverer', async () => {
    const network = fakeNetwork(nodes);
    const scanner = new PortScanDiscoverer({
      probe: new StatusProbe({ logger: silentLogger, fetch: network.fetch }),
      logger: silentLogger,
      target: { host: '192.168.1.20', ports: [14000] }
    });

    const records = await scanner.discover();

    expect(records.map(r => r.nodeId)).toEqual(['node-a']);
  });

  it('refuses to discover without a target', async () => {
    const scanner = new PortScanDiscoverer({
      probe: new StatusProbe({ logger: silentLogger, fetch: fakeNetwork({}).fetch }),
      logger: silentLogger
    });

    await expect(scanner.discover()).rejects.toThrow('port scan discoverer has no target');
  });
});

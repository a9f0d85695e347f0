import { StatusProbe } from '../../src/lib/status-probe';
import {
  ContainerDiscoverer,
  resolveDataPort,
  resolveStatusPort
} from '../../src/services/container-discoverer';
import { container, FakeBackend } from '../helpers/fake-backend';
import { fakeNetwork, statusDoc } from '../helpers/fake-network';
import { silentLogger } from '../helpers/logger';

describe('resolveStatusPort', () => {
  it('prefers the mapped dashboard port over CONSOLE_ADDRESS', () => {
    const details = container({
      id: 'a',
      ports: { '14002/tcp': [{ hostIp: '0.0.0.0', hostPort: '14010' }] },
      env: ['CONSOLE_ADDRESS=0.0.0.0:14020']
    });
    expect(resolveStatusPort(details)).toBe(14010);
  });

  it('falls back to the CONSOLE_ADDRESS port', () => {
    const details = container({ id: 'a', env: ['PATH=/usr/bin', 'CONSOLE_ADDRESS=127.0.0.1:14020'] });
    expect(resolveStatusPort(details)).toBe(14020);
  });

  it('skips a CONSOLE_ADDRESS without a usable port', () => {
    const details = container({
      id: 'a',
      env: ['CONSOLE_ADDRESS=localhost'],
      ports: { '14100/tcp': [{ hostPort: '24100' }] }
    });
    expect(resolveStatusPort(details)).toBe(24100);
  });

  it('uses any mapped port in the dashboard range last', () => {
    const details = container({
      id: 'a',
      ports: {
        '28967/tcp': [{ hostPort: '28967' }],
        '14500/udp': [{ hostPort: '30000' }],
        '14500/tcp': [{ hostPort: '31000' }]
      }
    });
    expect(resolveStatusPort(details)).toBe(31000);
  });

  it('ignores an unpublished dashboard port', () => {
    const details = container({ id: 'a', ports: { '14002/tcp': [] } });
    expect(resolveStatusPort(details)).toBeNull();
  });

  it('returns null when nothing matches', () => {
    expect(resolveStatusPort(container({ id: 'a', ports: { '80/tcp': [{ hostPort: '8080' }] } }))).toBeNull();
  });
});

describe('resolveDataPort', () => {
  it('walks mapped port, ADDRESS and the default in order', () => {
    expect(resolveDataPort(container({
      id: 'a',
      ports: { '28967/tcp': [{ hostPort: '28970' }] },
      env: ['ADDRESS=node.example.com:28999']
    }))).toBe(28970);
    expect(resolveDataPort(container({ id: 'a', env: ['ADDRESS=node.example.com:28999'] }))).toBe(28999);
    expect(resolveDataPort(container({ id: 'a' }))).toBe(28967);
  });

  it('does not mistake CONSOLE_ADDRESS for ADDRESS', () => {
    expect(resolveDataPort(container({ id: 'a', env: ['CONSOLE_ADDRESS=0.0.0.0:14002'] }))).toBe(28967);
  });
});

describe('ContainerDiscoverer', () => {
  function discoverer(backend: FakeBackend, nodes: Parameters<typeof fakeNetwork>[0]) {
    const network = fakeNetwork(nodes);
    return new ContainerDiscoverer({
      backend,
      probe: new StatusProbe({ logger: silentLogger, fetch: network.fetch }),
      logger: silentLogger
    });
  }

  it('accepts a container by image or by name', () => {
    const d = discoverer(new FakeBackend([]), {});
    expect(d.isCandidate({ id: '1', names: ['web'], image: 'storjlabs/storagenode:v1.95.1' })).toBe(true);
    expect(d.isCandidate({ id: '2', names: ['web'], image: 'storj/storagenode@sha256:abc' })).toBe(true);
    expect(d.isCandidate({ id: '3', names: ['My-Storj-Node'], image: 'custom/image' })).toBe(true);
    expect(d.isCandidate({ id: '4', names: ['sn2-storagenode'], image: 'custom/image:1' })).toBe(true);
    expect(d.isCandidate({ id: '5', names: ['postgres'], image: 'postgres:16' })).toBe(false);
  });

  it('builds records for candidates that answer', async () => {
    const backend = new FakeBackend([
      container({
        id: 'c1',
        name: 'storagenode',
        ports: {
          '14002/tcp': [{ hostPort: '14002' }],
          '28967/tcp': [{ hostPort: '28967' }]
        }
      }),
      container({
        id: 'c2',
        name: 'storj-second',
        image: 'example/other',
        env: ['CONSOLE_ADDRESS=0.0.0.0:14003', 'ADDRESS=node.example.com:28968']
      }),
      container({ id: 'c3', name: 'postgres', image: 'postgres:16', ports: { '14002/tcp': [{ hostPort: '14009' }] } })
    ]);

    const records = await discoverer(backend, {
      '127.0.0.1:14002': { doc: statusDoc('node-one') },
      '127.0.0.1:14003': { doc: statusDoc('node-two', { reputation: { auditScore: 0.5 } }) },
      '127.0.0.1:14009': { doc: statusDoc('not-a-node') }
    }).discover();

    expect(backend.inspected.sort()).toEqual(['c1', 'c2']);
    const byId = new Map(records.map(r => [r.nodeId, r]));
    expect([...byId.keys()].sort()).toEqual(['node-one', 'node-two']);

    expect(byId.get('node-one')).toMatchObject({
      name: 'storagenode',
      address: '127.0.0.1',
      statusPort: 14002,
      dataPort: 28967,
      health: 'ONLINE',
      origin: 'CONTAINER',
      originMetadata: { containerId: 'c1', containerName: 'storagenode', image: 'storjlabs/storagenode:latest' }
    });
    expect(byId.get('node-two')).toMatchObject({
      statusPort: 14003,
      dataPort: 28968,
      health: 'WARNING',
      originMetadata: { containerId: 'c2', containerName: 'storj-second', image: 'example/other' }
    });
  });

  it('skips candidates without a port, without an answer or that fail to inspect', async () => {
    const backend = new FakeBackend([
      container({ id: 'no-port' }),
      container({ id: 'silent', ports: { '14002/tcp': [{ hostPort: '14004' }] } }),
      container({ id: 'broken', ports: { '14002/tcp': [{ hostPort: '14005' }] } }),
      container({ id: 'good', ports: { '14002/tcp': [{ hostPort: '14006' }] } })
    ], ['broken']);

    const records = await discoverer(backend, {
      '127.0.0.1:14005': { doc: statusDoc('broken-node') },
      '127.0.0.1:14006': { doc: statusDoc('good-node') }
    }).discover();

    expect(records.map(r => r.nodeId)).toEqual(['good-node']);
  });

  it('returns nothing when the runtime is unreachable', async () => {
    const backend = new FakeBackend([container({ id: 'c1', ports: { '14002/tcp': [{ hostPort: '14002' }] } })]);
    backend.reachable = false;

    const records = await discoverer(backend, { '127.0.0.1:14002': { doc: statusDoc('node-one') } }).discover();

    expect(records).toEqual([]);
    expect(backend.inspected).toEqual([]);
  });
});

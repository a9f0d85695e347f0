import {
  buildNodeRecord,
  shortId,
  toRegistrationPayload,
  toStatusPatch
} from '../../src/lib/node-record';
import { statusDocumentSchema } from '../../src/lib/status-probe';

const location = { name: 'storagenode-1', address: '127.0.0.1', statusPort: 14002, dataPort: 28967 };
const metadata = { containerId: 'c0ffee', containerName: 'storagenode-1', image: 'storjlabs/storagenode:latest' };

describe('buildNodeRecord', () => {
  it('derives the disk total from used and available', () => {
    const record = buildNodeRecord(
      { nodeID: 'node-a', diskSpace: { used: 100, available: 900 }, lastContactSuccess: '2024-01-01T00:00:00Z' },
      location,
      'PORT_SCAN'
    );
    expect(record.disk).toEqual({ used: 100, available: 900, total: 1000 });
    expect(record.health).toBe('ONLINE');
  });

  it('ignores a total reported by the node', () => {
    const doc = statusDocumentSchema.parse({
      nodeID: 'node-a',
      diskSpace: { used: 10, available: 20, total: 5000 }
    });
    expect(buildNodeRecord(doc, location, 'PORT_SCAN').disk.total).toBe(30);
  });

  it('fills defaults for missing fields', () => {
    const record = buildNodeRecord({}, location, 'PORT_SCAN');
    expect(record).toEqual({
      nodeId: '',
      name: 'storagenode-1',
      address: '127.0.0.1',
      statusPort: 14002,
      dataPort: 28967,
      version: undefined,
      health: 'OFFLINE',
      disk: { used: 0, available: 0, total: 0 },
      bandwidthUsed: 0,
      uptime: 0,
      lastContact: undefined,
      origin: 'PORT_SCAN'
    });
  });

  it('keeps only a timestamp as the last contact', () => {
    const flagged = buildNodeRecord({ nodeID: 'node-a', lastContactSuccess: true }, location, 'PORT_SCAN');
    expect(flagged.health).toBe('ONLINE');
    expect(flagged.lastContact).toBeUndefined();

    const stamped = buildNodeRecord({ nodeID: 'node-a', lastContactSuccess: '2024-01-01T00:00:00Z' }, location, 'PORT_SCAN');
    expect(stamped.lastContact).toBe('2024-01-01T00:00:00Z');
  });

  it('attaches container metadata only for container records', () => {
    const doc = { nodeID: 'node-a' };
    expect(buildNodeRecord(doc, location, 'CONTAINER', metadata).originMetadata).toEqual(metadata);
    expect(buildNodeRecord(doc, location, 'PORT_SCAN', metadata).originMetadata).toBeUndefined();
  });
});

describe('toRegistrationPayload', () => {
  it('maps a container record onto the dashboard fields', () => {
    const record = buildNodeRecord(
      {
        nodeID: '1abcdefghij',
        version: '1.95.1',
        diskSpace: { used: 100, available: 900 },
        bandwidth: { used: 55 },
        uptime: 120,
        lastContactSuccess: '2024-01-01T00:00:00Z'
      },
      location,
      'CONTAINER',
      metadata
    );

    expect(toRegistrationPayload(record)).toEqual({
      nodeId: '1abcdefghij',
      name: 'storagenode-1',
      address: '127.0.0.1',
      port: 28967,
      dashboardPort: 14002,
      version: '1.95.1',
      status: 'ONLINE',
      allocatedSpace: 1000,
      usedSpace: 100,
      availableSpace: 900,
      bandwidthUsed: 55,
      uptime: 120,
      lastSeen: '2024-01-01T00:00:00Z',
      config: {
        detectedFrom: 'CONTAINER',
        containerId: 'c0ffee',
        containerName: 'storagenode-1',
        image: 'storjlabs/storagenode:latest'
      }
    });
  });
});

describe('toStatusPatch', () => {
  it('stamps lastSeen with the given time and copies reputation scores', () => {
    const patch = toStatusPatch(
      {
        nodeID: 'node-a',
        version: '1.95.1',
        diskSpace: { used: 1, available: 2 },
        bandwidth: { used: 3 },
        uptime: 4,
        lastContactSuccess: '2024-01-01T00:00:00Z',
        reputation: { auditScore: 0.99, suspensionScore: 0 },
        satellites: [{ id: 'sat-1' }]
      },
      new Date('2024-06-01T12:00:00.000Z')
    );

    expect(patch).toEqual({
      status: 'ONLINE',
      version: '1.95.1',
      allocatedSpace: 3,
      usedSpace: 1,
      availableSpace: 2,
      bandwidthUsed: 3,
      uptime: 4,
      lastSeen: '2024-06-01T12:00:00.000Z',
      reputation: { auditScore: 0.99, suspensionScore: 0 },
      satellites: [{ id: 'sat-1' }],
      auditScore: 0.99,
      suspensionScore: 0
    });
  });

  it('sends empty reputation and satellites when the node has none', () => {
    const patch = toStatusPatch({}, new Date('2024-06-01T12:00:00.000Z'));
    expect(patch.reputation).toEqual({});
    expect(patch.satellites).toEqual([]);
    expect(patch.status).toBe('OFFLINE');
  });
});

describe('shortId', () => {
  it('keeps the first eight characters', () => {
    expect(shortId('1abcdefghij')).toBe('1abcdefg');
    expect(shortId('')).toBe('unknown');
  });
});

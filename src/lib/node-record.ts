import { classifyHealth } from './health.js';
import { StatusDocument } from './status-probe.js';
import {
  ContainerMetadata,
  DiskUsage,
  NodeLocation,
  NodeRecord,
  Origin,
  RegistrationPayload,
  StatusPatch,
} from './types.js';

export const DEFAULT_STATUS_PORT = 14002;
export const DEFAULT_DATA_PORT = 28967;

// total is derived, a reported total is never trusted
export function diskUsage(doc: StatusDocument): DiskUsage {
  const used = doc.diskSpace?.used ?? 0;
  const available = doc.diskSpace?.available ?? 0;
  return { used, available, total: used + available };
}

export function buildNodeRecord(
  doc: StatusDocument,
  location: NodeLocation,
  origin: Origin,
  metadata?: ContainerMetadata
): NodeRecord {
  const record: NodeRecord = {
    nodeId: doc.nodeID ?? '',
    name: location.name,
    address: location.address,
    statusPort: location.statusPort,
    dataPort: location.dataPort,
    version: doc.version ?? undefined,
    health: classifyHealth(doc),
    disk: diskUsage(doc),
    bandwidthUsed: doc.bandwidth?.used ?? 0,
    uptime: doc.uptime ?? 0,
    // a bare flag says contact happened but not when
    lastContact: typeof doc.lastContactSuccess === 'string' ? doc.lastContactSuccess : undefined,
    origin,
  };

  // metadata only makes sense for containers
  if (origin === 'CONTAINER' && metadata) {
    record.originMetadata = metadata;
  }

  return record;
}

export function toRegistrationPayload(record: NodeRecord): RegistrationPayload {
  return {
    nodeId: record.nodeId,
    name: record.name || `Node-${record.statusPort}`,
    address: record.address,
    port: record.dataPort,
    dashboardPort: record.statusPort,
    version: record.version,
    status: record.health,
    allocatedSpace: record.disk.total,
    usedSpace: record.disk.used,
    availableSpace: record.disk.available,
    bandwidthUsed: record.bandwidthUsed,
    uptime: record.uptime,
    lastSeen: record.lastContact,
    config: {
      detectedFrom: record.origin,
      containerId: record.originMetadata?.containerId,
      containerName: record.originMetadata?.containerName,
      image: record.originMetadata?.image,
    },
  };
}

export function toStatusPatch(doc: StatusDocument, now: Date = new Date()): StatusPatch {
  const disk = diskUsage(doc);
  return {
    status: classifyHealth(doc),
    version: doc.version ?? undefined,
    allocatedSpace: disk.total,
    usedSpace: disk.used,
    availableSpace: disk.available,
    bandwidthUsed: doc.bandwidth?.used ?? 0,
    uptime: doc.uptime ?? 0,
    lastSeen: now.toISOString(),
    reputation: { ...doc.reputation },
    satellites: doc.satellites ?? [],
    auditScore: doc.reputation?.auditScore,
    suspensionScore: doc.reputation?.suspensionScore,
  };
}

// short form used in log lines
export function shortId(nodeId: string): string {
  return nodeId ? nodeId.slice(0, 8) : 'unknown';
}

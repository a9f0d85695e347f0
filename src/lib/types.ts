// shared types between all components

export const HEALTH_STATES = ['ONLINE', 'WARNING', 'SUSPENDED', 'DISQUALIFIED', 'OFFLINE'] as const;
export type Health = (typeof HEALTH_STATES)[number];

export type Origin = 'CONTAINER' | 'PORT_SCAN';

export interface DiskUsage {
  used: number;       // bytes
  available: number;  // bytes
  total: number;      // always used + available
}

export interface ContainerMetadata {
  containerId: string;
  containerName: string;
  image: string;
}

export interface NodeRecord {
  nodeId: string;
  name: string;
  address: string;
  statusPort: number;
  dataPort: number;
  version?: string;
  health: Health;
  disk: DiskUsage;
  bandwidthUsed: number; // bytes
  uptime: number;        // seconds
  lastContact?: string;
  origin: Origin;
  originMetadata?: ContainerMetadata;
}

// what the registry hands back when listing, used to re-probe and to address updates
export interface RemoteNodeRef {
  id: string;
  nodeId: string;
  address: string;
  statusPort: number;
  dataPort?: number;
}

export interface NodeLocation {
  name: string;
  address: string;
  statusPort: number;
  dataPort: number;
}

// anything that can find nodes
export interface Discoverer {
  readonly name: string;
  discover(): Promise<NodeRecord[]>;
}

export interface RegistrationPayload {
  nodeId: string;
  name: string;
  address: string;
  port: number;
  dashboardPort: number;
  version?: string;
  status: Health;
  allocatedSpace: number;
  usedSpace: number;
  availableSpace: number;
  bandwidthUsed: number;
  uptime: number;
  lastSeen?: string;
  config: {
    detectedFrom: Origin;
    containerId?: string;
    containerName?: string;
    image?: string;
  };
}

export interface StatusPatch {
  status: Health;
  version?: string;
  allocatedSpace: number;
  usedSpace: number;
  availableSpace: number;
  bandwidthUsed: number;
  uptime: number;
  lastSeen: string;
  reputation: Record<string, unknown>;
  satellites: unknown[];
  auditScore?: number;
  suspensionScore?: number;
}

export type NodePayload = RegistrationPayload | StatusPatch;

// minimal fetch signature so tests can hand in a fake
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

// shared keeps connections alive between calls, per-call closes them after each request
export type SessionMode = 'shared' | 'per-call';

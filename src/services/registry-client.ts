// registry client - talks to the monitoring dashboard that holds the
// authoritative list of nodes. registers, lists and patches node records

import type { Logger } from 'pino';
import { z } from 'zod';
import { TransportError, UnauthorizedError } from '../lib/errors.js';
import { discardBody, readErrorBody, sessionHeaders } from '../lib/http.js';
import { DEFAULT_STATUS_PORT, shortId, toRegistrationPayload } from '../lib/node-record.js';
import { FetchLike, NodePayload, NodeRecord, RemoteNodeRef, SessionMode } from '../lib/types.js';

export const DEFAULT_REGISTRY_TIMEOUT_MS = 30000;

export const accountInfoSchema = z
  .object({
    email: z.string().optional(),
    permissions: z.array(z.string()).optional(),
  })
  .passthrough();

export type AccountInfo = z.infer<typeof accountInfoSchema>;

// dashboards send ports as numbers or numeric strings; anything else falls back to the default
const portField = z
  .union([z.number(), z.string().trim().regex(/^\d+$/).transform(Number)])
  .pipe(z.number().int().min(1).max(65535))
  .nullable()
  .optional()
  .catch(undefined);

// only the id is required, it addresses every later update
const remoteNodeSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  nodeId: z.string().nullable().optional().catch(undefined),
  address: z.string().nullable().optional().catch(undefined),
  dashboardPort: portField,
  port: portField,
});

const nodeListSchema = z.object({
  nodes: z.array(z.unknown()).default([]),
});

export interface RegistryClientOptions {
  baseUrl: string;
  token: string;
  logger: Logger;
  sessionMode?: SessionMode;
  timeoutMs?: number;
  fetch?: FetchLike;
}

export class RegistryClient {
  private baseUrl: string;
  private token: string;
  private logger: Logger;
  private sessionMode: SessionMode;
  private timeoutMs: number;
  private fetchImpl: FetchLike;

  constructor(options: RegistryClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.token = options.token;
    this.logger = options.logger;
    this.sessionMode = options.sessionMode ?? 'shared';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REGISTRY_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async validateCredential(): Promise<AccountInfo> {
    let response: Response;
    try {
      response = await this.request('GET', '/auth/me');
    } catch (err) {
      throw new TransportError(`could not reach dashboard at ${this.baseUrl}`, { cause: err });
    }

    if (response.status === 401) {
      await discardBody(response);
      this.logger.error('invalid api token');
      throw new UnauthorizedError();
    }

    if (response.status !== 200) {
      const body = await readErrorBody(response);
      this.logger.error({ status: response.status }, 'token validation failed');
      throw new TransportError(`token validation failed: HTTP ${response.status} - ${body}`, {
        status: response.status,
        body,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new TransportError('dashboard returned an account payload that is not json', {
        status: response.status,
        cause: err,
      });
    }

    const parsed = accountInfoSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError('dashboard returned an unexpected account payload', { status: response.status });
    }

    this.logger.info({ email: parsed.data.email ?? 'unknown' }, 'token valid');
    return parsed.data;
  }

  // every record is attempted, one failure never stops the rest
  async register(records: NodeRecord[]): Promise<number> {
    let registered = 0;
    for (const record of records) {
      if (await this.registerOne(record)) {
        registered++;
      }
    }
    return registered;
  }

  async listNodes(): Promise<RemoteNodeRef[]> {
    let response: Response;
    try {
      response = await this.request('GET', '/nodes');
    } catch (err) {
      this.logger.error({ err }, 'failed to get registered nodes');
      return [];
    }

    if (response.status !== 200) {
      const body = await readErrorBody(response);
      if (response.status === 401) {
        this.logAuthFailure();
      }
      this.logger.error({ status: response.status, body }, 'failed to get registered nodes');
      return [];
    }

    let listing: z.infer<typeof nodeListSchema>;
    try {
      listing = nodeListSchema.parse(await response.json());
    } catch (err) {
      this.logger.error({ err }, 'registry node listing malformed');
      return [];
    }

    const refs: RemoteNodeRef[] = [];
    for (const entry of listing.nodes) {
      const parsed = remoteNodeSchema.safeParse(entry);
      if (!parsed.success) {
        this.logger.warn({ entry }, 'skipping registry entry without a usable id');
        continue;
      }
      const node = parsed.data;
      refs.push({
        id: node.id,
        nodeId: node.nodeId ?? '',
        address: node.address || '127.0.0.1',
        statusPort: node.dashboardPort ?? DEFAULT_STATUS_PORT,
        dataPort: node.port ?? undefined,
      });
    }

    return refs;
  }

  async update(registryId: string, patch: NodePayload): Promise<boolean> {
    let response: Response;
    try {
      response = await this.request('PATCH', `/nodes/${encodeURIComponent(registryId)}`, patch);
    } catch (err) {
      this.logger.error({ err, registryId }, 'failed to update node');
      return false;
    }

    if (response.status === 200 || response.status === 204) {
      await discardBody(response);
      return true;
    }

    const body = await readErrorBody(response);
    if (response.status === 401) {
      this.logAuthFailure();
    }
    this.logger.error({ registryId, status: response.status, body }, 'failed to update node');
    return false;
  }

  private async registerOne(record: NodeRecord): Promise<boolean> {
    const payload = toRegistrationPayload(record);
    const id = shortId(record.nodeId);

    let response: Response;
    try {
      response = await this.request('POST', '/nodes', payload);
    } catch (err) {
      this.logger.error({ err, nodeId: id }, 'failed to register node');
      return false;
    }

    if (response.status === 200 || response.status === 201) {
      await discardBody(response);
      this.logger.info({ nodeId: id, name: record.name }, 'registered node');
      return true;
    }

    if (response.status === 409) {
      await discardBody(response);
      this.logger.info({ nodeId: id }, 'node already exists, updating');
      return this.updateExisting(record.nodeId, payload);
    }

    if (response.status === 401) {
      await discardBody(response);
      this.logAuthFailure();
      return false;
    }

    const body = await readErrorBody(response);
    this.logger.error({ nodeId: id, status: response.status, body }, 'failed to register node');
    return false;
  }

  // fallback after a 409, keyed by node id rather than registry id
  private async updateExisting(nodeId: string, payload: NodePayload): Promise<boolean> {
    const id = shortId(nodeId);

    let response: Response;
    try {
      response = await this.request('PATCH', `/nodes/${encodeURIComponent(nodeId)}`, payload);
    } catch (err) {
      this.logger.error({ err, nodeId: id }, 'failed to update existing node');
      return false;
    }

    if (response.ok) {
      await discardBody(response);
      this.logger.info({ nodeId: id }, 'updated existing node');
      return true;
    }

    const body = await readErrorBody(response);
    if (response.status === 401) {
      this.logAuthFailure();
    }
    this.logger.error({ nodeId: id, status: response.status, body }, 'failed to update existing node');
    return false;
  }

  private logAuthFailure(): void {
    this.logger.error({ dashboard: this.baseUrl }, 'authentication failed - check api token');
  }

  private request(method: string, path: string, body?: unknown): Promise<Response> {
    const init: RequestInit = {
      method,
      headers: {
        Authorization: `Bearer ${this.token}`,
        'Content-Type': 'application/json',
        ...sessionHeaders(this.sessionMode),
      },
      signal: AbortSignal.timeout(this.timeoutMs),
    };
    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }
    return this.fetchImpl(`${this.baseUrl}${path}`, init);
  }
}

import type { Logger } from 'pino';
import { z } from 'zod';
import { sessionHeaders } from './http.js';
import { FetchLike, SessionMode } from './types.js';

export const STATUS_PATH = '/api/sno';
export const DEFAULT_PROBE_TIMEOUT_MS = 5000;

// a field of the wrong type reads as missing, it never sinks the document
function lenient<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullable().optional().catch(undefined);
}

const reputationSchema = z
  .object({
    auditScore: z.number().optional().catch(undefined),
    suspensionScore: z.number().optional().catch(undefined),
  })
  .passthrough();

// only the top level has to be an object, nodes on older versions leave plenty out
export const statusDocumentSchema = z
  .object({
    nodeID: z.string().optional().catch(undefined),
    version: lenient(z.string()),
    diskSpace: lenient(
      z
        .object({
          used: z.number().optional().catch(undefined),
          available: z.number().optional().catch(undefined),
        })
        .passthrough()
    ),
    bandwidth: lenient(
      z
        .object({
          used: z.number().optional().catch(undefined),
        })
        .passthrough()
    ),
    uptime: lenient(z.number()),
    // a timestamp on current nodes, a plain flag on some older ones
    lastContactSuccess: lenient(z.union([z.string(), z.boolean(), z.number()])),
    disqualified: lenient(z.union([z.boolean(), z.string(), z.number()])),
    reputation: lenient(reputationSchema),
    satellites: lenient(z.array(z.unknown())),
  })
  .passthrough();

export type StatusDocument = z.infer<typeof statusDocumentSchema>;

export interface StatusProbeOptions {
  logger: Logger;
  timeoutMs?: number;
  sessionMode?: SessionMode;
  fetch?: FetchLike;
}

/**
 * Reads a node's self-reported status document.
 *
 * A node missing at the probed port is the normal case during discovery,
 * so every failure comes back as `null` and is only logged at debug level.
 */
export class StatusProbe {
  private logger: Logger;
  private timeoutMs: number;
  private sessionMode: SessionMode;
  private fetchImpl: FetchLike;

  constructor(options: StatusProbeOptions) {
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.sessionMode = options.sessionMode ?? 'per-call';
    this.fetchImpl = options.fetch ?? fetch;
  }

  async probe(host: string, port: number, timeoutMs: number = this.timeoutMs): Promise<StatusDocument | null> {
    const url = `http://${host}:${port}${STATUS_PATH}`;

    try {
      const response = await this.fetchImpl(url, {
        headers: sessionHeaders(this.sessionMode),
        signal: AbortSignal.timeout(timeoutMs),
      });

      if (response.status !== 200) {
        this.logger.debug({ url, status: response.status }, 'status endpoint did not return 200');
        return null;
      }

      const body: unknown = await response.json();
      const parsed = statusDocumentSchema.safeParse(body);
      if (!parsed.success) {
        this.logger.debug({ url, issues: parsed.error.issues.length }, 'status document malformed');
        return null;
      }

      return parsed.data;
    } catch (err) {
      this.logger.debug({ err, url }, 'status probe failed');
      return null;
    }
  }
}

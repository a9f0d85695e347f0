import { EventEmitter } from 'events';
import type { Logger } from 'pino';
import { shortId, toStatusPatch } from '../lib/node-record.js';
import { StatusProbe } from '../lib/status-probe.js';
import { RemoteNodeRef } from '../lib/types.js';
import { RegistryClient } from './registry-client.js';

export type SyncState = 'IDLE' | 'RUNNING' | 'STOPPING' | 'STOPPED';

export interface CycleResult {
  total: number;
  succeeded: number;
  failed: number;
}

export interface SyncEngineOptions {
  registry: RegistryClient;
  probe: StatusProbe;
  logger: Logger;
  intervalSeconds?: number;
  batchSize?: number;
  probeTimeoutMs?: number;
  now?: () => Date;
}

export const DEFAULT_SYNC_INTERVAL_SECONDS = 300;
export const DEFAULT_BATCH_SIZE = 10;
export const DEFAULT_SYNC_PROBE_TIMEOUT_MS = 10000;

export function toBatches<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

/**
 * Keeps the registry in step with the nodes it lists.
 *
 * Each cycle pulls the node list, re-probes every node in fixed size batches
 * (batches in sequence, nodes within a batch at the same time) and patches
 * the registry with fresh status. Failures are per node and only counted.
 * `stop()` wakes the loop from its sleep but lets a running cycle finish.
 *
 * Emits `cycle-complete` with a {@link CycleResult} and `stopped`.
 */
export class SyncEngine extends EventEmitter {
  private registry: RegistryClient;
  private probe: StatusProbe;
  private logger: Logger;
  private intervalMs: number;
  private batchSize: number;
  private probeTimeoutMs: number;
  private now: () => Date;

  private state: SyncState = 'IDLE';
  private loop: Promise<void> | null = null;
  private sleepTimer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;

  constructor(options: SyncEngineOptions) {
    super();
    this.registry = options.registry;
    this.probe = options.probe;
    this.logger = options.logger;
    this.intervalMs = (options.intervalSeconds ?? DEFAULT_SYNC_INTERVAL_SECONDS) * 1000;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_SYNC_PROBE_TIMEOUT_MS;
    this.now = options.now ?? (() => new Date());

    if (!Number.isInteger(this.batchSize) || this.batchSize < 1) {
      throw new Error(`batch size must be a positive integer, got ${this.batchSize}`);
    }
  }

  getState(): SyncState {
    return this.state;
  }

  isActive(): boolean {
    return this.state === 'RUNNING';
  }

  start(): void {
    if (this.state !== 'IDLE') {
      this.logger.warn({ state: this.state }, 'sync engine already started');
      return;
    }

    this.state = 'RUNNING';
    this.logger.info(
      { intervalSeconds: this.intervalMs / 1000, batchSize: this.batchSize },
      'sync daemon started'
    );
    this.loop = this.run();
  }

  async stop(): Promise<void> {
    if (this.state === 'IDLE') {
      this.state = 'STOPPED';
      return;
    }

    if (this.state === 'RUNNING') {
      this.state = 'STOPPING';
      this.logger.info('stopping sync daemon after the current cycle');
      this.wake?.();
    }

    await this.loop;
  }

  // resolves once the loop has fully stopped
  async whenStopped(): Promise<void> {
    await this.loop;
  }

  async runCycle(): Promise<CycleResult> {
    const nodes = await this.registry.listNodes();
    if (nodes.length === 0) {
      this.logger.debug('no registered nodes found');
      const empty: CycleResult = { total: 0, succeeded: 0, failed: 0 };
      this.emit('cycle-complete', empty);
      return empty;
    }

    this.logger.info({ count: nodes.length }, 'syncing nodes');

    let succeeded = 0;
    let failed = 0;

    for (const batch of toBatches(nodes, this.batchSize)) {
      const results = await Promise.all(batch.map(node => this.syncNode(node)));
      const ok = results.filter(Boolean).length;
      const errors = results.length - ok;
      succeeded += ok;
      failed += errors;

      if (errors > 0) {
        this.logger.warn({ success: ok, errors }, 'batch sync had failures');
      }
    }

    const result: CycleResult = { total: nodes.length, succeeded, failed };
    this.logger.info(result, 'sync cycle completed');
    this.emit('cycle-complete', result);
    return result;
  }

  private async run(): Promise<void> {
    while (this.isActive()) {
      try {
        await this.runCycle();
      } catch (err) {
        this.logger.error({ err }, 'sync cycle failed');
      }

      if (!this.isActive()) break;
      await this.sleep(this.intervalMs);
    }

    this.state = 'STOPPED';
    this.logger.info('sync daemon stopped');
    this.emit('stopped');
  }

  private async syncNode(node: RemoteNodeRef): Promise<boolean> {
    const id = shortId(node.nodeId);
    try {
      const doc = await this.probe.probe(node.address, node.statusPort, this.probeTimeoutMs);
      if (!doc) {
        this.logger.warn(
          { nodeId: id, address: node.address, port: node.statusPort },
          'failed to fetch data for node'
        );
        return false;
      }

      const updated = await this.registry.update(node.id, toStatusPatch(doc, this.now()));
      if (updated) {
        this.logger.debug({ nodeId: id }, 'synced node');
      }
      return updated;
    } catch (err) {
      this.logger.error({ err, nodeId: id }, 'failed to sync node');
      return false;
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      const done = () => {
        if (this.sleepTimer) {
          clearTimeout(this.sleepTimer);
          this.sleepTimer = null;
        }
        this.wake = null;
        resolve();
      };
      this.sleepTimer = setTimeout(done, ms);
      this.wake = done;
    });
  }
}

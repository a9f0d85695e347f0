import { Command } from 'commander';
import { StatusProbe } from '../lib/status-probe.js';
import { RegistryClient } from '../services/registry-client.js';
import { SyncEngine } from '../services/sync-engine.js';
import { createContext, parsePositiveInt, requireToken } from './context.js';

export interface SyncOptions {
  interval?: string;
  batchSize?: string;
  once?: boolean;
}

export async function syncCommand(options: SyncOptions, command: Command) {
  const { config, logger } = createContext(command.optsWithGlobals());
  const token = requireToken(config);

  const intervalSeconds = options.interval
    ? parsePositiveInt(options.interval, '--interval')
    : config.sync.interval;
  const batchSize = options.batchSize
    ? parsePositiveInt(options.batchSize, '--batch-size')
    : config.sync.batchSize;

  // one client for the whole life of the daemon
  const registry = new RegistryClient({
    baseUrl: config.api.url,
    token,
    logger,
    sessionMode: config.sync.sessionMode,
    timeoutMs: config.api.timeout * 1000
  });

  const engine = new SyncEngine({
    registry,
    probe: new StatusProbe({ logger, sessionMode: 'per-call' }),
    logger,
    intervalSeconds,
    batchSize,
    probeTimeoutMs: config.sync.probeTimeout * 1000
  });

  if (options.once) {
    const result = await engine.runCycle();
    console.log(`\nsynced ${result.succeeded} of ${result.total} nodes (${result.failed} failed)\n`);
    return;
  }

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'received shutdown signal, stopping...');
    engine.stop().catch(err => {
      logger.error({ err }, 'failed to stop sync daemon cleanly');
      process.exit(1);
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  engine.start();
  await engine.whenStopped();
}

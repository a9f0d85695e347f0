import { Command } from 'commander';
import { ClientConfig } from '../lib/config.js';
import { DockerBackend } from '../lib/docker.js';
import { detectLocalAddress } from '../lib/network.js';
import { shortId } from '../lib/node-record.js';
import { expandPortRange, parsePortList, parsePortRange } from '../lib/ports.js';
import { StatusProbe } from '../lib/status-probe.js';
import { Discoverer, NodeRecord } from '../lib/types.js';
import { ContainerDiscoverer } from '../services/container-discoverer.js';
import { DiscoveryAggregator } from '../services/discovery-aggregator.js';
import { PortScanDiscoverer } from '../services/port-scan-discoverer.js';
import { RegistryClient } from '../services/registry-client.js';
import { createContext, parsePositiveInt, requireToken } from './context.js';

export interface DiscoverOptions {
  fromDocker?: boolean;
  dockerHost?: string;
  server?: string;
  ports?: string;
  portRange?: string;
  range?: boolean;
  auto?: boolean;
  timeout?: string;
  json?: boolean;
}

export interface DiscoveryPlan {
  docker: boolean;
  ports: number[] | null;
}

// explicit flags first; with none at all, fall back to what the config says
export function planDiscovery(options: DiscoverOptions, config: ClientConfig): DiscoveryPlan {
  let ports: number[] | null = null;
  if (options.ports) {
    ports = parsePortList(options.ports);
  } else if (options.portRange) {
    ports = parsePortRange(options.portRange);
  } else if (options.range) {
    const [start, end] = config.discovery.portRange;
    ports = expandPortRange(start, end);
  } else if (options.auto) {
    ports = config.discovery.commonPorts;
  }

  if (options.fromDocker || ports) {
    return { docker: Boolean(options.fromDocker), ports };
  }

  return {
    docker: config.discovery.fromDocker,
    ports: config.discovery.fromDocker ? null : config.discovery.commonPorts
  };
}

function printNodes(nodes: NodeRecord[]) {
  console.log(`\nfound ${nodes.length} storage node${nodes.length === 1 ? '' : 's'}\n`);
  for (const node of nodes) {
    const usedGb = (node.disk.used / 1e9).toFixed(2);
    const source = node.origin === 'CONTAINER' ? `docker:${node.name}` : 'port scan';
    console.log(`  ${shortId(node.nodeId)}  ${node.address}:${node.statusPort}  ${node.health.padEnd(12)} ${usedGb} GB used  (${source})`);
  }
  console.log('');
}

export async function discoverCommand(options: DiscoverOptions, command: Command) {
  const { config, logger } = createContext(command.optsWithGlobals(), { dockerHost: options.dockerHost });
  const token = requireToken(config);

  let plan: DiscoveryPlan;
  try {
    plan = planDiscovery(options, config);
  } catch (err) {
    console.error(`\n❌ ERROR: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }

  const timeoutSeconds = options.timeout
    ? parsePositiveInt(options.timeout, '--timeout')
    : config.discovery.timeout;

  const probe = new StatusProbe({
    logger,
    timeoutMs: timeoutSeconds * 1000,
    sessionMode: config.discovery.sessionMode
  });

  // docker first, so a port scan hit for the same node wins
  const discoverers: Discoverer[] = [];
  if (plan.docker) {
    discoverers.push(new ContainerDiscoverer({
      backend: new DockerBackend(config.discovery.dockerHost),
      probe,
      logger,
      imageAllowlist: config.discovery.imageAllowlist,
      nameHints: config.discovery.nameHints
    }));
  }
  if (plan.ports) {
    const host = options.server ?? await detectLocalAddress(logger);
    logger.info({ host, ports: plan.ports }, 'scanning for storage nodes');
    discoverers.push(new PortScanDiscoverer({ probe, logger, target: { host, ports: plan.ports } }));
  }

  logger.info('starting node discovery...');
  const { nodes } = await new DiscoveryAggregator(discoverers, logger).run();

  if (nodes.length === 0) {
    logger.warn('no storage nodes discovered');
    return;
  }

  if (options.json) {
    console.log(JSON.stringify(nodes, null, 2));
  } else {
    printNodes(nodes);
  }

  const registry = new RegistryClient({
    baseUrl: config.api.url,
    token,
    logger,
    sessionMode: config.api.sessionMode,
    timeoutMs: config.api.timeout * 1000
  });

  const registered = await registry.register(nodes);
  logger.info({ registered, discovered: nodes.length }, 'registration finished');

  if (!options.json) {
    console.log(`registered ${registered} of ${nodes.length} nodes with the dashboard\n`);
  }
}

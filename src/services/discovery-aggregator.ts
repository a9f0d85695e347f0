import type { Logger } from 'pino';
import { shortId } from '../lib/node-record.js';
import { Discoverer, NodeRecord } from '../lib/types.js';

// collapse records by node id, later records win
export function dedupeByNodeId(records: NodeRecord[]): NodeRecord[] {
  const unique = new Map<string, NodeRecord>();
  for (const record of records) {
    if (!record.nodeId) continue;
    unique.set(record.nodeId, record);
  }
  return [...unique.values()];
}

export interface AggregateResult {
  nodes: NodeRecord[];
  // per discoverer, before dedup
  found: Record<string, number>;
}

export class DiscoveryAggregator {
  private discoverers: Discoverer[];
  private logger: Logger;

  constructor(discoverers: Discoverer[], logger: Logger) {
    this.discoverers = discoverers;
    this.logger = logger;
  }

  async run(): Promise<AggregateResult> {
    const all: NodeRecord[] = [];
    const found: Record<string, number> = {};

    // in order, so a later discoverer overrides an earlier one
    for (const discoverer of this.discoverers) {
      let records: NodeRecord[];
      try {
        records = await discoverer.discover();
      } catch (err) {
        this.logger.error({ err, discoverer: discoverer.name }, 'discoverer failed');
        records = [];
      }

      found[discoverer.name] = (found[discoverer.name] ?? 0) + records.length;
      this.logger.info({ discoverer: discoverer.name, count: records.length }, 'discoverer finished');
      all.push(...records);
    }

    const anonymous = all.filter(r => !r.nodeId);
    if (anonymous.length > 0) {
      this.logger.warn(
        { count: anonymous.length, names: anonymous.map(r => r.name) },
        'dropping nodes that did not report an id'
      );
    }

    const nodes = dedupeByNodeId(all);
    this.logger.info(
      { total: all.length, unique: nodes.length, nodes: nodes.map(n => shortId(n.nodeId)) },
      'discovery complete'
    );

    return { nodes, found };
  }
}

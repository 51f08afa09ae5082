/**
 * SPFEngine - Dijkstra shortest-path-first over the LSDB (RFC 2328 §16.1)
 *
 *   1. Reset every LSA to not-explored, put the root in the tree.
 *   2. From the vertex just added, relax each link record:
 *        point-to-point → router vertex (needs an LSA that links back)
 *        stub-network   → network vertex (leaf)
 *   3. Move the closest candidate into the tree; repeat from it.
 *   4. Stop when no candidates remain.
 *
 * Equal-cost paths give a vertex several parents. Distances are unsigned
 * 32-bit: a path whose sum would exceed that is rejected, never wrapped.
 */

import { IPAddress, SubnetMask } from '../../core/types';
import { Logger } from '../../core/Logger';
import type { LinkStateDatabase } from '../LinkStateDatabase';
import type { LinkRecord } from '../LinkRecord';
import type { RouterLSA } from '../RouterLSA';
import { MAX_METRIC } from '../types';
import type { VertexType } from '../types';
import { MetricOverflowError } from '../errors';
import { SPFTree } from './SPFTree';
import type { VertexHandle } from './SPFTree';
import { CandidateQueue } from './CandidateQueue';

const SOURCE = 'spf';

/**
 * distance + metric, or MetricOverflowError past MAX_METRIC
 */
export function addMetrics(distance: number, metric: number): number {
  const sum = distance + metric;
  if (sum > MAX_METRIC) throw new MetricOverflowError(distance, metric);
  return sum;
}

export interface SPFStats {
  /** Paths dropped because their distance would overflow */
  rejectedPaths: number;
  /** Point-to-point records whose target has no LSA, or no link back */
  unresolvedLinks: number;
}

export class SPFEngine {
  private stats: SPFStats = { rejectedPaths: 0, unresolvedLinks: 0 };

  constructor(private readonly lsdb: LinkStateDatabase) {}

  getLastStats(): SPFStats {
    return { ...this.stats };
  }

  /**
   * Compute the shortest-path tree rooted at `rootId`.
   * A root without an LSA yields an empty tree.
   */
  calculate(rootId: IPAddress): SPFTree {
    this.stats = { rejectedPaths: 0, unresolvedLinks: 0 };
    this.lsdb.resetStatus();

    const tree = new SPFTree();
    const rootLSA = this.lsdb.lookup(rootId);
    if (!rootLSA) {
      Logger.debug(SOURCE, 'spf:no-root', `No LSA for root ${rootId}, nothing to compute`);
      return tree;
    }

    const root = tree.addVertex('router', rootId, null, rootLSA, 0);
    tree.markInTree(root);

    const candidates = new CandidateQueue((a, b) => tree.compare(a, b));
    let current: VertexHandle | null = root;

    while (current !== null) {
      this.relax(tree, candidates, current);
      current = candidates.pop();
      if (current !== null) tree.markInTree(current);
    }

    Logger.debug(SOURCE, 'spf:run',
      `SPF from ${rootId}: ${tree.getTreeVertices().length} vertices in tree`,
      { ...this.stats });
    return tree;
  }

  private relax(tree: SPFTree, candidates: CandidateQueue, handle: VertexHandle): void {
    const vertex = tree.get(handle);
    if (vertex.vertexType !== 'router' || !vertex.lsa) return;

    for (const record of vertex.lsa.getLinkRecords()) {
      switch (record.getLinkType()) {
        case 'point-to-point': {
          const neighborLSA = this.lsdb.lookup(record.getLinkId());
          if (!neighborLSA || !SPFEngine.linksBackTo(neighborLSA, vertex.vertexId)) {
            this.stats.unresolvedLinks++;
            Logger.debug(SOURCE, 'spf:unresolved-link',
              `${vertex.vertexId} → ${record.getLinkId()}: no usable LSA`);
            continue;
          }
          this.consider(tree, candidates, handle, 'router', record.getLinkId(), null, neighborLSA, record);
          break;
        }
        case 'stub-network': {
          const mask = SPFEngine.maskOf(record);
          if (!mask) continue;
          this.consider(tree, candidates, handle, 'network', record.getLinkId(), mask, null, record);
          break;
        }
        default:
          // transit and virtual links are never advertised by discovery
          break;
      }
    }
  }

  private consider(
    tree: SPFTree,
    candidates: CandidateQueue,
    parent: VertexHandle,
    vertexType: VertexType,
    vertexId: IPAddress,
    mask: SubnetMask | null,
    lsa: RouterLSA | null,
    record: LinkRecord,
  ): void {
    const parentVertex = tree.get(parent);
    const existing = tree.find(vertexType, vertexId, mask);
    if (existing !== null && tree.get(existing).status === 'in-tree') return;

    let distance: number;
    try {
      distance = addMetrics(parentVertex.distanceFromRoot, record.getMetric());
    } catch (err) {
      if (!(err instanceof MetricOverflowError)) throw err;
      this.stats.rejectedPaths++;
      Logger.warn(SOURCE, 'spf:metric-overflow',
        `${parentVertex.vertexId} → ${vertexId}: ${err.message}, path rejected`);
      return;
    }

    if (existing === null) {
      const handle = tree.addVertex(vertexType, vertexId, mask, lsa, distance);
      const vertex = tree.get(handle);
      vertex.status = 'candidate';
      vertex.parents = [parent];
      lsa?.setStatus('candidate');
      candidates.push(handle);
      return;
    }

    const vertex = tree.get(existing);
    if (distance < vertex.distanceFromRoot) {
      vertex.distanceFromRoot = distance;
      vertex.parents = [parent];
      candidates.update(existing);
    } else if (distance === vertex.distanceFromRoot && !vertex.parents.includes(parent)) {
      vertex.parents.push(parent);
    }
  }

  /** RFC 2328 §16.1 (2)(b): the neighbour must advertise a link back */
  private static linksBackTo(lsa: RouterLSA, routerId: IPAddress): boolean {
    for (let i = 0; i < lsa.getNLinkRecords(); i++) {
      const r = lsa.getLinkRecord(i);
      if (r && r.getLinkType() === 'point-to-point' && r.getLinkId().equals(routerId)) return true;
    }
    return false;
  }

  private static maskOf(record: LinkRecord): SubnetMask | null {
    try {
      return new SubnetMask(record.getLinkData().getOctets());
    } catch (err) {
      Logger.warn(SOURCE, 'spf:bad-mask',
        `stub ${record.getLinkId()}: ${err instanceof Error ? err.message : String(err)}, skipped`);
      return null;
    }
  }
}

/**
 * LinkStateDatabase - Router ID → Router-LSA
 *
 * Rebuilt wholesale by build(): every routing node rediscovers its LSAs and
 * the database keeps its own copy. LSAs returned by lookup() belong to the
 * database (the SPF engine marks their status) and are only valid until the
 * next build() or clear().
 */

import { IPAddress } from '../core/types';
import { Logger } from '../core/Logger';
import type { NetworkNode } from '../equipment/NetworkNode';
import { RouterLSA } from './RouterLSA';
import { MalformedTopologyError } from './errors';

export interface DiscoveryFailure {
  nodeId: string;
  nodeName: string;
  routerId: string;
  error: MalformedTopologyError;
}

export interface BuildReport {
  /** Routing nodes visited */
  routers: number;
  /** LSAs installed */
  lsas: number;
  failures: DiscoveryFailure[];
}

const SOURCE = 'lsdb';

export class LinkStateDatabase {
  private database: Map<number, RouterLSA> = new Map();

  // ─── Build ─────────────────────────────────────────────────────

  /**
   * Clear the database, then run discovery on every routing node in
   * ascending node index order and install the resulting LSAs. A router
   * with no links has no advertisement: lookup() reports it as not found.
   * A malformed channel only costs the nodes attached to it their LSAs.
   */
  build(nodes: NetworkNode[]): BuildReport {
    this.clear();

    const report: BuildReport = { routers: 0, lsas: 0, failures: [] };
    const ordered = [...nodes].sort((a, b) => a.getIndex() - b.getIndex());

    for (const node of ordered) {
      const router = node.getRouter();
      if (!router) continue;
      report.routers++;

      let count: number;
      try {
        count = router.discoverLSAs();
      } catch (err) {
        if (!(err instanceof MalformedTopologyError)) throw err;
        report.failures.push({
          nodeId: node.getId(),
          nodeName: node.getName(),
          routerId: router.getRouterId().toString(),
          error: err,
        });
        Logger.error(SOURCE, 'lsdb:discovery-failed',
          `${node.getName()} (${router.getRouterId()}): ${err.message}`);
        continue;
      }

      for (let i = 0; i < count; i++) {
        const lsa = router.getLSA(i);
        if (!lsa) continue;
        if (lsa.isEmpty()) {
          Logger.debug(SOURCE, 'lsdb:empty-lsa',
            `${node.getName()} (${router.getRouterId()}): no links, not installed`);
          continue;
        }
        this.insert(lsa);
        report.lsas++;
      }
    }

    Logger.info(SOURCE, 'lsdb:build',
      `LSDB built: ${report.lsas} LSAs from ${report.routers} routers, ${report.failures.length} failures`);
    return report;
  }

  // ─── Access ────────────────────────────────────────────────────

  /**
   * Install (or replace) the LSA for its link state ID. The database stores a copy.
   */
  insert(lsa: RouterLSA): void {
    this.database.set(lsa.getLinkStateId().toUint32(), lsa.clone());
  }

  lookup(routerId: IPAddress): RouterLSA | null {
    return this.database.get(routerId.toUint32()) ?? null;
  }

  has(routerId: IPAddress): boolean {
    return this.database.has(routerId.toUint32());
  }

  clear(): void {
    this.database.clear();
  }

  get size(): number {
    return this.database.size;
  }

  /** Router IDs in ascending order */
  getRouterIds(): IPAddress[] {
    return Array.from(this.database.keys()).sort((a, b) => a - b).map(IPAddress.fromUint32);
  }

  /** Mark every LSA not-explored; run at the start of each SPF computation */
  resetStatus(): void {
    for (const lsa of this.database.values()) {
      lsa.setStatus('not-explored');
    }
  }

  // ─── Diagnostics ───────────────────────────────────────────────

  dump(): string {
    const ids = this.getRouterIds();
    if (ids.length === 0) return 'LSDB is empty.';
    const lines: string[] = [];
    for (const id of ids) {
      const lsa = this.lookup(id);
      if (lsa) lines.push(...lsa.print());
    }
    return lines.join('\n');
  }
}

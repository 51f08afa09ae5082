/**
 * RouteManager - Global route computation
 *
 * Gathers LSAs from every routing node into the LSDB, then runs SPF with
 * each router as root and installs the result into that node's forwarding
 * table, replacing the routes it installed last time.
 *
 *   manager.buildRoutingDatabase();   // discovery on all routers
 *   manager.initializeRoutes();       // SPF + install, per router
 *
 * Calling initializeRoutes() without a build leaves every table without
 * global routes; it is not an error.
 */

import { Logger } from '../core/Logger';
import { NetworkNode } from '../equipment/NetworkNode';
import { createRoutingStore } from '../store';
import type { RoutingStore } from '../store';
import { LinkStateDatabase } from './LinkStateDatabase';
import type { BuildReport } from './LinkStateDatabase';
import { SPFEngine } from './spf/SPFEngine';
import { extractRoutes } from './spf/routes';

const SOURCE = 'route-manager';

export class RouteManager {
  private readonly lsdb = new LinkStateDatabase();
  private readonly spf = new SPFEngine(this.lsdb);
  private readonly store: RoutingStore = createRoutingStore();
  private readonly nodeSource: () => NetworkNode[];

  /**
   * @param nodeSource - nodes to consider; defaults to every registered node
   */
  constructor(nodeSource: () => NetworkNode[] = () => NetworkNode.getAllNodes()) {
    this.nodeSource = nodeSource;
  }

  getLinkStateDatabase(): LinkStateDatabase { return this.lsdb; }
  getStore(): RoutingStore { return this.store; }

  /**
   * Build the LSDB from every routing node's LSAs.
   */
  buildRoutingDatabase(): BuildReport {
    const report = this.lsdb.build(this.nodeSource());

    this.store.getState().recordBuild({
      routers: report.routers,
      lsas: report.lsas,
      failures: report.failures.map(f => ({
        nodeName: f.nodeName,
        routerId: f.routerId,
        channelId: f.error.channelId,
        message: f.error.message,
      })),
    });

    if (report.failures.length > 0) {
      Logger.warn(SOURCE, 'route-manager:build',
        `${report.failures.length} router(s) failed discovery: ` +
        report.failures.map(f => f.nodeName).join(', '));
    }
    return report;
  }

  /**
   * Run SPF for every router and install its routes.
   * Returns the total number of routes installed.
   */
  initializeRoutes(): number {
    const nodes = [...this.nodeSource()].sort((a, b) => a.getIndex() - b.getIndex());
    const installed: Record<string, number> = {};
    let total = 0;

    for (const node of nodes) {
      const router = node.getRouter();
      if (!router) continue;

      const tree = this.spf.calculate(router.getRouterId());
      const routes = extractRoutes(tree, node);
      const count = node.getForwardingTable().replaceRoutes('global', routes);

      installed[node.getName()] = count;
      total += count;

      const stats = this.spf.getLastStats();
      Logger.info(node.getId(), 'route-manager:install',
        `${node.getName()}: ${count} global routes installed`,
        { routerId: router.getRouterId().toString(), ...stats });
    }

    this.store.getState().recordRoutes(installed);
    return total;
  }

  /**
   * buildRoutingDatabase() followed by initializeRoutes().
   */
  populateRoutingTables(): BuildReport {
    const report = this.buildRoutingDatabase();
    this.initializeRoutes();
    return report;
  }
}

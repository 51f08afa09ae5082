/**
 * ForwardingTable - Per-node route sink
 *
 * Holds connected, static and globally computed routes side by side.
 * Each source is replaced as a whole: the route manager swaps out every
 * 'global' entry on each computation and never touches the others.
 *
 * Lookup is Longest Prefix Match; ties go to the preferred source
 * (connected, then static, then global), then to the lowest metric.
 */

import { IPAddress, SubnetMask } from '../core/types';
import { Logger } from '../core/Logger';

export type RouteSource = 'connected' | 'static' | 'global';

const SOURCE_PREFERENCE: Record<RouteSource, number> = {
  connected: 0,
  static: 1,
  global: 2,
};

const SOURCE_CODE: Record<RouteSource, string> = {
  connected: 'C',
  static: 'S',
  global: 'G',
};

export interface RouteEntry {
  /** Destination network or host address */
  network: IPAddress;
  /** Subnet mask (255.255.255.255 for host routes) */
  mask: SubnetMask;
  /** Next-hop IP (null for connected routes) */
  nextHop: IPAddress | null;
  /** Outgoing interface name */
  iface: string;
  /** Additive path cost */
  metric: number;
  source: RouteSource;
}

export type RouteSpec = Omit<RouteEntry, 'source'>;

export class ForwardingTable {
  private readonly nodeId: string;
  private routes: RouteEntry[] = [];

  constructor(nodeId: string) {
    this.nodeId = nodeId;
  }

  getRoutes(source?: RouteSource): RouteEntry[] {
    const routes = source ? this.routes.filter(r => r.source === source) : this.routes;
    return routes.map(r => ({ ...r }));
  }

  get size(): number {
    return this.routes.length;
  }

  // ─── Mutation ──────────────────────────────────────────────────

  addConnectedRoute(network: IPAddress, mask: SubnetMask, iface: string): void {
    this.routes = this.routes.filter(r => !(r.source === 'connected' && r.iface === iface));
    this.routes.push({
      network: network.getNetwork(mask),
      mask,
      nextHop: null,
      iface,
      metric: 0,
      source: 'connected',
    });
  }

  removeConnectedRoute(iface: string): void {
    this.routes = this.routes.filter(r => !(r.source === 'connected' && r.iface === iface));
  }

  addStaticRoute(network: IPAddress, mask: SubnetMask, nextHop: IPAddress, iface: string, metric: number = 0): void {
    this.routes.push({
      network: network.getNetwork(mask),
      mask,
      nextHop,
      iface,
      metric,
      source: 'static',
    });
    Logger.info(this.nodeId, 'fib:route-add',
      `static route ${network}/${mask.toCIDR()} via ${nextHop} metric ${metric}`);
  }

  /**
   * Replace every entry of `source` with `entries`.
   * Returns the number of entries installed.
   */
  replaceRoutes(source: RouteSource, entries: RouteSpec[]): number {
    const removed = this.removeRoutes(source);
    for (const e of entries) {
      this.routes.push({ ...e, source });
    }
    Logger.debug(this.nodeId, 'fib:replace',
      `${SOURCE_CODE[source]}: ${removed} removed, ${entries.length} installed`);
    return entries.length;
  }

  removeRoutes(source: RouteSource): number {
    const before = this.routes.length;
    this.routes = this.routes.filter(r => r.source !== source);
    return before - this.routes.length;
  }

  clear(): void {
    this.routes = [];
  }

  // ─── Lookup ────────────────────────────────────────────────────

  /**
   * Longest Prefix Match: find the best route for a destination IP.
   */
  lookup(destIP: IPAddress): RouteEntry | null {
    let bestRoute: RouteEntry | null = null;
    let bestPrefix = -1;

    const destInt = destIP.toUint32();

    for (const route of this.routes) {
      const maskInt = route.mask.toUint32();
      const prefix = route.mask.toCIDR();

      if (((destInt & maskInt) >>> 0) !== ((route.network.toUint32() & maskInt) >>> 0)) continue;

      if (prefix > bestPrefix) {
        bestPrefix = prefix;
        bestRoute = route;
      } else if (prefix === bestPrefix && bestRoute) {
        const pa = SOURCE_PREFERENCE[route.source];
        const pb = SOURCE_PREFERENCE[bestRoute.source];
        if (pa < pb || (pa === pb && route.metric < bestRoute.metric)) {
          bestRoute = route;
        }
      }
    }

    return bestRoute ? { ...bestRoute } : null;
  }

  // ─── Display ───────────────────────────────────────────────────

  format(): string {
    const lines = ['Codes: C - connected, S - static, G - global', ''];
    const sorted = [...this.routes].sort((a, b) =>
      SOURCE_PREFERENCE[a.source] - SOURCE_PREFERENCE[b.source]
      || IPAddress.compare(a.network, b.network)
      || a.mask.toCIDR() - b.mask.toCIDR());
    for (const r of sorted) {
      const via = r.nextHop ? `[${r.metric}] via ${r.nextHop}` : 'is directly connected';
      lines.push(`${SOURCE_CODE[r.source]}    ${r.network}/${r.mask.toCIDR()} ${via}, ${r.iface}`);
    }
    return lines.length > 2 ? lines.join('\n') : 'No routes configured.';
  }
}

/**
 * Route extraction - SPF tree → forwarding entries for the root node
 *
 * Every vertex is traced back along its parents to the routers adjacent to
 * the root (several of them when paths tie). For each such first hop the
 * next hop is its address on the link back to the root and the outgoing
 * interface is the root's end of that link. The lowest next-hop address wins.
 *
 *   router vertex  → a /32 per interface address the router advertises
 *   network vertex → the network itself, unless the root is attached to it
 */

import { IPAddress, SubnetMask } from '../../core/types';
import type { NetworkNode } from '../../equipment/NetworkNode';
import type { RouteSpec } from '../ForwardingTable';
import type { RouterLSA } from '../RouterLSA';
import type { LinkRecord } from '../LinkRecord';
import type { SPFTree, SPFVertex, VertexHandle } from './SPFTree';

interface FirstHop {
  nextHop: IPAddress;
  iface: string;
}

function pointToPointTo(lsa: RouterLSA | null, routerId: IPAddress): LinkRecord[] {
  if (!lsa) return [];
  return lsa.getLinkRecords().filter(
    r => r.getLinkType() === 'point-to-point' && r.getLinkId().equals(routerId));
}

function byAddress(a: LinkRecord, b: LinkRecord): number {
  return a.getMetric() - b.getMetric() || IPAddress.compare(a.getLinkData(), b.getLinkData());
}

/**
 * Next hop and interface towards a router adjacent to the root.
 */
function resolveFirstHop(root: SPFVertex, hop: SPFVertex, rootNode: NetworkNode): FirstHop | null {
  const outgoing = pointToPointTo(root.lsa, hop.vertexId)
    .filter(r => r.getMetric() === hop.distanceFromRoot)
    .sort(byAddress);
  const incoming = pointToPointTo(hop.lsa, root.vertexId)
    .map(r => r.getLinkData())
    .sort(IPAddress.compare);
  if (incoming.length === 0) return null;

  let fallback: FirstHop | null = null;
  for (const record of outgoing) {
    const port = rootNode.findPortByIP(record.getLinkData());
    if (!port) continue;
    const mask = port.getSubnetMask();
    const peerAddr = mask
      ? incoming.find(addr => addr.isInSameSubnet(record.getLinkData(), mask))
      : undefined;
    if (peerAddr) return { nextHop: peerAddr, iface: port.getName() };
    fallback ??= { nextHop: incoming[0], iface: port.getName() };
  }
  return fallback;
}

function compareHops(a: FirstHop, b: FirstHop): number {
  return IPAddress.compare(a.nextHop, b.nextHop) || a.iface.localeCompare(b.iface);
}

export function extractRoutes(tree: SPFTree, rootNode: NetworkNode): RouteSpec[] {
  const root = tree.getRoot();
  if (!root) return [];

  const rootStubs = new Set(
    (root.lsa?.getLinkRecords() ?? [])
      .filter(r => r.getLinkType() === 'stub-network')
      .map(r => `${r.getLinkId()}/${r.getLinkData()}`));

  const hopCache = new Map<VertexHandle, FirstHop | null>();
  const firstHopsCache = new Map<VertexHandle, VertexHandle[]>();

  const firstHopsOf = (handle: VertexHandle): VertexHandle[] => {
    const cached = firstHopsCache.get(handle);
    if (cached) return cached;
    const hops = new Set<VertexHandle>();
    for (const p of tree.get(handle).parents) {
      if (p === root.handle) {
        hops.add(handle);
      } else {
        for (const h of firstHopsOf(p)) hops.add(h);
      }
    }
    const result = [...hops];
    firstHopsCache.set(handle, result);
    return result;
  };

  const hopFor = (handle: VertexHandle): FirstHop | null => {
    if (!hopCache.has(handle)) {
      hopCache.set(handle, resolveFirstHop(root, tree.get(handle), rootNode));
    }
    return hopCache.get(handle) ?? null;
  };

  const routes = new Map<string, RouteSpec>();
  const add = (network: IPAddress, mask: SubnetMask, hop: FirstHop, metric: number): void => {
    const key = `${network}/${mask.toCIDR()}`;
    const existing = routes.get(key);
    if (existing && existing.metric <= metric) return;
    routes.set(key, { network, mask, nextHop: hop.nextHop, iface: hop.iface, metric });
  };

  for (const vertex of tree.getTreeVertices()) {
    if (vertex.handle === root.handle) continue;
    if (vertex.vertexType === 'network' && rootStubs.has(`${vertex.vertexId}/${vertex.mask}`)) continue;

    const hops = firstHopsOf(vertex.handle)
      .map(hopFor)
      .filter((h): h is FirstHop => h !== null)
      .sort(compareHops);
    if (hops.length === 0) continue;
    const hop = hops[0];

    if (vertex.vertexType === 'router') {
      const addresses = (vertex.lsa?.getLinkRecords() ?? [])
        .filter(r => r.getLinkType() === 'point-to-point')
        .map(r => r.getLinkData());
      for (const addr of addresses) {
        add(addr, SubnetMask.host(), hop, vertex.distanceFromRoot);
      }
    } else if (vertex.mask) {
      add(vertex.vertexId, vertex.mask, hop, vertex.distanceFromRoot);
    }
  }

  return [...routes.values()].sort((a, b) =>
    IPAddress.compare(a.network, b.network) || a.mask.toCIDR() - b.mask.toCIDR());
}

/**
 * RouteManager: end-to-end route computation and installation
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  IPAddress,
  SubnetMask,
  Logger,
  NetworkNode,
  PointToPointChannel,
  RouteManager,
  resetCounters,
  resetRouterIdAllocator,
} from '@/network';
import type { RouteEntry } from '@/network';
import { lineTopology, link, router } from './topology';

beforeEach(() => {
  NetworkNode.clearRegistry();
  resetRouterIdAllocator();
  resetCounters();
  Logger.reset();
});

function describeRoute(r: RouteEntry): string {
  return `${r.network}/${r.mask.toCIDR()} via ${r.nextHop} ${r.iface} metric ${r.metric}`;
}

function globalRoutes(node: NetworkNode): string[] {
  return node.getForwardingTable().getRoutes('global').map(describeRoute);
}

/**
 * Four routers in a square, every link cost 1:
 *
 *   R1 eth0 ── eth0 R2 eth1 ── eth0 R4
 *   R1 eth1 ── eth0 R3 eth1 ── eth1 R4
 */
function squareTopology(reverse: boolean = false) {
  const names = reverse ? ['R4', 'R3', 'R2', 'R1'] : ['R1', 'R2', 'R3', 'R4'];
  const byName = new Map(names.map((n): [string, NetworkNode] => [n, router(n)]));
  const node = (name: string): NetworkNode => {
    const n = byName.get(name);
    if (!n) throw new Error(`unknown node ${name}`);
    return n;
  };

  const links = [
    () => link({ node: node('R1'), iface: 'eth0', ip: '10.0.1.1' }, { node: node('R2'), iface: 'eth0', ip: '10.0.1.2' }),
    () => link({ node: node('R1'), iface: 'eth1', ip: '10.0.2.1' }, { node: node('R3'), iface: 'eth0', ip: '10.0.2.2' }),
    () => link({ node: node('R2'), iface: 'eth1', ip: '10.0.3.1' }, { node: node('R4'), iface: 'eth0', ip: '10.0.3.2' }),
    () => link({ node: node('R3'), iface: 'eth1', ip: '10.0.4.1' }, { node: node('R4'), iface: 'eth1', ip: '10.0.4.2' }),
  ];
  (reverse ? [...links].reverse() : links).forEach(make => make());
  return { r1: node('R1'), r4: node('R4') };
}

// ═══════════════════════════════════════════════════════════════════
// Three routers in a line
// ═══════════════════════════════════════════════════════════════════

describe('RouteManager: routers in a line', () => {
  it('should install host routes towards every other router on R1', () => {
    const { r1 } = lineTopology();
    new RouteManager().populateRoutingTables();

    expect(globalRoutes(r1)).toEqual([
      '10.1.1.2/32 via 10.1.1.2 eth0 metric 1',
      '10.1.2.1/32 via 10.1.1.2 eth0 metric 1',
      '10.1.2.2/32 via 10.1.1.2 eth0 metric 2',
    ]);
  });

  it('should install the mirror-image routes on R3', () => {
    const { r3 } = lineTopology();
    new RouteManager().populateRoutingTables();

    expect(globalRoutes(r3)).toEqual([
      '10.1.1.1/32 via 10.1.2.1 eth0 metric 2',
      '10.1.1.2/32 via 10.1.2.1 eth0 metric 1',
      '10.1.2.1/32 via 10.1.2.1 eth0 metric 1',
    ]);
  });

  it('should pick the outgoing interface towards each neighbour on R2', () => {
    const { r2 } = lineTopology();
    new RouteManager().populateRoutingTables();

    expect(globalRoutes(r2)).toEqual([
      '10.1.1.1/32 via 10.1.1.1 eth0 metric 1',
      '10.1.2.2/32 via 10.1.2.2 eth1 metric 1',
    ]);
  });

  it('should return the total number of routes installed', () => {
    lineTopology();
    const manager = new RouteManager();
    manager.buildRoutingDatabase();
    expect(manager.initializeRoutes()).toBe(8);
  });

  it('should resolve a remote address through the forwarding table', () => {
    const { r1 } = lineTopology();
    new RouteManager().populateRoutingTables();

    const route = r1.getForwardingTable().lookup(new IPAddress('10.1.2.2'));
    expect(route?.source).toBe('global');
    expect(route?.nextHop?.toString()).toBe('10.1.1.2');
    expect(route?.iface).toBe('eth0');
    expect(route?.metric).toBe(2);
  });

  it('should leave connected routes alone', () => {
    const { r1 } = lineTopology();
    new RouteManager().populateRoutingTables();

    expect(r1.getForwardingTable().getRoutes('connected').map(r => `${r.network}/${r.mask.toCIDR()}`))
      .toEqual(['10.1.1.0/30']);
  });
});

// ═══════════════════════════════════════════════════════════════════
// Lifecycle
// ═══════════════════════════════════════════════════════════════════

describe('RouteManager: lifecycle', () => {
  it('should install nothing when the database was never built', () => {
    const { r1, r2, r3 } = lineTopology();
    const manager = new RouteManager();

    expect(manager.initializeRoutes()).toBe(0);
    expect([r1, r2, r3].map(n => n.getForwardingTable().getRoutes('global'))).toEqual([[], [], []]);
  });

  it('should replace global routes instead of accumulating them', () => {
    const { r1 } = lineTopology();
    const manager = new RouteManager();
    manager.populateRoutingTables();
    const first = globalRoutes(r1);
    manager.populateRoutingTables();

    expect(globalRoutes(r1)).toEqual(first);
    expect(manager.getStore().getState().computations).toBe(2);
  });

  it('should withdraw routes after a link goes down', () => {
    const { r1, r2 } = lineTopology();
    const manager = new RouteManager();
    manager.populateRoutingTables();

    r2.getPort('eth1')?.setUp(false);
    manager.populateRoutingTables();

    expect(globalRoutes(r1)).toEqual(['10.1.1.2/32 via 10.1.1.2 eth0 metric 1']);
  });

  it('should only consider the nodes it is given', () => {
    const { r1, r2, r3 } = lineTopology();
    const manager = new RouteManager(() => [r1, r2]);
    const report = manager.buildRoutingDatabase();
    manager.initializeRoutes();

    expect(report.routers).toBe(2);
    expect(manager.getLinkStateDatabase().size).toBe(2);
    expect(globalRoutes(r1)).toEqual([
      '10.1.1.2/32 via 10.1.1.2 eth0 metric 1',
      '10.1.2.1/32 via 10.1.1.2 eth0 metric 1',
    ]);
    expect(globalRoutes(r3)).toEqual([]);
  });

  it('should publish a summary to its store', () => {
    lineTopology();
    const manager = new RouteManager();
    manager.populateRoutingTables();

    const state = manager.getStore().getState();
    expect(state.lastBuild).toEqual({ routers: 3, lsas: 3, failures: [] });
    expect(state.installedRoutes).toEqual({ R1: 3, R2: 2, R3: 3 });
    expect(state.computations).toBe(1);
  });

  it('should log one install event per router', () => {
    lineTopology();
    new RouteManager().populateRoutingTables();

    expect(Logger.getLogsByEvent('route-manager:install').map(l => l.message)).toEqual([
      'R1: 3 global routes installed',
      'R2: 2 global routes installed',
      'R3: 3 global routes installed',
    ]);
  });
});

// ═══════════════════════════════════════════════════════════════════
// Stub networks
// ═══════════════════════════════════════════════════════════════════

describe('RouteManager: stub networks', () => {
  it('should route to a stub behind another router with its cost added', () => {
    const { r1, r3 } = lineTopology();
    r3.addStubNetwork(new IPAddress('172.16.0.0'), SubnetMask.fromCIDR(16), 5);
    new RouteManager().populateRoutingTables();

    expect(globalRoutes(r1)).toContain('172.16.0.0/16 via 10.1.1.2 eth0 metric 7');
  });

  it('should route to an unconnected interface subnet', () => {
    const { r1, r3 } = lineTopology();
    r3.addInterface('lo0', new IPAddress('192.168.3.1'), SubnetMask.fromCIDR(24));
    new RouteManager().populateRoutingTables();

    expect(globalRoutes(r1)).toContain('192.168.3.0/24 via 10.1.1.2 eth0 metric 3');
  });

  it('should not install a route to a subnet the root is attached to', () => {
    const { r3 } = lineTopology();
    r3.addStubNetwork(new IPAddress('172.16.0.0'), SubnetMask.fromCIDR(16));
    new RouteManager().populateRoutingTables();

    expect(globalRoutes(r3).some(r => r.startsWith('172.16.0.0/16'))).toBe(false);
  });

  it('should not route to its own subnet when a neighbour advertises it more cheaply', () => {
    const r1 = router('R1');
    const r2 = router('R2');
    link({ node: r1, iface: 'eth0', ip: '10.1.1.1' }, { node: r2, iface: 'eth0', ip: '10.1.1.2' });
    r1.addStubNetwork(new IPAddress('172.16.0.0'), SubnetMask.fromCIDR(16), 10);
    r2.addStubNetwork(new IPAddress('172.16.0.0'), SubnetMask.fromCIDR(16), 0);
    new RouteManager().populateRoutingTables();

    expect(globalRoutes(r1)).toEqual(['10.1.1.2/32 via 10.1.1.2 eth0 metric 1']);
    expect(globalRoutes(r2)).toEqual(['10.1.1.1/32 via 10.1.1.1 eth0 metric 1']);
  });

  it('should leave isolated stub routers unreachable', () => {
    const r1 = router('R1');
    const r2 = router('R2');
    r1.addStubNetwork(new IPAddress('10.0.0.0'), SubnetMask.fromCIDR(24));
    r2.addStubNetwork(new IPAddress('10.0.1.0'), SubnetMask.fromCIDR(24));

    const manager = new RouteManager();
    const report = manager.buildRoutingDatabase();

    expect(report.lsas).toBe(2);
    expect(manager.initializeRoutes()).toBe(0);
    expect(globalRoutes(r2)).toEqual([]);
  });
});

// ═══════════════════════════════════════════════════════════════════
// Equal-cost paths
// ═══════════════════════════════════════════════════════════════════

describe('RouteManager: equal-cost paths', () => {
  const expected = [
    '10.0.1.2/32 via 10.0.1.2 eth0 metric 1',
    '10.0.2.2/32 via 10.0.2.2 eth1 metric 1',
    '10.0.3.1/32 via 10.0.1.2 eth0 metric 1',
    '10.0.3.2/32 via 10.0.1.2 eth0 metric 2',
    '10.0.4.1/32 via 10.0.2.2 eth1 metric 1',
    '10.0.4.2/32 via 10.0.1.2 eth0 metric 2',
  ];

  it('should choose the lowest next-hop address', () => {
    const { r1 } = squareTopology();
    new RouteManager().populateRoutingTables();
    expect(globalRoutes(r1)).toEqual(expected);
  });

  it('should choose the same entry on every run', () => {
    const { r1 } = squareTopology();
    const manager = new RouteManager();
    manager.populateRoutingTables();
    manager.populateRoutingTables();
    expect(globalRoutes(r1)).toEqual(expected);
  });

  it('should not depend on the order the topology was built in', () => {
    const { r1 } = squareTopology(true);
    new RouteManager().populateRoutingTables();
    expect(globalRoutes(r1)).toEqual(expected);
  });

  it('should advertise both links of the far router', () => {
    const { r4 } = squareTopology();
    const manager = new RouteManager();
    manager.buildRoutingDatabase();

    const r4Id = r4.getRouter()?.getRouterId();
    expect(r4Id?.toString()).toBe('0.0.0.4');
    expect(manager.getLinkStateDatabase().lookup(new IPAddress('0.0.0.4'))?.getNLinkRecords()).toBe(2);
  });
});

// ═══════════════════════════════════════════════════════════════════
// Malformed topology
// ═══════════════════════════════════════════════════════════════════

describe('RouteManager: malformed channel', () => {
  function setup() {
    const r1 = router('R1');
    const r2 = router('R2');
    link({ node: r1, iface: 'eth0', ip: '10.1.1.1' }, { node: r2, iface: 'eth0', ip: '10.1.1.2' });

    const bad = new PointToPointChannel('ch-bad');
    const members = ['R3', 'R4', 'R5'].map(router);
    members.forEach((node, i) => {
      bad.attach(node.addInterface('eth0', new IPAddress(`10.9.0.${i + 1}`), SubnetMask.fromCIDR(24)));
    });
    return { r1, r2, r3: members[0] };
  }

  it('should report the failures and keep routing between healthy routers', () => {
    const { r1, r2, r3 } = setup();
    const manager = new RouteManager();
    const report = manager.populateRoutingTables();

    expect(report.failures).toHaveLength(3);
    expect(globalRoutes(r1)).toEqual(['10.1.1.2/32 via 10.1.1.2 eth0 metric 1']);
    expect(globalRoutes(r2)).toEqual(['10.1.1.1/32 via 10.1.1.1 eth0 metric 1']);
    expect(globalRoutes(r3)).toEqual([]);
  });

  it('should surface the offending channel in the store and the log', () => {
    setup();
    const manager = new RouteManager();
    manager.buildRoutingDatabase();

    expect(manager.getStore().getState().lastBuild?.failures[0]).toEqual({
      nodeName: 'R3',
      routerId: '0.0.0.3',
      channelId: 'ch-bad',
      message: 'channel ch-bad has 3 attached interfaces, point-to-point requires 2',
    });
    expect(Logger.getLogsByEvent('route-manager:build').map(l => l.message))
      .toEqual(['3 router(s) failed discovery: R3, R4, R5']);
  });
});

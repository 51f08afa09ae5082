/**
 * NetworkNode - A node in the simulated topology
 *
 * Every node has:
 * - An ID, a name and a registration index (ascending, never reused until reset)
 * - A set of interfaces (Ports), kept in the order they were added
 * - Locally configured stub subnets
 * - A forwarding table
 * - Optionally, a routing capability (GlobalRouter). Only nodes that carry
 *   one take part in LSDB builds and route computation.
 */

import { Port } from '../hardware/Port';
import { IPAddress, SubnetMask, generateId } from '../core/types';
import type { ConnectionType } from '../core/types';
import { Logger } from '../core/Logger';
import { ForwardingTable } from '../routing/ForwardingTable';
import type { GlobalRouter } from '../routing/GlobalRouter';

export interface StubNetwork {
  network: IPAddress;
  mask: SubnetMask;
  /** Advertised cost; null means the router's configured default */
  cost: number | null;
}

export class NetworkNode {
  /** Global registry of all nodes (for topology traversal) */
  private static registry: Map<string, NetworkNode> = new Map();
  private static nextIndex = 0;

  static getById(id: string): NetworkNode | undefined { return NetworkNode.registry.get(id); }

  /** All registered nodes in ascending index order */
  static getAllNodes(): NetworkNode[] {
    return Array.from(NetworkNode.registry.values()).sort((a, b) => a.index - b.index);
  }

  static clearRegistry(): void {
    NetworkNode.registry.clear();
    NetworkNode.nextIndex = 0;
  }

  private readonly id: string;
  private readonly index: number;
  private readonly name: string;
  private ports: Map<string, Port> = new Map();
  private stubNetworks: StubNetwork[] = [];
  private readonly forwardingTable: ForwardingTable;
  private router: GlobalRouter | null = null;

  constructor(name: string) {
    this.id = generateId('node');
    this.index = NetworkNode.nextIndex++;
    this.name = name;
    this.forwardingTable = new ForwardingTable(this.id);
    NetworkNode.registry.set(this.id, this);
  }

  // ─── Identity ───────────────────────────────────────────────────

  getId(): string { return this.id; }
  getIndex(): number { return this.index; }
  getName(): string { return this.name; }

  // ─── Interfaces ────────────────────────────────────────────────

  /**
   * Add an interface, optionally with an IPv4 configuration.
   * A configured interface also gets a connected route.
   */
  addInterface(name: string, ip?: IPAddress, mask?: SubnetMask, type: ConnectionType = 'serial'): Port {
    if (this.ports.has(name)) {
      throw new Error(`${this.name}: interface ${name} already exists`);
    }
    const port = new Port(name, type);
    port.setNodeId(this.id);
    this.ports.set(name, port);
    if (ip && mask) this.configureInterface(name, ip, mask);
    return port;
  }

  configureInterface(ifName: string, ip: IPAddress, mask: SubnetMask): boolean {
    const port = this.ports.get(ifName);
    if (!port) return false;

    port.configureIP(ip, mask);
    this.forwardingTable.addConnectedRoute(ip, mask, ifName);

    Logger.info(this.id, 'node:interface-config', `${this.name}: ${ifName} configured ${ip}/${mask.toCIDR()}`);
    return true;
  }

  getPort(name: string): Port | undefined {
    return this.ports.get(name);
  }

  getPorts(): Port[] {
    return Array.from(this.ports.values());
  }

  /** Interface whose configured address is exactly `ip` */
  findPortByIP(ip: IPAddress): Port | null {
    for (const port of this.ports.values()) {
      const addr = port.getIPAddress();
      if (addr && addr.equals(ip)) return port;
    }
    return null;
  }

  // ─── Stub Networks ─────────────────────────────────────────────

  addStubNetwork(network: IPAddress, mask: SubnetMask, cost: number | null = null): void {
    if (cost !== null && (!Number.isInteger(cost) || cost < 0 || cost > 0xFFFFFFFF)) {
      throw new RangeError(`Invalid stub cost: ${cost}. Must be an integer in [0, 4294967295].`);
    }
    this.stubNetworks.push({ network: network.getNetwork(mask), mask, cost });
    Logger.info(this.id, 'node:stub-add', `${this.name}: stub network ${network.getNetwork(mask)}/${mask.toCIDR()}`);
  }

  removeStubNetwork(network: IPAddress, mask: SubnetMask): boolean {
    const before = this.stubNetworks.length;
    this.stubNetworks = this.stubNetworks.filter(
      s => !(s.network.equals(network.getNetwork(mask)) && s.mask.equals(mask)));
    return this.stubNetworks.length < before;
  }

  getStubNetworks(): StubNetwork[] {
    return this.stubNetworks.map(s => ({ ...s }));
  }

  // ─── Routing Capability ────────────────────────────────────────

  /** Called by the GlobalRouter constructor */
  setRouter(router: GlobalRouter): void {
    if (this.router && this.router !== router) {
      throw new Error(`${this.name}: a router is already attached to this node`);
    }
    this.router = router;
  }

  getRouter(): GlobalRouter | null { return this.router; }

  isRouter(): boolean { return this.router !== null; }

  // ─── Forwarding ────────────────────────────────────────────────

  getForwardingTable(): ForwardingTable { return this.forwardingTable; }
}

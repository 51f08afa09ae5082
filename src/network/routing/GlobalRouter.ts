/**
 * GlobalRouter - Routing capability attached to a node
 *
 * The presence of a GlobalRouter is what makes a node a router. It walks
 * the node's interfaces and channels and packs what it finds into a
 * Router-LSA (RFC 2328 §12.4.1):
 *
 *   - one point-to-point record per adjacent router
 *       linkId = neighbour router ID, linkData = local interface address
 *   - one stub-network record per configured stub subnet, and per addressed
 *     interface that has no channel
 *       linkId = network address, linkData = mask
 *
 * A channel with other than two attached interfaces aborts discovery for
 * this node with a MalformedTopologyError.
 */

import { IPAddress } from '../core/types';
import { Logger } from '../core/Logger';
import { NetworkNode } from '../equipment/NetworkNode';
import type { Port } from '../hardware/Port';
import { LinkRecord } from './LinkRecord';
import { RouterLSA } from './RouterLSA';
import { allocateRouterId } from './RouterIdAllocator';
import { createDefaultRoutingConfig } from './config';
import type { RoutingConfig } from './config';
import { MalformedTopologyError } from './errors';

export class GlobalRouter {
  private readonly node: NetworkNode;
  private readonly routerId: IPAddress;
  private readonly config: RoutingConfig;
  private lsas: RouterLSA[] = [];

  constructor(node: NetworkNode, config: Partial<RoutingConfig> = {}) {
    this.config = createDefaultRoutingConfig(config);
    this.node = node;
    this.routerId = allocateRouterId();
    node.setRouter(this);
    Logger.info(node.getId(), 'router:create', `${node.getName()}: router ID ${this.routerId}`);
  }

  getRouterId(): IPAddress { return this.routerId; }
  getNode(): NetworkNode { return this.node; }

  // ─── Discovery ─────────────────────────────────────────────────

  /**
   * Rebuild this router's LSA set from the node's current topology.
   * Returns the number of LSAs. The previous set is discarded either way;
   * on a malformed channel the set is left empty and the error rethrown.
   */
  discoverLSAs(): number {
    this.clearLSAs();

    const lsa = RouterLSA.forRouter(this.routerId);

    for (const port of this.node.getPorts()) {
      if (this.config.skipDownInterfaces && !port.getIsUp()) {
        Logger.debug(this.node.getId(), 'router:discover', `${port.getName()}: down, skipped`);
        continue;
      }
      this.discoverPort(port, lsa);
    }

    for (const stub of this.node.getStubNetworks()) {
      lsa.addLinkRecord(new LinkRecord(
        'stub-network', stub.network, new IPAddress(stub.mask.getOctets()),
        stub.cost ?? this.config.defaultStubCost));
    }

    this.lsas.push(lsa);

    Logger.info(this.node.getId(), 'router:discover',
      `${this.node.getName()}: ${lsa.getNLinkRecords()} link records advertised`,
      { routerId: this.routerId.toString() });
    return this.lsas.length;
  }

  private discoverPort(port: Port, lsa: RouterLSA): void {
    const localAddr = port.getIPAddress();
    const channel = port.getChannel();

    if (!channel) {
      const mask = port.getSubnetMask();
      if (this.config.advertiseUnconnectedInterfaces && localAddr && mask) {
        lsa.addLinkRecord(new LinkRecord(
          'stub-network', localAddr.getNetwork(mask), new IPAddress(mask.getOctets()), this.portCost(port)));
      }
      return;
    }

    if (channel.getNDevices() !== 2) {
      Logger.error(this.node.getId(), 'router:malformed-channel',
        `${this.node.getName()}: channel ${channel.getId()} has ${channel.getNDevices()} endpoints`,
        { channel: channel.getId(), endpoints: channel.getNDevices() });
      throw new MalformedTopologyError(this.node.getId(), channel.getId(), channel.getNDevices());
    }

    if (!localAddr) {
      Logger.debug(this.node.getId(), 'router:discover', `${port.getName()}: no IPv4 address, skipped`);
      return;
    }

    const peer = channel.getPeer(port);
    if (!peer || (this.config.skipDownInterfaces && !peer.getIsUp())) {
      Logger.debug(this.node.getId(), 'router:discover',
        `${port.getName()}: peer on ${channel.getId()} is down, skipped`);
      return;
    }
    const peerRouter = this.routerOf(peer);
    if (!peerRouter) {
      Logger.debug(this.node.getId(), 'router:discover',
        `${port.getName()}: peer on ${channel.getId()} is not a router, skipped`);
      return;
    }

    lsa.addLinkRecord(new LinkRecord(
      'point-to-point', peerRouter.getRouterId(), localAddr, this.portCost(port)));
  }

  /** Routing capability of the node that owns `port` */
  private routerOf(port: Port): GlobalRouter | null {
    return NetworkNode.getById(port.getNodeId())?.getRouter() ?? null;
  }

  private portCost(port: Port): number {
    return port.getCost() ?? this.config.defaultInterfaceCost;
  }

  // ─── LSA Access ────────────────────────────────────────────────

  getNumLSAs(): number {
    return this.lsas.length;
  }

  /**
   * Copy of LSA `n`, or null when `n` is outside [0, getNumLSAs()).
   */
  getLSA(n: number): RouterLSA | null {
    const lsa = this.lsas[n];
    return lsa ? lsa.clone() : null;
  }

  private clearLSAs(): void {
    this.lsas = [];
  }
}

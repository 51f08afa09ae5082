/**
 * Port - Network interface on a node
 *
 * A port carries an optional IPv4 configuration, an administrative state,
 * an optional routing cost and at most one point-to-point channel.
 * Topology discovery reads all of these; nothing here transmits frames.
 *
 *   NetworkNode.addInterface() → Port
 *   PointToPointChannel.attach(port) → port.attachChannel(channel)
 */

import { IPAddress, SubnetMask } from '../core/types';
import type { ConnectionType } from '../core/types';
import { Logger } from '../core/Logger';
import type { PointToPointChannel } from './PointToPointChannel';

export interface PortInfo {
  name: string;
  type: ConnectionType;
  nodeId: string;
  ipAddress: string | null;
  subnetMask: string | null;
  cost: number | null;
  isUp: boolean;
  channelId: string | null;
}

export class Port {
  private readonly name: string;
  private readonly type: ConnectionType;
  private nodeId: string = '';
  private channel: PointToPointChannel | null = null;
  private ipAddress: IPAddress | null = null;
  private subnetMask: SubnetMask | null = null;
  private isUp: boolean = true;
  /** Routing cost; null means the router's configured default */
  private cost: number | null = null;

  constructor(name: string, type: ConnectionType = 'serial') {
    this.name = name;
    this.type = type;
  }

  // ─── Identity ───────────────────────────────────────────────────

  getName(): string { return this.name; }
  getNodeId(): string { return this.nodeId; }

  setNodeId(id: string): void {
    this.nodeId = id;
  }

  // ─── IP Configuration ──────────────────────────────────────────

  getIPAddress(): IPAddress | null { return this.ipAddress; }
  getSubnetMask(): SubnetMask | null { return this.subnetMask; }

  configureIP(ip: IPAddress, mask: SubnetMask): void {
    this.ipAddress = ip;
    this.subnetMask = mask;
    Logger.info(this.nodeId, 'port:ip-config', `${this.name}: IP set to ${ip}/${mask.toCIDR()}`);
  }

  // ─── Routing Cost ──────────────────────────────────────────────

  getCost(): number | null { return this.cost; }

  setCost(cost: number | null): void {
    if (cost !== null && (!Number.isInteger(cost) || cost < 0 || cost > 0xFFFFFFFF)) {
      throw new RangeError(`Invalid interface cost: ${cost}. Must be an integer in [0, 4294967295].`);
    }
    this.cost = cost;
    Logger.debug(this.nodeId, 'port:cost', `${this.name}: cost set to ${cost ?? 'default'}`);
  }

  // ─── Channel ───────────────────────────────────────────────────

  getChannel(): PointToPointChannel | null { return this.channel; }

  isConnected(): boolean { return this.channel !== null; }

  /** Called by PointToPointChannel.attach() */
  attachChannel(channel: PointToPointChannel): void {
    if (this.channel && this.channel !== channel) {
      throw new Error(`${this.nodeId}.${this.name} is already attached to channel ${this.channel.getId()}`);
    }
    this.channel = channel;
  }

  /** Called by PointToPointChannel.detach() */
  detachChannel(): void {
    this.channel = null;
  }

  // ─── Link State ────────────────────────────────────────────────

  getIsUp(): boolean { return this.isUp; }

  setUp(up: boolean): void {
    if (this.isUp === up) return;
    this.isUp = up;
    Logger.info(this.nodeId, 'port:state', `${this.name}: ${up ? 'up' : 'down'}`);
  }

  // ─── Info ──────────────────────────────────────────────────────

  getInfo(): PortInfo {
    return {
      name: this.name,
      type: this.type,
      nodeId: this.nodeId,
      ipAddress: this.ipAddress?.toString() ?? null,
      subnetMask: this.subnetMask?.toString() ?? null,
      cost: this.cost,
      isUp: this.isUp,
      channelId: this.channel?.getId() ?? null,
    };
  }
}

/**
 * PointToPointChannel - Link between router interfaces
 *
 * A well-formed point-to-point channel has exactly two attached ports.
 * The channel does not enforce that on attach: topology discovery is the
 * consumer that validates it, so a mis-built channel is reported with its
 * ID instead of being silently truncated.
 *
 *   channel.connect(portA, portB)  the usual two-port case
 *   channel.attach(port)           one port at a time
 */

import { Logger } from '../core/Logger';
import type { Port } from './Port';

export interface ChannelInfo {
  id: string;
  endpoints: Array<{ nodeId: string; port: string }>;
  isPointToPoint: boolean;
}

export class PointToPointChannel {
  private readonly id: string;
  private ports: Port[] = [];

  constructor(id: string) {
    this.id = id;
  }

  getId(): string { return this.id; }

  // ─── Port Attachment ───────────────────────────────────────────

  /**
   * Connect two ports via this channel.
   */
  connect(portA: Port, portB: Port): this {
    this.attach(portA);
    this.attach(portB);
    Logger.info(this.id, 'channel:connect',
      `Channel connected: ${portA.getNodeId()}.${portA.getName()} ↔ ${portB.getNodeId()}.${portB.getName()}`);
    return this;
  }

  attach(port: Port): void {
    if (this.ports.includes(port)) return;
    port.attachChannel(this);
    this.ports.push(port);

    if (this.ports.length > 2) {
      Logger.warn(this.id, 'channel:attach',
        `Channel ${this.id}: ${this.ports.length} endpoints attached to a point-to-point channel`);
    } else {
      Logger.debug(this.id, 'channel:attach', `${port.getNodeId()}.${port.getName()} attached to ${this.id}`);
    }
  }

  detach(port: Port): boolean {
    const idx = this.ports.indexOf(port);
    if (idx < 0) return false;
    this.ports.splice(idx, 1);
    port.detachChannel();
    Logger.debug(this.id, 'channel:detach', `${port.getNodeId()}.${port.getName()} detached from ${this.id}`);
    return true;
  }

  /**
   * Detach every port from the channel.
   */
  disconnect(): void {
    for (const port of this.ports) port.detachChannel();
    this.ports = [];
    Logger.info(this.id, 'channel:disconnect', `Channel ${this.id} disconnected`);
  }

  // ─── Endpoints ─────────────────────────────────────────────────

  getNDevices(): number { return this.ports.length; }

  getDevice(i: number): Port | null {
    return this.ports[i] ?? null;
  }

  getPorts(): Port[] {
    return [...this.ports];
  }

  isPointToPoint(): boolean { return this.ports.length === 2; }

  /**
   * The endpoint opposite `port`, or null when the channel is not
   * a well-formed point-to-point link or `port` is not attached.
   */
  getPeer(port: Port): Port | null {
    if (!this.isPointToPoint()) return null;
    if (this.ports[0] === port) return this.ports[1];
    if (this.ports[1] === port) return this.ports[0];
    return null;
  }

  getInfo(): ChannelInfo {
    return {
      id: this.id,
      endpoints: this.ports.map(p => ({ nodeId: p.getNodeId(), port: p.getName() })),
      isPointToPoint: this.isPointToPoint(),
    };
  }
}

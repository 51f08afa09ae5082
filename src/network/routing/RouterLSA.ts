/**
 * RouterLSA - A router's Link State Advertisement
 *
 * The header is reduced to the link state ID and the advertising router,
 * both equal to the originating router's ID. The LSA owns its link records:
 * records are copied in on add and copied out on read, and every copy
 * operation (clone, assign, copyLinkRecords) is deep.
 *
 * `status` is SPF bookkeeping only and is reset at the start of each run.
 */

import { IPAddress } from '../core/types';
import { LinkRecord } from './LinkRecord';
import type { SPFStatus } from './types';

export class RouterLSA {
  private linkStateId: IPAddress;
  private advertisingRouter: IPAddress;
  private status: SPFStatus;
  private linkRecords: LinkRecord[] = [];

  constructor(
    status: SPFStatus = 'not-explored',
    linkStateId: IPAddress = IPAddress.any(),
    advertisingRouter: IPAddress = IPAddress.any(),
  ) {
    this.status = status;
    this.linkStateId = linkStateId;
    this.advertisingRouter = advertisingRouter;
  }

  /** Blank LSA for the given router: both header fields set to its ID */
  static forRouter(routerId: IPAddress): RouterLSA {
    return new RouterLSA('not-explored', routerId, routerId);
  }

  // ─── Header ────────────────────────────────────────────────────

  getLinkStateId(): IPAddress { return this.linkStateId; }
  setLinkStateId(addr: IPAddress): void { this.linkStateId = addr; }

  getAdvertisingRouter(): IPAddress { return this.advertisingRouter; }
  setAdvertisingRouter(rtr: IPAddress): void { this.advertisingRouter = rtr; }

  getStatus(): SPFStatus { return this.status; }
  setStatus(status: SPFStatus): void { this.status = status; }

  // ─── Link Records ──────────────────────────────────────────────

  /**
   * Append a copy of `record`; returns the new record count.
   */
  addLinkRecord(record: LinkRecord): number {
    this.linkRecords.push(record.clone());
    return this.linkRecords.length;
  }

  getNLinkRecords(): number {
    return this.linkRecords.length;
  }

  getLinkRecord(n: number): LinkRecord | null {
    const record = this.linkRecords[n];
    return record ? record.clone() : null;
  }

  getLinkRecords(): LinkRecord[] {
    return this.linkRecords.map(r => r.clone());
  }

  clearLinkRecords(): void {
    this.linkRecords = [];
  }

  /**
   * Concatenate copies of `lsa`'s records onto this LSA.
   * Existing records are kept; clear first to replace.
   */
  copyLinkRecords(lsa: RouterLSA): void {
    for (const record of lsa.linkRecords) {
      this.linkRecords.push(record.clone());
    }
  }

  isEmpty(): boolean {
    return this.linkRecords.length === 0;
  }

  // ─── Copy / Compare ────────────────────────────────────────────

  clone(): RouterLSA {
    const copy = new RouterLSA(this.status, this.linkStateId, this.advertisingRouter);
    copy.copyLinkRecords(this);
    return copy;
  }

  /**
   * Overwrite this LSA with a deep copy of `lsa`.
   */
  assign(lsa: RouterLSA): this {
    if (lsa === this) return this;
    this.linkStateId = lsa.linkStateId;
    this.advertisingRouter = lsa.advertisingRouter;
    this.status = lsa.status;
    this.clearLinkRecords();
    this.copyLinkRecords(lsa);
    return this;
  }

  equals(other: RouterLSA): boolean {
    return this.linkStateId.equals(other.linkStateId)
      && this.advertisingRouter.equals(other.advertisingRouter)
      && this.status === other.status
      && this.linkRecords.length === other.linkRecords.length
      && this.linkRecords.every((r, i) => r.equals(other.linkRecords[i]));
  }

  // ─── Diagnostics ───────────────────────────────────────────────

  print(): string[] {
    const lines = [
      `LSA ${this.linkStateId} advertising-router=${this.advertisingRouter} ` +
      `status=${this.status} links=${this.linkRecords.length}`,
    ];
    this.linkRecords.forEach((r, i) => lines.push(`  [${i}] ${r}`));
    return lines;
  }

  toString(): string {
    return this.print().join('\n');
  }
}

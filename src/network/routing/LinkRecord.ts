/**
 * LinkRecord - One link of a Router-LSA (RFC 2328 §12.4.1)
 *
 * linkId and linkData mean different things per link type:
 *
 *   point-to-point  linkId = neighbour router ID    linkData = local interface address
 *   stub-network    linkId = network address         linkData = network mask
 *
 * Always check getLinkType() before reading either field. The metric is an
 * additive cost (sums along a path must be meaningful), so configure delay-like
 * values here, not bandwidth.
 */

import { IPAddress } from '../core/types';
import { isValidMetric } from './types';
import type { LinkType } from './types';

export class LinkRecord {
  private linkType: LinkType;
  private linkId: IPAddress;
  private linkData: IPAddress;
  private metric: number;

  constructor(
    linkType: LinkType = 'unknown',
    linkId: IPAddress = IPAddress.any(),
    linkData: IPAddress = IPAddress.any(),
    metric: number = 0,
  ) {
    LinkRecord.checkMetric(metric);
    this.linkType = linkType;
    this.linkId = linkId;
    this.linkData = linkData;
    this.metric = metric;
  }

  private static checkMetric(metric: number): void {
    if (!isValidMetric(metric)) {
      throw new RangeError(`Invalid link metric: ${metric}. Must be an integer in [0, 4294967295].`);
    }
  }

  getLinkType(): LinkType { return this.linkType; }
  setLinkType(linkType: LinkType): void { this.linkType = linkType; }

  getLinkId(): IPAddress { return this.linkId; }
  setLinkId(addr: IPAddress): void { this.linkId = addr; }

  getLinkData(): IPAddress { return this.linkData; }
  setLinkData(addr: IPAddress): void { this.linkData = addr; }

  getMetric(): number { return this.metric; }

  setMetric(metric: number): void {
    LinkRecord.checkMetric(metric);
    this.metric = metric;
  }

  clone(): LinkRecord {
    return new LinkRecord(this.linkType, this.linkId, this.linkData, this.metric);
  }

  equals(other: LinkRecord): boolean {
    return this.linkType === other.linkType
      && this.linkId.equals(other.linkId)
      && this.linkData.equals(other.linkData)
      && this.metric === other.metric;
  }

  toString(): string {
    return `${this.linkType} linkId=${this.linkId} linkData=${this.linkData} metric=${this.metric}`;
  }
}

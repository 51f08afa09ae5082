/**
 * Global routing types - Router-LSA model (RFC 2328 §12.4.1) and SPF
 * bookkeeping (RFC 2328 §16.1)
 *
 * This is a snapshot model: one LSA per router, rebuilt on every
 * discovery cycle, no areas, no aging and no sequence numbers.
 */

// ─── Constants ───────────────────────────────────────────────────────

/** Largest metric or path distance (unsigned 32-bit) */
export const MAX_METRIC = 0xFFFFFFFF;

/** First router ID handed out by the allocator */
export const ROUTER_ID_BASE = '0.0.0.1';

// ─── Link Records ────────────────────────────────────────────────────

/**
 * Router-LSA link types. Discovery only produces point-to-point and
 * stub-network records; the others exist for OSPF parity.
 */
export type LinkType =
  | 'unknown'
  | 'point-to-point'
  | 'transit-network'
  | 'stub-network'
  | 'virtual-link';

// ─── SPF ─────────────────────────────────────────────────────────────

export type SPFStatus = 'not-explored' | 'candidate' | 'in-tree';

export type VertexType = 'router' | 'network';

export function isValidMetric(metric: number): boolean {
  return Number.isInteger(metric) && metric >= 0 && metric <= MAX_METRIC;
}

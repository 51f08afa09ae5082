/**
 * Global Routing Module - RFC 2328 style link-state routing over a
 * simulated topology
 *
 * Exports:
 *   - LinkRecord, RouterLSA: LSA data model
 *   - GlobalRouter: per-node topology discovery
 *   - LinkStateDatabase: aggregated LSAs
 *   - SPFEngine, SPFTree: Dijkstra shortest-path tree
 *   - RouteManager: build + compute + install
 */

export { LinkRecord } from './LinkRecord';
export { RouterLSA } from './RouterLSA';
export { GlobalRouter } from './GlobalRouter';
export { LinkStateDatabase } from './LinkStateDatabase';
export type { BuildReport, DiscoveryFailure } from './LinkStateDatabase';
export { ForwardingTable } from './ForwardingTable';
export type { RouteEntry, RouteSpec, RouteSource } from './ForwardingTable';
export { RouteManager } from './RouteManager';
export { SPFEngine, addMetrics } from './spf/SPFEngine';
export type { SPFStats } from './spf/SPFEngine';
export { SPFTree } from './spf/SPFTree';
export type { SPFVertex, VertexHandle } from './spf/SPFTree';
export { CandidateQueue } from './spf/CandidateQueue';
export { extractRoutes } from './spf/routes';
export { allocateRouterId, resetRouterIdAllocator } from './RouterIdAllocator';
export { createDefaultRoutingConfig, DEFAULT_INTERFACE_COST, DEFAULT_STUB_COST } from './config';
export type { RoutingConfig } from './config';
export { RoutingError, MalformedTopologyError, MetricOverflowError } from './errors';
export type { RoutingErrorCode } from './errors';
export { MAX_METRIC, ROUTER_ID_BASE, isValidMetric } from './types';
export type { LinkType, SPFStatus, VertexType } from './types';

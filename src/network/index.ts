// Core
export { Logger, IPAddress, SubnetMask, generateId, resetCounters } from './core';
export type { RoutingLog, LogLevel, LogSubscriber, ConnectionType } from './core';

// Hardware
export { Port } from './hardware/Port';
export type { PortInfo } from './hardware/Port';
export { PointToPointChannel } from './hardware/PointToPointChannel';
export type { ChannelInfo } from './hardware/PointToPointChannel';

// Nodes
export { NetworkNode } from './equipment/NetworkNode';
export type { StubNetwork } from './equipment/NetworkNode';

// Routing
export * from './routing';

// State
export { createRoutingStore } from './store';
export type { RoutingState, RoutingStore, BuildSummary } from './store';

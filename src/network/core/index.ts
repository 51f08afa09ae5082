export { Logger } from './Logger';
export type { RoutingLog, LogLevel, LogSubscriber } from './Logger';
export {
  IPAddress,
  SubnetMask,
  generateId,
  resetCounters,
} from './types';
export type { ConnectionType } from './types';

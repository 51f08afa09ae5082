/**
 * Routing errors
 */

export type RoutingErrorCode = 'MALFORMED_TOPOLOGY' | 'METRIC_OVERFLOW';

export class RoutingError extends Error {
  readonly code: RoutingErrorCode;

  constructor(code: RoutingErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = 'RoutingError';
  }

  toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

/**
 * A point-to-point channel with other than two attached interfaces.
 */
export class MalformedTopologyError extends RoutingError {
  readonly channelId: string;
  readonly endpointCount: number;
  readonly nodeId: string;

  constructor(nodeId: string, channelId: string, endpointCount: number) {
    super('MALFORMED_TOPOLOGY',
      `channel ${channelId} has ${endpointCount} attached interfaces, point-to-point requires 2`);
    this.name = 'MalformedTopologyError';
    this.nodeId = nodeId;
    this.channelId = channelId;
    this.endpointCount = endpointCount;
  }
}

export class MetricOverflowError extends RoutingError {
  readonly distance: number;
  readonly metric: number;

  constructor(distance: number, metric: number) {
    super('METRIC_OVERFLOW', `distance ${distance} + metric ${metric} exceeds 4294967295`);
    this.name = 'MetricOverflowError';
    this.distance = distance;
    this.metric = metric;
  }
}

/**
 * Routing configuration
 */

import { isValidMetric } from './types';

export interface RoutingConfig {
  /** Cost of an interface that has none configured */
  defaultInterfaceCost: number;
  /** Cost of a stub network that has none configured */
  defaultStubCost: number;
  /** Leave administratively down interfaces out of discovery */
  skipDownInterfaces: boolean;
  /** Advertise addressed interfaces without a channel as stub networks */
  advertiseUnconnectedInterfaces: boolean;
}

export const DEFAULT_INTERFACE_COST = 1;
export const DEFAULT_STUB_COST = 0;

export function createDefaultRoutingConfig(overrides: Partial<RoutingConfig> = {}): RoutingConfig {
  const config: RoutingConfig = {
    defaultInterfaceCost: DEFAULT_INTERFACE_COST,
    defaultStubCost: DEFAULT_STUB_COST,
    skipDownInterfaces: true,
    advertiseUnconnectedInterfaces: true,
    ...overrides,
  };

  if (!isValidMetric(config.defaultInterfaceCost)) {
    throw new RangeError(`Invalid defaultInterfaceCost: ${config.defaultInterfaceCost}`);
  }
  if (!isValidMetric(config.defaultStubCost)) {
    throw new RangeError(`Invalid defaultStubCost: ${config.defaultStubCost}`);
  }
  return config;
}

/**
 * Router ID allocation - process-wide, one ID per GlobalRouter.
 *
 * IDs start at ROUTER_ID_BASE (0.0.0.1) and increase by one; an ID is
 * never handed out twice until the allocator is reset.
 */

import { IPAddress } from '../core/types';
import { ROUTER_ID_BASE } from './types';

let nextRouterId = new IPAddress(ROUTER_ID_BASE).toUint32();

export function allocateRouterId(): IPAddress {
  if (nextRouterId > 0xFFFFFFFF) {
    throw new Error('Router ID space exhausted');
  }
  return IPAddress.fromUint32(nextRouterId++);
}

export function resetRouterIdAllocator(base: string = ROUTER_ID_BASE): void {
  nextRouterId = new IPAddress(base).toUint32();
}

/**
 * Routing Store - Observable snapshot of the last routing computation
 *
 * One store per RouteManager. Diagnostics and UI layers subscribe to it
 * instead of polling the manager.
 */

import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';

export interface BuildSummary {
  routers: number;
  lsas: number;
  failures: Array<{ nodeName: string; routerId: string; channelId: string; message: string }>;
}

export interface RoutingState {
  /** Result of the last LSDB build, null before the first one */
  lastBuild: BuildSummary | null;
  /** Installed global routes per node name, from the last initializeRoutes() */
  installedRoutes: Record<string, number>;
  /** Number of completed initializeRoutes() runs */
  computations: number;

  // Actions
  recordBuild: (summary: BuildSummary) => void;
  recordRoutes: (installed: Record<string, number>) => void;
  reset: () => void;
}

export function createRoutingStore(): StoreApi<RoutingState> {
  return createStore<RoutingState>()((set) => ({
    lastBuild: null,
    installedRoutes: {},
    computations: 0,

    recordBuild: (summary) => set({ lastBuild: summary }),

    recordRoutes: (installed) => set((state) => ({
      installedRoutes: installed,
      computations: state.computations + 1,
    })),

    reset: () => set({ lastBuild: null, installedRoutes: {}, computations: 0 }),
  }));
}

export type RoutingStore = StoreApi<RoutingState>;

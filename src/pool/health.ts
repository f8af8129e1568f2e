import type { WorkerStatus } from './status.js';

export interface HealthSummary {
  total: number;
  active: number;
  connected: number;
  /** Active workers without a live connection */
  disconnected: number;
  totalLoad: number;
  avgLoadPerActive: number;
  /** connected / active * 100, or 0 with no active workers */
  healthPct: number;
}

export type WorkerListing = Readonly<WorkerStatus>;

export function projectStatus(status: WorkerStatus): WorkerListing {
  return { ...status };
}

/** Read-only roll-up over worker statuses */
export function summarizeHealth(statuses: Iterable<WorkerStatus>): HealthSummary {
  let total = 0;
  let active = 0;
  let connected = 0;
  let activeConnected = 0;
  let totalLoad = 0;

  for (const s of statuses) {
    total++;
    totalLoad += s.currentLoad;
    if (s.isConnected) connected++;
    if (s.isActive) {
      active++;
      if (s.isConnected) activeConnected++;
    }
  }

  return {
    total,
    active,
    connected,
    disconnected: active - activeConnected,
    totalLoad,
    avgLoadPerActive: active > 0 ? totalLoad / active : 0,
    healthPct: active > 0 ? (connected / active) * 100 : 0,
  };
}

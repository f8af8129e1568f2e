export interface WorkerStatus {
  id: string;
  label: string;
  /** Administratively enabled; cleared permanently on authorization loss */
  isActive: boolean;
  isConnected: boolean;
  /** Outstanding reservations */
  currentLoad: number;
  maxConcurrent: number;
  messagesProcessed: number;
  errorCount: number;
  lastUsed: string | null;
  /** Set only while cooling down from a rate limit */
  nextAvailable: string | null;
  lastError: string | null;
}

export interface StatusSeed {
  id: string;
  label?: string;
  maxConcurrent: number;
  messagesProcessed?: number;
  errorCount?: number;
  lastUsed?: string | null;
}

export function createStatus(seed: StatusSeed): WorkerStatus {
  return {
    id: seed.id,
    label: seed.label ?? seed.id,
    isActive: true,
    isConnected: false,
    currentLoad: 0,
    maxConcurrent: seed.maxConcurrent,
    messagesProcessed: seed.messagesProcessed ?? 0,
    errorCount: seed.errorCount ?? 0,
    lastUsed: seed.lastUsed ?? null,
    nextAvailable: null,
    lastError: null,
  };
}

export function isCoolingDown(status: WorkerStatus, now: number): boolean {
  return status.nextAvailable !== null && now < Date.parse(status.nextAvailable);
}

export function hasCapacity(status: WorkerStatus): boolean {
  return status.currentLoad < status.maxConcurrent;
}

export function isSelectable(status: WorkerStatus, now: number): boolean {
  return status.isActive && status.isConnected && !isCoolingDown(status, now) && hasCapacity(status);
}

/**
 * A disconnected worker is due for a reconnect once its cooldown (if any)
 * has run out.
 */
export function isDueForReconnect(status: WorkerStatus, now: number): boolean {
  return status.isActive && !status.isConnected && !isCoolingDown(status, now);
}

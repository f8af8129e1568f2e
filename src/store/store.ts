import type { WorkerConfig } from '../workers/handle.js';

/** Counters an account carries across restarts */
export interface PersistedStats {
  messagesProcessed?: number;
  errorCount?: number;
  lastUsed?: string | null;
}

export type PoolEntryConfig = WorkerConfig & PersistedStats;

export interface WorkerRecord extends WorkerConfig {
  isActive: boolean;
  messagesProcessed: number;
  errorCount: number;
  lastUsed: string | null;
  createdAt: string;
}

export type OutcomeStatus = 'succeeded' | 'failed' | 'no-capacity' | 'ignored' | 'blocked';

export interface OutcomeRecord {
  workItemId: string;
  status: OutcomeStatus;
  workerId?: string;
  attempts: number;
  score: number;
  tags: string[];
  sourceChatId?: string;
  sourceMessageId?: string;
  senderId?: string;
  error?: string;
  recordedAt: string;
}

/** Blocking a sender lifts any allowance and the other way round */
export type SenderStatus = 'blocked' | 'allowed';

export interface SenderListing {
  senderId: string;
  status: SenderStatus;
  reason?: string;
  updatedAt: string;
}

export interface PoolStore {
  /** Active accounts, in the order they were first saved */
  loadWorkerConfigs(): Promise<WorkerRecord[]>;
  listWorkers(): Promise<WorkerRecord[]>;
  /** Insert or replace; a saved account is active again */
  saveWorkerConfig(config: WorkerConfig): Promise<WorkerRecord>;
  persistWorkerStats(id: string, processedDelta: number, errorDelta: number): Promise<void>;
  /** Returns false for an unknown id */
  deactivateWorker(id: string): Promise<boolean>;
  recordOutcome(record: OutcomeRecord): Promise<void>;
  /** Newest first */
  recentOutcomes(limit?: number): Promise<OutcomeRecord[]>;
  setSenderStatus(senderId: string, status: SenderStatus, reason?: string): Promise<SenderListing>;
  /** Returns false when the sender was not listed */
  clearSenderStatus(senderId: string): Promise<boolean>;
  getSenderListing(senderId: string): Promise<SenderListing | null>;
  listSenders(): Promise<SenderListing[]>;
}

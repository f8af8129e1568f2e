import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { WorkerConfig } from '../workers/handle.js';
import type { OutcomeRecord, PoolStore, SenderListing, SenderStatus, WorkerRecord } from './store.js';
import { logger } from '../utils/logger.js';

const log = logger.child('store');

/** Outcome history kept on disk */
export const MAX_OUTCOMES = 500;

const workerRecordSchema = z.object({
  id: z.string().min(1),
  binding: z.string().optional(),
  credentials: z.object({ token: z.string() }),
  sessionRef: z.string().optional(),
  label: z.string().optional(),
  maxConcurrent: z.number().int().positive().optional(),
  isActive: z.boolean(),
  messagesProcessed: z.number().int().min(0),
  errorCount: z.number().int().min(0),
  lastUsed: z.string().nullable(),
  createdAt: z.string(),
});

const outcomeRecordSchema = z.object({
  workItemId: z.string(),
  status: z.enum(['succeeded', 'failed', 'no-capacity', 'ignored', 'blocked']),
  workerId: z.string().optional(),
  attempts: z.number().int().min(0),
  score: z.number(),
  tags: z.array(z.string()),
  sourceChatId: z.string().optional(),
  sourceMessageId: z.string().optional(),
  senderId: z.string().optional(),
  error: z.string().optional(),
  recordedAt: z.string(),
});

const senderListingSchema = z.object({
  senderId: z.string().min(1),
  status: z.enum(['blocked', 'allowed']),
  reason: z.string().optional(),
  updatedAt: z.string(),
});

const accountsFileSchema = z.object({
  version: z.literal(1),
  workers: z.array(workerRecordSchema),
});

const outcomesFileSchema = z.object({
  version: z.literal(1),
  outcomes: z.array(outcomeRecordSchema),
});

const sendersFileSchema = z.object({
  version: z.literal(1),
  senders: z.array(senderListingSchema),
});

export class StoreError extends Error {
  constructor(message: string, public readonly path: string) {
    super(`${path}: ${message}`);
    this.name = 'StoreError';
  }
}

async function readJson<T>(path: string, schema: z.ZodType<T>): Promise<T | null> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new StoreError(err instanceof Error ? err.message : String(err), path);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new StoreError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '), path);
  }
  return parsed.data;
}

/**
 * Accounts, outcome history and sender listings as JSON files in one directory. Data is read
 * once and kept in memory; every mutation rewrites its file, one write at a
 * time.
 */
export class JsonPoolStore implements PoolStore {
  private workers: WorkerRecord[] = [];
  private outcomes: OutcomeRecord[] = [];
  private senders = new Map<string, SenderListing>();
  private loaded: Promise<void> | null = null;
  private writes: Promise<void> = Promise.resolve();

  constructor(private readonly dir: string) {}

  get accountsPath(): string {
    return join(this.dir, 'accounts.json');
  }

  get outcomesPath(): string {
    return join(this.dir, 'outcomes.json');
  }

  get sendersPath(): string {
    return join(this.dir, 'senders.json');
  }

  async loadWorkerConfigs(): Promise<WorkerRecord[]> {
    await this.ensureLoaded();
    return this.workers.filter(w => w.isActive).map(w => ({ ...w }));
  }

  async listWorkers(): Promise<WorkerRecord[]> {
    await this.ensureLoaded();
    return this.workers.map(w => ({ ...w }));
  }

  async saveWorkerConfig(config: WorkerConfig): Promise<WorkerRecord> {
    await this.ensureLoaded();
    const existing = this.workers.find(w => w.id === config.id);
    const record: WorkerRecord = {
      ...config,
      isActive: true,
      messagesProcessed: existing?.messagesProcessed ?? 0,
      errorCount: existing?.errorCount ?? 0,
      lastUsed: existing?.lastUsed ?? null,
      createdAt: existing?.createdAt ?? new Date().toISOString(),
    };

    if (existing) {
      this.workers[this.workers.indexOf(existing)] = record;
    } else {
      this.workers.push(record);
    }
    await this.saveAccounts();
    log.debug(`Saved account ${config.id}`);
    return { ...record };
  }

  async persistWorkerStats(id: string, processedDelta: number, errorDelta: number): Promise<void> {
    await this.ensureLoaded();
    const record = this.workers.find(w => w.id === id);
    if (!record) return;
    record.messagesProcessed += processedDelta;
    record.errorCount += errorDelta;
    record.lastUsed = new Date().toISOString();
    await this.saveAccounts();
  }

  async deactivateWorker(id: string): Promise<boolean> {
    await this.ensureLoaded();
    const record = this.workers.find(w => w.id === id);
    if (!record) return false;
    record.isActive = false;
    await this.saveAccounts();
    log.debug(`Deactivated account ${id}`);
    return true;
  }

  async recordOutcome(record: OutcomeRecord): Promise<void> {
    await this.ensureLoaded();
    this.outcomes.push({ ...record });
    if (this.outcomes.length > MAX_OUTCOMES) {
      this.outcomes.splice(0, this.outcomes.length - MAX_OUTCOMES);
    }
    await this.enqueueWrite(this.outcomesPath, { version: 1, outcomes: this.outcomes });
  }

  async recentOutcomes(limit = 20): Promise<OutcomeRecord[]> {
    await this.ensureLoaded();
    return this.outcomes.slice(-limit).reverse().map(o => ({ ...o }));
  }

  async setSenderStatus(senderId: string, status: SenderStatus, reason?: string): Promise<SenderListing> {
    await this.ensureLoaded();
    const listing: SenderListing = { senderId, status, reason, updatedAt: new Date().toISOString() };
    this.senders.set(senderId, listing);
    await this.saveSenders();
    log.debug(`Sender ${senderId} ${status}`);
    return { ...listing };
  }

  async clearSenderStatus(senderId: string): Promise<boolean> {
    await this.ensureLoaded();
    if (!this.senders.delete(senderId)) return false;
    await this.saveSenders();
    return true;
  }

  async getSenderListing(senderId: string): Promise<SenderListing | null> {
    await this.ensureLoaded();
    const listing = this.senders.get(senderId);
    return listing ? { ...listing } : null;
  }

  async listSenders(): Promise<SenderListing[]> {
    await this.ensureLoaded();
    return Array.from(this.senders.values(), l => ({ ...l }));
  }

  private ensureLoaded(): Promise<void> {
    if (!this.loaded) {
      this.loaded = this.load();
    }
    return this.loaded;
  }

  private async load(): Promise<void> {
    const accounts = await readJson(this.accountsPath, accountsFileSchema);
    const outcomes = await readJson(this.outcomesPath, outcomesFileSchema);
    const senders = await readJson(this.sendersPath, sendersFileSchema);
    this.workers = accounts?.workers ?? [];
    this.outcomes = outcomes?.outcomes ?? [];
    this.senders = new Map((senders?.senders ?? []).map(l => [l.senderId, l]));
    log.debug(`Loaded ${this.workers.length} accounts from ${this.dir}`);
  }

  private saveAccounts(): Promise<void> {
    return this.enqueueWrite(this.accountsPath, { version: 1, workers: this.workers });
  }

  private saveSenders(): Promise<void> {
    return this.enqueueWrite(this.sendersPath, { version: 1, senders: Array.from(this.senders.values()) });
  }

  /** Serializes snapshots so concurrent mutations never interleave on disk */
  private enqueueWrite(path: string, data: unknown): Promise<void> {
    const snapshot = JSON.stringify(data, null, 2);
    const run = this.writes.then(async () => {
      await mkdir(this.dir, { recursive: true });
      await writeFile(path, snapshot, 'utf-8');
    });
    this.writes = run.catch((err: unknown) => {
      log.warn(`Write to ${path} failed: ${err}`);
    });
    return run;
  }
}

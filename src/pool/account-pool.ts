import type { ConnectResult, ExecuteResult, WorkItem, WorkerError, WorkerHandle } from '../workers/handle.js';
import { clampCooldown, toTransient, transient } from '../workers/handle.js';
import type { HandleRegistry } from '../workers/registry.js';
import { UnknownBindingError } from '../workers/registry.js';
import type { PoolEntryConfig, PoolStore } from '../store/store.js';
import type { WorkerStatus } from './status.js';
import { createStatus, hasCapacity, isDueForReconnect, isSelectable } from './status.js';
import type { HealthSummary, WorkerListing } from './health.js';
import { projectStatus, summarizeHealth } from './health.js';
import { generateLeaseId } from '../utils/id.js';
import { logger } from '../utils/logger.js';

const log = logger.child('pool');

/** A reservation on one worker; release it exactly once */
export interface Lease {
  readonly leaseId: string;
  readonly workerId: string;
  readonly acquiredAt: string;
}

export type ReleaseOutcome = { kind: 'success' } | { kind: 'failure'; reason: string };

export type AddError =
  | { kind: 'duplicate'; message: string }
  | { kind: 'unknown-binding'; message: string }
  | { kind: 'connect-failed'; message: string; cause: WorkerError };

export type AddResult = { ok: true; id: string } | { ok: false; error: AddError };

export interface InitFailure {
  id: string;
  error: AddError;
}

export interface InitializeResult {
  initializedCount: number;
  failures: InitFailure[];
  /** At least one worker connected */
  ok: boolean;
}

export interface AccountPoolOptions {
  /** Bound on one connect or reconnect round-trip (default 5000) */
  reconnectTimeoutMs?: number;
  /** Capacity for workers that do not set maxConcurrent (default 1) */
  maxConcurrentPerWorker?: number;
  store?: PoolStore;
  /** Clock in epoch ms */
  now?: () => number;
}

interface PoolEntry {
  handle: WorkerHandle;
  status: WorkerStatus;
  leases: Set<string>;
  /** A connect round-trip is in flight; scans skip the worker */
  reconnecting: boolean;
}

/**
 * Owns the worker handles and their statuses and hands out reservations in
 * round-robin order.
 *
 * Every status and cursor mutation happens synchronously between awaits, so
 * selection and reservation of a candidate commit in one step. Only the
 * connect round-trip runs with the worker flagged as reconnecting, and its
 * status is re-checked once the round-trip returns.
 */
export class AccountPool {
  private entries = new Map<string, PoolEntry>();
  private rotation: string[] = [];
  private rotationIndex = 0;

  private readonly reconnectTimeoutMs: number;
  private readonly maxConcurrentPerWorker: number;
  private readonly store: PoolStore | undefined;
  private readonly now: () => number;

  constructor(private readonly registry: HandleRegistry, options: AccountPoolOptions = {}) {
    this.reconnectTimeoutMs = options.reconnectTimeoutMs ?? 5_000;
    this.maxConcurrentPerWorker = options.maxConcurrentPerWorker ?? 1;
    this.store = options.store;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  /** Worker ids in rotation order */
  rotationOrder(): string[] {
    return [...this.rotation];
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────────────

  /**
   * Connects every configured worker. Calling it again tears the current
   * workers down first.
   */
  async initialize(configs: PoolEntryConfig[]): Promise<InitializeResult> {
    if (this.entries.size > 0) {
      await this.shutdown();
    }

    log.info(`Initializing ${configs.length} workers`);
    const results = await Promise.all(
      configs.map(config => this.attach(config, { keepOnFailure: true })),
    );

    const failures: InitFailure[] = [];
    let initializedCount = 0;
    results.forEach((result, i) => {
      if (result.ok) {
        initializedCount++;
      } else {
        failures.push({ id: configs[i].id, error: result.error });
      }
    });

    log.info(`Initialized ${initializedCount}/${configs.length} workers`);
    return { initializedCount, failures, ok: initializedCount > 0 };
  }

  /** Adds and connects one worker; a worker that fails to connect is not kept */
  async add(config: PoolEntryConfig): Promise<AddResult> {
    return this.attach(config, { keepOnFailure: false });
  }

  async remove(id: string): Promise<boolean> {
    const entry = this.entries.get(id);
    if (!entry) return false;

    this.entries.delete(id);
    this.dropFromRotation(id);
    if (entry.leases.size > 0) {
      log.warn(`Worker ${id} removed with ${entry.leases.size} outstanding reservations`);
    }
    await this.disconnectQuietly(entry.handle);
    log.info(`Worker ${id} removed`);
    return true;
  }

  async shutdown(): Promise<void> {
    const entries = Array.from(this.entries.values());
    this.entries.clear();
    this.rotation = [];
    this.rotationIndex = 0;
    await Promise.all(entries.map(e => this.disconnectQuietly(e.handle)));
    if (entries.length > 0) {
      log.info(`Disconnected ${entries.length} workers`);
    }
  }

  // ─── Reservations ──────────────────────────────────────────────────────────

  /**
   * Round-robin scan from the cursor, at most once around the ring.
   * Disconnected workers whose cooldown has passed are reconnected on the way.
   * Returns null when nothing is selectable.
   */
  async acquire(): Promise<Lease | null> {
    const ring = [...this.rotation];
    if (ring.length === 0) {
      log.debug('No workers in rotation');
      return null;
    }

    const start = this.rotationIndex % ring.length;
    for (let step = 0; step < ring.length; step++) {
      const id = ring[(start + step) % ring.length];
      const entry = this.entries.get(id);
      if (!entry || !entry.status.isActive || entry.reconnecting) continue;

      const { status, handle } = entry;
      if (isSelectable(status, this.now())) {
        if (handle.isConnected()) {
          return this.reserve(entry);
        }
        status.isConnected = false;
        status.lastError = 'Connection lost';
        log.warn(`Worker ${id} lost its connection`);
      }

      if (isDueForReconnect(status, this.now()) && hasCapacity(status)) {
        const reconnected = await this.reconnect(entry);
        if (reconnected && this.entries.get(id) === entry && isSelectable(status, this.now())) {
          return this.reserve(entry);
        }
      }
    }

    log.debug('No available workers');
    return null;
  }

  /** Ends a reservation. A second release of the same lease is ignored. */
  release(lease: Lease, outcome: ReleaseOutcome): boolean {
    const entry = this.entries.get(lease.workerId);
    if (!entry) {
      log.warn(`Release for unknown worker ${lease.workerId}`);
      return false;
    }
    if (!entry.leases.delete(lease.leaseId)) {
      log.warn(`Lease ${lease.leaseId} on worker ${lease.workerId} already released`);
      return false;
    }

    const { status } = entry;
    status.currentLoad = Math.max(0, status.currentLoad - 1);
    status.lastUsed = new Date(this.now()).toISOString();

    if (outcome.kind === 'success') {
      status.messagesProcessed++;
      this.persistStats(status.id, 1, 0);
    } else {
      status.errorCount++;
      status.lastError = outcome.reason;
      this.persistStats(status.id, 0, 1);
    }

    log.debug('Released', { worker: status.id, lease: lease.leaseId, load: status.currentLoad });
    return true;
  }

  /** Runs work through the leased worker's handle */
  async execute(lease: Lease, work: WorkItem): Promise<ExecuteResult> {
    const entry = this.entries.get(lease.workerId);
    if (!entry || !entry.leases.has(lease.leaseId)) {
      return { ok: false, error: transient(`Lease ${lease.leaseId} is not held`) };
    }

    let result: ExecuteResult;
    try {
      result = await entry.handle.execute(work);
    } catch (err) {
      result = { ok: false, error: toTransient(err) };
    }

    if (this.entries.get(lease.workerId) === entry && !entry.handle.isConnected()) {
      entry.status.isConnected = false;
    }
    return result;
  }

  // ─── Failure tracking ──────────────────────────────────────────────────────

  reportRateLimit(id: string, cooldownSeconds: number, message?: string): boolean {
    const entry = this.entries.get(id);
    if (!entry) {
      log.warn(`Rate limit reported for unknown worker ${id}`);
      return false;
    }
    this.applyCooldown(entry.status, cooldownSeconds, message);
    return true;
  }

  /** Permanently excludes a worker; it needs to be added again by hand */
  deactivate(id: string, reason: string): boolean {
    const entry = this.entries.get(id);
    if (!entry) return false;
    this.markInactive(entry, reason);
    return true;
  }

  // ─── Reporting ─────────────────────────────────────────────────────────────

  healthSummary(): HealthSummary {
    return summarizeHealth(Array.from(this.entries.values(), e => e.status));
  }

  listStatuses(): WorkerListing[] {
    return Array.from(this.entries.values(), e => projectStatus(e.status));
  }

  getStatus(id: string): WorkerListing | undefined {
    const entry = this.entries.get(id);
    return entry ? projectStatus(entry.status) : undefined;
  }

  // ─── Internals ─────────────────────────────────────────────────────────────

  private async attach(config: PoolEntryConfig, opts: { keepOnFailure: boolean }): Promise<AddResult> {
    if (this.entries.has(config.id)) {
      return { ok: false, error: { kind: 'duplicate', message: `Worker ${config.id} is already in the pool` } };
    }

    let handle: WorkerHandle;
    try {
      handle = this.registry.create(config);
    } catch (err) {
      if (err instanceof UnknownBindingError) {
        return { ok: false, error: { kind: 'unknown-binding', message: err.message } };
      }
      throw err;
    }

    const status = createStatus({
      id: config.id,
      label: config.label,
      maxConcurrent: config.maxConcurrent ?? this.maxConcurrentPerWorker,
      messagesProcessed: config.messagesProcessed,
      errorCount: config.errorCount,
      lastUsed: config.lastUsed,
    });
    const entry: PoolEntry = { handle, status, leases: new Set(), reconnecting: true };
    this.entries.set(config.id, entry);
    this.rotation.push(config.id);

    const result = await this.connectWithTimeout(handle);
    entry.reconnecting = false;

    if (this.entries.get(config.id) !== entry) {
      await this.disconnectQuietly(handle);
      const cause = transient('Removed while connecting');
      return { ok: false, error: { kind: 'connect-failed', message: cause.message, cause } };
    }

    if (result.ok) {
      status.isConnected = true;
      log.info(`Worker ${status.label} connected`);
      return { ok: true, id: config.id };
    }

    const { error } = result;
    if (!opts.keepOnFailure) {
      this.entries.delete(config.id);
      this.dropFromRotation(config.id);
      await this.disconnectQuietly(handle);
      log.warn(`Worker ${status.label} failed to connect: ${error.message}`);
    } else {
      this.recordConnectFailure(entry, error);
    }
    return { ok: false, error: { kind: 'connect-failed', message: error.message, cause: error } };
  }

  private async reconnect(entry: PoolEntry): Promise<boolean> {
    const { handle, status } = entry;
    entry.reconnecting = true;

    let result: ConnectResult;
    try {
      await handle.disconnect();
      result = await this.connectWithTimeout(handle);
    } catch (err) {
      result = { ok: false, error: toTransient(err) };
    } finally {
      entry.reconnecting = false;
    }

    if (this.entries.get(status.id) !== entry) return false;

    if (result.ok) {
      status.isConnected = true;
      status.nextAvailable = null;
      status.lastError = null;
      log.info(`Worker ${status.label} reconnected`);
      return true;
    }

    this.recordConnectFailure(entry, result.error);
    return false;
  }

  private recordConnectFailure(entry: PoolEntry, error: WorkerError): void {
    const { status } = entry;
    switch (error.kind) {
      case 'auth-expired':
        this.markInactive(entry, error.message);
        break;
      case 'rate-limited':
        this.applyCooldown(status, error.cooldownSeconds, error.message);
        break;
      case 'transient':
        status.isConnected = false;
        status.lastError = error.message;
        log.warn(`Worker ${status.label} failed to connect: ${error.message}`);
        break;
    }
  }

  private async connectWithTimeout(handle: WorkerHandle): Promise<ConnectResult> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<ConnectResult>(resolve => {
      timer = setTimeout(
        () => resolve({ ok: false, error: transient(`Connect timed out after ${this.reconnectTimeoutMs}ms`) }),
        this.reconnectTimeoutMs,
      );
    });
    const attempt = handle.connect().catch((err: unknown): ConnectResult => ({ ok: false, error: toTransient(err) }));

    try {
      return await Promise.race([attempt, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private reserve(entry: PoolEntry): Lease {
    const { status } = entry;
    const index = this.rotation.indexOf(status.id);
    this.rotationIndex = index >= 0 ? (index + 1) % this.rotation.length : 0;

    const lease: Lease = {
      leaseId: generateLeaseId(),
      workerId: status.id,
      acquiredAt: new Date(this.now()).toISOString(),
    };
    entry.leases.add(lease.leaseId);
    status.currentLoad++;
    log.debug('Reserved', { worker: status.id, lease: lease.leaseId, load: status.currentLoad });
    return lease;
  }

  private applyCooldown(status: WorkerStatus, cooldownSeconds: number, message?: string): void {
    const seconds = clampCooldown(cooldownSeconds);
    status.nextAvailable = new Date(this.now() + seconds * 1000).toISOString();
    status.isConnected = false;
    status.lastError = message ?? `Rate limited for ${seconds}s`;
    log.warn('Cooling down', { worker: status.id, seconds, until: status.nextAvailable });
  }

  private markInactive(entry: PoolEntry, reason: string): void {
    const { status } = entry;
    status.isActive = false;
    status.isConnected = false;
    status.lastError = reason;
    this.dropFromRotation(status.id);
    log.warn('Deactivated', { worker: status.id, reason });

    if (this.store) {
      this.store.deactivateWorker(status.id).catch((err: unknown) => {
        log.warn(`Failed to persist deactivation of ${status.id}: ${err}`);
      });
    }
  }

  /** Keeps the cursor on the same next candidate after a removal */
  private dropFromRotation(id: string): void {
    const index = this.rotation.indexOf(id);
    if (index < 0) return;
    this.rotation.splice(index, 1);
    if (index < this.rotationIndex) {
      this.rotationIndex--;
    }
    if (this.rotationIndex >= this.rotation.length) {
      this.rotationIndex = 0;
    }
  }

  private persistStats(id: string, processedDelta: number, errorDelta: number): void {
    if (!this.store) return;
    this.store.persistWorkerStats(id, processedDelta, errorDelta).catch((err: unknown) => {
      log.warn(`Failed to persist stats for ${id}: ${err}`);
    });
  }

  private async disconnectQuietly(handle: WorkerHandle): Promise<void> {
    try {
      await handle.disconnect();
    } catch (err) {
      log.warn(`Error disconnecting worker ${handle.id}: ${err}`);
    }
  }
}

import type { AccountPool } from '../pool/account-pool.js';
import type { Outcome, WorkItem, WorkerError } from '../workers/handle.js';
import { logger } from '../utils/logger.js';

const log = logger.child('dispatch');

export type WorkItemState =
  | 'pending'
  | 'acquiring'
  | 'executing'
  | 'rate-limited-retry'
  | 'retry'
  | 'succeeded'
  | 'failed'
  | 'no-capacity';

export type DispatchResult =
  | { status: 'succeeded'; workerId: string; outcome: Outcome; attempts: number; history: WorkItemState[] }
  | { status: 'failed'; workerId: string; error: WorkerError; attempts: number; history: WorkItemState[] }
  | { status: 'no-capacity'; attempts: number; history: WorkItemState[] };

export interface DispatcherOptions {
  /** Execute attempts per item, first try included (default 2) */
  maxAttempts?: number;
}

export class Dispatcher {
  private readonly maxAttempts: number;

  constructor(private pool: AccountPool, options: DispatcherOptions = {}) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 2);
  }

  /**
   * Runs one work item on the next available worker. Worker failures come
   * back as a `failed` result after the retry budget is spent; `no-capacity`
   * means the caller should back off. Nothing is buffered here.
   */
  async dispatch(item: WorkItem): Promise<DispatchResult> {
    const history: WorkItemState[] = ['pending'];
    let attempts = 0;

    for (;;) {
      history.push('acquiring');
      const lease = await this.pool.acquire();
      if (!lease) {
        history.push('no-capacity');
        log.debug(`No capacity for work item ${item.id}`);
        return { status: 'no-capacity', attempts, history };
      }

      attempts++;
      history.push('executing');
      const result = await this.pool.execute(lease, item);

      if (result.ok) {
        this.pool.release(lease, { kind: 'success' });
        history.push('succeeded');
        log.info('Delivered', { item: item.id, worker: lease.workerId, attempts });
        return { status: 'succeeded', workerId: lease.workerId, outcome: result.outcome, attempts, history };
      }

      const { error } = result;
      try {
        this.applyFailure(lease.workerId, item, error);
      } catch (err) {
        log.error('Failed to record worker failure', { item: item.id, worker: lease.workerId, error: String(err) });
      } finally {
        this.pool.release(lease, { kind: 'failure', reason: error.message });
      }

      if (attempts >= this.maxAttempts) {
        history.push('failed');
        log.warn('Gave up', { item: item.id, attempts, error: error.message });
        return { status: 'failed', workerId: lease.workerId, error, attempts, history };
      }
      history.push(error.kind === 'rate-limited' ? 'rate-limited-retry' : 'retry');
    }
  }

  private applyFailure(workerId: string, item: WorkItem, error: WorkerError): void {
    switch (error.kind) {
      case 'rate-limited':
        this.pool.reportRateLimit(workerId, error.cooldownSeconds, error.message);
        break;
      case 'auth-expired':
        this.pool.deactivate(workerId, error.message);
        break;
      case 'transient':
        log.warn('Attempt failed', { item: item.id, worker: workerId, error: error.message });
        break;
    }
  }
}

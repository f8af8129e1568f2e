import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AccountPool } from '../../src/pool/account-pool.js';
import type { Lease } from '../../src/pool/account-pool.js';
import { MAX_COOLDOWN_SECONDS, authExpired, rateLimited, transient } from '../../src/workers/handle.js';
import { setLogLevel } from '../../src/utils/logger.js';
import { BAD_TOKEN, createClock, createFakeRegistry, createMemoryStore, fakeConfig, workItem } from '../helpers/fakes.js';
import type { FakeRegistry, TestClock } from '../helpers/fakes.js';

describe('AccountPool', () => {
  let fakes: FakeRegistry;
  let clock: TestClock;
  let pool: AccountPool;

  async function start(...ids: string[]): Promise<void> {
    await pool.initialize(ids.map(id => fakeConfig(id)));
  }

  /** Acquire and release straight away, returning the chosen worker */
  async function pick(): Promise<string | null> {
    const lease = await pool.acquire();
    if (!lease) return null;
    pool.release(lease, { kind: 'success' });
    return lease.workerId;
  }

  async function hold(): Promise<Lease> {
    const lease = await pool.acquire();
    if (!lease) throw new Error('expected a lease');
    return lease;
  }

  function load(id: string): number | undefined {
    return pool.getStatus(id)?.currentLoad;
  }

  beforeEach(() => {
    setLogLevel('silent');
    fakes = createFakeRegistry();
    clock = createClock();
    pool = new AccountPool(fakes.registry, { now: clock.now, reconnectTimeoutMs: 50 });
  });

  describe('initialize', () => {
    it('connects valid workers and excludes ones with bad credentials', async () => {
      const result = await pool.initialize([
        fakeConfig('a'),
        fakeConfig('b'),
        fakeConfig('c', { credentials: { token: BAD_TOKEN } }),
      ]);

      expect(result.initializedCount).toBe(2);
      expect(result.ok).toBe(true);
      expect(result.failures).toEqual([
        {
          id: 'c',
          error: { kind: 'connect-failed', message: 'Token rejected', cause: authExpired('Token rejected') },
        },
      ]);
      expect(pool.rotationOrder()).toEqual(['a', 'b']);

      const bad = pool.listStatuses().find(s => s.id === 'c');
      expect(bad?.isActive).toBe(false);
      expect(bad?.lastError).toBe('Token rejected');
    });

    it('never selects a worker whose credentials were rejected', async () => {
      await pool.initialize([
        fakeConfig('a'),
        fakeConfig('bad', { credentials: { token: BAD_TOKEN } }),
        fakeConfig('b'),
      ]);

      const picked = [await pick(), await pick(), await pick(), await pick()];
      expect(picked).toEqual(['a', 'b', 'a', 'b']);
      expect(pool.listStatuses().filter(s => s.isActive).map(s => s.id)).toEqual(['a', 'b']);
    });

    it('reports failure when no worker connects', async () => {
      const result = await pool.initialize([fakeConfig('x', { credentials: { token: BAD_TOKEN } })]);
      expect(result).toMatchObject({ initializedCount: 0, ok: false });

      const empty = await pool.initialize([]);
      expect(empty).toEqual({ initializedCount: 0, failures: [], ok: false });
    });

    it('keeps a worker rate limited at connect time in rotation, cooling down', async () => {
      fakes.prepare('b', h => h.queueConnect({ ok: false, error: rateLimited(20) }));
      const result = await pool.initialize([fakeConfig('a'), fakeConfig('b'), fakeConfig('c')]);

      expect(result.initializedCount).toBe(2);
      expect(result.failures.map(f => f.id)).toEqual(['b']);
      expect(pool.rotationOrder()).toEqual(['a', 'b', 'c']);
      expect(pool.getStatus('b')).toMatchObject({
        isActive: true,
        isConnected: false,
        nextAvailable: clock.iso(20_000),
        lastError: 'Rate limited for 20s',
      });
      expect([await pick(), await pick(), await pick()]).toEqual(['a', 'c', 'a']);
    });

    it('reconnects a worker whose first connect failed transiently on demand', async () => {
      fakes.prepare('b', h => h.queueConnect({ ok: false, error: transient('Network unreachable') }));
      await start('a', 'b');

      expect(pool.getStatus('b')?.lastError).toBe('Network unreachable');
      expect(await pick()).toBe('a');
      expect(await pick()).toBe('b');
      expect(pool.getStatus('b')).toMatchObject({ isConnected: true, lastError: null });
    });

    it('seeds counters from persisted stats', async () => {
      await pool.initialize([{ ...fakeConfig('a'), messagesProcessed: 5, errorCount: 2, lastUsed: '2026-02-01T00:00:00.000Z' }]);
      expect(pool.getStatus('a')).toMatchObject({
        messagesProcessed: 5,
        errorCount: 2,
        lastUsed: '2026-02-01T00:00:00.000Z',
      });
    });

    it('tears down the previous workers on refresh', async () => {
      await start('a', 'b');
      const oldA = fakes.handle('a');

      await start('c');

      expect(oldA.disconnectCalls).toBe(1);
      expect(pool.rotationOrder()).toEqual(['c']);
      expect(pool.size).toBe(1);
    });
  });

  describe('acquire', () => {
    it('selects every worker once before any worker twice', async () => {
      await start('a', 'b', 'c');
      const picked = [await pick(), await pick(), await pick()];
      expect(new Set(picked).size).toBe(3);
      expect(picked).toEqual(['a', 'b', 'c']);
      expect(await pick()).toBe('a');
    });

    it('returns null on an empty pool', async () => {
      expect(await pool.acquire()).toBeNull();
    });

    it('does not hand a worker out past its capacity', async () => {
      await start('a', 'b');
      const first = await pool.acquire();
      const second = await pool.acquire();
      const third = await pool.acquire();

      expect(first?.workerId).toBe('a');
      expect(second?.workerId).toBe('b');
      expect(third).toBeNull();
      expect(load('a')).toBe(1);
      expect(load('b')).toBe(1);
    });

    it('honours a per-worker maxConcurrent', async () => {
      await pool.initialize([fakeConfig('a', { maxConcurrent: 2 })]);
      const leases = [await pool.acquire(), await pool.acquire(), await pool.acquire()];
      expect(leases.map(l => l?.workerId ?? null)).toEqual(['a', 'a', null]);
      expect(load('a')).toBe(2);
    });

    it('keeps load equal to outstanding reservations', async () => {
      pool = new AccountPool(fakes.registry, { now: clock.now, maxConcurrentPerWorker: 3 });
      await start('a', 'b');

      const held: Lease[] = [];
      for (let i = 0; i < 5; i++) {
        const lease = await pool.acquire();
        if (lease) held.push(lease);
      }
      expect(held.map(l => l.workerId)).toEqual(['a', 'b', 'a', 'b', 'a']);
      expect(load('a')).toBe(3);
      expect(load('b')).toBe(2);

      pool.release(held[0], { kind: 'success' });
      pool.release(held[1], { kind: 'failure', reason: 'boom' });
      expect(load('a')).toBe(2);
      expect(load('b')).toBe(1);

      for (const lease of held) pool.release(lease, { kind: 'success' });
      expect(load('a')).toBe(0);
      expect(load('b')).toBe(0);
    });

    it('returns null when every worker is inactive or cooling down', async () => {
      await start('a', 'b');
      pool.deactivate('a', 'Disabled by admin');
      pool.reportRateLimit('b', 60);

      expect(await pool.acquire()).toBeNull();
    });

    it('does not select the same reconnecting worker from two concurrent scans', async () => {
      await start('a', 'b');
      pool.reportRateLimit('a', 1);
      clock.advance(1_000);

      const [first, second] = await Promise.all([pool.acquire(), pool.acquire()]);

      expect(first?.workerId).toBe('a');
      expect(second?.workerId).toBe('b');
      expect(load('a')).toBe(1);
      expect(load('b')).toBe(1);
    });

    it('reconnects a worker whose connection dropped', async () => {
      await start('a');
      fakes.handle('a').connected = false;

      expect(await pick()).toBe('a');
      expect(fakes.handle('a').connectCalls).toBe(2);
      expect(pool.getStatus('a')).toMatchObject({ isConnected: true, lastError: null });
    });
  });

  describe('rate limits', () => {
    it('skips a worker until its cooldown has passed, then reconnects it', async () => {
      await start('a', 'b');
      expect(pool.reportRateLimit('a', 30)).toBe(true);
      expect(pool.getStatus('a')).toMatchObject({
        isConnected: false,
        nextAvailable: clock.iso(30_000),
        lastError: 'Rate limited for 30s',
      });

      expect(await pick()).toBe('b');
      clock.advance(29_999);
      expect(await pick()).toBe('b');

      clock.advance(1);
      expect(await pick()).toBe('a');
      expect(fakes.handle('a').connectCalls).toBe(2);
      expect(pool.getStatus('a')).toMatchObject({
        isConnected: true,
        nextAvailable: null,
        lastError: null,
      });
    });

    it('deactivates a worker whose reconnect is refused', async () => {
      await start('a', 'b');
      pool.reportRateLimit('a', 1);
      fakes.handle('a').queueConnect({ ok: false, error: authExpired('Session revoked') });
      clock.advance(1_000);

      expect(await pick()).toBe('b');
      expect(pool.getStatus('a')).toMatchObject({ isActive: false, lastError: 'Session revoked' });
      expect(pool.rotationOrder()).toEqual(['b']);
    });

    it('keeps a worker in rotation after a transient reconnect failure', async () => {
      await start('a', 'b');
      pool.reportRateLimit('a', 1);
      fakes.handle('a').queueConnect({ ok: false, error: transient('Network unreachable') });
      clock.advance(1_000);

      expect(await pick()).toBe('b');
      expect(pool.getStatus('a')).toMatchObject({ isActive: true, lastError: 'Network unreachable' });

      expect(await pick()).toBe('a');
    });

    it('gives up on a reconnect that takes longer than the timeout', async () => {
      await start('a', 'b');
      pool.reportRateLimit('a', 1);
      fakes.handle('a').queueConnect('hang');
      clock.advance(1_000);

      expect(await pick()).toBe('b');
      expect(pool.getStatus('a')?.lastError).toBe('Connect timed out after 50ms');
    });

    it('bounds cooldowns it cannot represent', async () => {
      await start('a', 'b');
      pool.reportRateLimit('a', Infinity);
      pool.reportRateLimit('b', Number.NaN);

      expect(pool.getStatus('a')).toMatchObject({
        nextAvailable: clock.iso(MAX_COOLDOWN_SECONDS * 1000),
        lastError: `Rate limited for ${MAX_COOLDOWN_SECONDS}s`,
      });
      expect(pool.getStatus('b')).toMatchObject({ nextAvailable: clock.iso(), lastError: 'Rate limited for 0s' });
      expect(await pick()).toBe('b');
    });

    it('ignores a rate limit for an unknown worker', async () => {
      expect(pool.reportRateLimit('ghost', 10)).toBe(false);
    });
  });

  describe('release', () => {
    it('updates counters on success and failure', async () => {
      await start('a');
      const ok = await hold();
      clock.advance(500);
      pool.release(ok, { kind: 'success' });
      expect(pool.getStatus('a')).toMatchObject({ messagesProcessed: 1, errorCount: 0, lastUsed: clock.iso() });

      const bad = await hold();
      pool.release(bad, { kind: 'failure', reason: 'boom' });
      expect(pool.getStatus('a')).toMatchObject({ messagesProcessed: 1, errorCount: 1, lastError: 'boom' });
    });

    it('ignores a second release of the same lease', async () => {
      await start('a');
      const lease = await hold();

      expect(pool.release(lease, { kind: 'success' })).toBe(true);
      expect(pool.release(lease, { kind: 'success' })).toBe(false);
      expect(pool.getStatus('a')).toMatchObject({ currentLoad: 0, messagesProcessed: 1 });
    });

    it('does not let a double release eat into another reservation', async () => {
      pool = new AccountPool(fakes.registry, { now: clock.now, maxConcurrentPerWorker: 2 });
      await start('a');
      const first = await hold();
      await pool.acquire();

      pool.release(first, { kind: 'success' });
      pool.release(first, { kind: 'success' });
      expect(load('a')).toBe(1);
    });
  });

  describe('add and remove', () => {
    it('appends a new worker to the rotation', async () => {
      await start('a');
      expect(await pool.add(fakeConfig('b'))).toEqual({ ok: true, id: 'b' });
      expect(pool.rotationOrder()).toEqual(['a', 'b']);
    });

    it('rejects duplicates and unknown bindings', async () => {
      await start('a');
      const dup = await pool.add(fakeConfig('a'));
      expect(dup).toEqual({ ok: false, error: { kind: 'duplicate', message: 'Worker a is already in the pool' } });

      const unknown = await pool.add(fakeConfig('z', { binding: 'smoke-signals' }));
      expect(unknown).toEqual({
        ok: false,
        error: { kind: 'unknown-binding', message: 'Unknown worker binding: smoke-signals' },
      });
    });

    it('does not keep a worker that fails to connect on add', async () => {
      const result = await pool.add(fakeConfig('b', { credentials: { token: BAD_TOKEN } }));
      expect(result.ok).toBe(false);
      expect(pool.has('b')).toBe(false);
      expect(pool.rotationOrder()).toEqual([]);
    });

    it('keeps the cursor on the next candidate across removals', async () => {
      await start('a', 'b', 'c', 'd');
      expect([await pick(), await pick()]).toEqual(['a', 'b']);

      await pool.remove('a');
      expect(await pick()).toBe('c');

      await pool.remove('d');
      expect(await pick()).toBe('b');
      expect(await pick()).toBe('c');
    });

    it('disconnects a removed worker and ignores its outstanding lease', async () => {
      await start('a');
      const lease = await hold();

      expect(await pool.remove('a')).toBe(true);
      expect(fakes.handle('a').disconnectCalls).toBe(1);
      expect(pool.release(lease, { kind: 'success' })).toBe(false);
      expect(await pool.remove('a')).toBe(false);
    });
  });

  describe('execute', () => {
    it('marks the worker disconnected when the handle loses its session', async () => {
      await start('a');
      fakes.handle('a').queueExecute({ ok: false, error: authExpired() });
      const lease = await hold();

      const result = await pool.execute(lease, workItem('w1'));
      expect(result).toEqual({ ok: false, error: authExpired() });
      expect(pool.getStatus('a')?.isConnected).toBe(false);
    });

    it('refuses a lease that is no longer held', async () => {
      await start('a');
      const lease = await hold();
      pool.release(lease, { kind: 'success' });

      const result = await pool.execute(lease, workItem('w1'));
      expect(result.ok).toBe(false);
      expect(fakes.handle('a').executed).toHaveLength(0);
    });
  });

  describe('health', () => {
    it('summarizes load and connectivity', async () => {
      fakes.prepare('b', h => h.queueConnect({ ok: false, error: rateLimited(30) }));
      await pool.initialize([
        fakeConfig('a'),
        fakeConfig('b'),
        fakeConfig('c', { credentials: { token: BAD_TOKEN } }),
      ]);
      await pool.acquire();

      expect(pool.healthSummary()).toEqual({
        total: 3,
        active: 2,
        connected: 1,
        disconnected: 1,
        totalLoad: 1,
        avgLoadPerActive: 0.5,
        healthPct: 50,
      });
    });

    it('lists copies of the statuses', async () => {
      await start('a');
      const [listing] = pool.listStatuses();
      await pool.acquire();

      expect(listing.currentLoad).toBe(0);
      expect(pool.getStatus('a')?.currentLoad).toBe(1);
    });
  });

  describe('logging', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('logs reservations and cooldowns with structured fields', async () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
      setLogLevel('debug');
      await start('a');

      const lease = await hold();
      pool.reportRateLimit('a', 30);

      const lines = spy.mock.calls.map(call => String(call[0]));
      expect(lines.some(l => l.includes(`[pool] Reserved worker=a lease=${lease.leaseId} load=1`))).toBe(true);
      expect(lines.some(l => l.includes(`[pool] Cooling down worker=a seconds=30 until=${clock.iso(30_000)}`))).toBe(true);
    });
  });

  describe('shutdown', () => {
    it('disconnects every worker and forgets them', async () => {
      await start('a', 'b');
      await pool.shutdown();

      expect(fakes.handle('a').disconnectCalls).toBe(1);
      expect(fakes.handle('b').disconnectCalls).toBe(1);
      expect(pool.size).toBe(0);
      expect(pool.listStatuses()).toEqual([]);
      expect(await pool.acquire()).toBeNull();
    });
  });

  describe('with a store', () => {
    it('persists stats on release and deactivation', async () => {
      const store = createMemoryStore();
      pool = new AccountPool(fakes.registry, { now: clock.now, store });
      await start('a');

      const first = await hold();
      pool.release(first, { kind: 'success' });
      const second = await hold();
      pool.release(second, { kind: 'failure', reason: 'boom' });
      pool.deactivate('a', 'Session revoked');

      expect(store.persistWorkerStats.mock.calls).toEqual([['a', 1, 0], ['a', 0, 1]]);
      expect(store.deactivateWorker).toHaveBeenCalledWith('a');
    });

    it('keeps serving when persisting fails', async () => {
      const store = createMemoryStore();
      store.persistWorkerStats.mockRejectedValue(new Error('disk full'));
      pool = new AccountPool(fakes.registry, { now: clock.now, store });
      await start('a');

      const lease = await hold();
      expect(pool.release(lease, { kind: 'success' })).toBe(true);
      await Promise.resolve();
      expect(pool.getStatus('a')?.messagesProcessed).toBe(1);
    });
  });
});

import { describe, expect, it } from 'vitest';
import path from 'node:path';
import os from 'node:os';
import { existsSync } from 'node:fs';
import { mkdtemp, writeFile } from 'node:fs/promises';
import { SyncCoordinator } from '../src/sync/coordinator.js';
import { ReplicaWorker } from '../src/sync/worker.js';
import { JsonReplicaStore, MemorySyncServer } from '../src/replica/jsonReplica.js';
import { ConfigurationError } from '../src/errors.js';
import type { ReplicaStore } from '../src/replica/store.js';
import type { NativeEntry } from '../src/model.js';
import { Deferred, ScriptedStore } from './support/fakes.js';

const CLIENT = 'client-0001';
const SECRET = 'test-secret';
const T0 = Date.UTC(2024, 0, 31, 12, 0, 0);

const seeded: NativeEntry[] = [
  { uuid: 'task-1', status: 'pending', description: 'Water plants', modified: '2024-01-01T00:00:00Z' },
  { uuid: 'task-2', status: 'pending', description: 'Pay rent', start: '2024-01-02T00:00:00Z', modified: '2024-01-02T00:00:00Z' },
];

class ManualClock {
  constructor(public t = T0) {}
  now = () => this.t;
  advance(seconds: number) {
    this.t += seconds * 1000;
  }
}

async function setup(
  opts: { store?: ReplicaStore; server?: MemorySyncServer; timeout?: number; minInterval?: number; clock?: ManualClock } = {},
) {
  const server = opts.server ?? new MemorySyncServer();
  server.seed(CLIENT, SECRET, seeded);
  const store = opts.store ?? new JsonReplicaStore(server);
  const dataDir = await mkdtemp(path.join(os.tmpdir(), 'replica-coordinator-'));
  const worker = new ReplicaWorker({
    store,
    dataDir,
    remote: { url: server.url, clientId: CLIENT, secret: SECRET },
    sleep: async () => {},
  });
  const coordinator = new SyncCoordinator({
    worker,
    syncTimeoutSeconds: opts.timeout ?? 5,
    minSyncIntervalSeconds: opts.minInterval ?? 10,
    now: opts.clock?.now,
  });
  return { server, store, dataDir, worker, coordinator };
}

describe('SyncCoordinator', () => {
  it('returns freshly synced tasks on the first call', async () => {
    const clock = new ManualClock();
    const { coordinator } = await setup({ clock });

    const result = await coordinator.syncAndFetch();

    expect(result).toMatchObject({ success: true, source: 'synced', lastSuccessAt: new Date(T0) });
    expect(result.tasks.map((t) => t.uuid).sort()).toEqual(['task-1', 'task-2']);
    expect(result.tasks.find((t) => t.uuid === 'task-2')?.active).toBe(true);
  });

  it('runs one physical sync for concurrent callers and hands all of them the same result', async () => {
    const server = new MemorySyncServer('memory://sync', 20);
    const { coordinator } = await setup({ server });

    const results = await Promise.all(Array.from({ length: 6 }, () => coordinator.syncAndFetch()));

    expect(server.syncCount).toBe(1);
    expect(new Set(results).size).toBe(1);
    expect(results[0]?.success).toBe(true);
  });

  it('honours the minimum interval between attempts', async () => {
    const clock = new ManualClock();
    const { server, coordinator } = await setup({ clock, minInterval: 10 });

    const first = await coordinator.syncAndFetch();
    clock.advance(5);
    const second = await coordinator.syncAndFetch();

    expect(server.syncCount).toBe(1);
    expect(second).toMatchObject({ success: true, source: 'cache', lastSuccessAt: new Date(T0) });
    expect(second.tasks).toEqual(first.tasks);

    clock.advance(6);
    const third = await coordinator.syncAndFetch();
    expect(server.syncCount).toBe(2);
    expect(third).toMatchObject({ success: true, source: 'synced', lastSuccessAt: new Date(T0 + 11_000) });
  });

  it('syncs on every sequential call when the interval is zero', async () => {
    const { server, coordinator } = await setup({ minInterval: 0 });
    await coordinator.syncAndFetch();
    await coordinator.syncAndFetch();
    expect(server.syncCount).toBe(2);
  });

  it('serves the stale snapshot when a later sync fails', async () => {
    const clock = new ManualClock();
    const { server, coordinator } = await setup({ clock });

    const fresh = await coordinator.syncAndFetch();
    server.failNext(new Error('server rejected client'));
    clock.advance(11);
    const stale = await coordinator.syncAndFetch();

    expect(stale).toMatchObject({ success: false, reason: 'sync-error', source: 'cache', lastSuccessAt: new Date(T0) });
    expect(stale.tasks).toEqual(fresh.tasks);
    expect(coordinator.status().consecutiveFailures).toBe(1);

    clock.advance(1);
    const gated = await coordinator.syncAndFetch();
    expect(gated).toMatchObject({ success: false, reason: 'previous-failure', source: 'cache' });
    expect(server.syncCount).toBe(2);
  });

  it('falls back to reading the local replica when nothing is cached yet', async () => {
    const { server, coordinator } = await setup();
    server.failNext(new Error('server rejected client'));

    const result = await coordinator.syncAndFetch();

    expect(result).toMatchObject({ success: false, reason: 'sync-error', source: 'replica', tasks: [] });
    expect(result.lastSuccessAt).toBeUndefined();
  });

  it('resets the replica before the fourth attempt after three failures', async () => {
    const clock = new ManualClock();
    const { server, dataDir, coordinator } = await setup({ clock });
    server.failNext(new Error('server rejected client'), new Error('server rejected client'), new Error('server rejected client'));

    for (let i = 0; i < 3; i++) {
      const r = await coordinator.syncAndFetch();
      expect(r.success).toBe(false);
      clock.advance(11);
    }
    expect(coordinator.status().consecutiveFailures).toBe(3);

    const marker = path.join(dataDir, 'possibly-corrupt');
    await writeFile(marker, 'x');

    const fourth = await coordinator.syncAndFetch();

    expect(existsSync(marker)).toBe(false);
    expect(fourth).toMatchObject({ success: true, source: 'synced' });
    expect(fourth.tasks).toHaveLength(2);
    expect(coordinator.status().consecutiveFailures).toBe(0);
    expect(server.syncCount).toBe(4);
  });

  it('counts the reset attempt from zero when it fails too', async () => {
    const clock = new ManualClock();
    const { server, dataDir, coordinator } = await setup({ clock });
    server.failNext(...Array.from({ length: 4 }, () => new Error('server rejected client')));

    for (let i = 0; i < 3; i++) {
      await coordinator.syncAndFetch();
      clock.advance(11);
    }
    const marker = path.join(dataDir, 'possibly-corrupt');
    await writeFile(marker, 'x');

    const fourth = await coordinator.syncAndFetch();

    expect(existsSync(marker)).toBe(false);
    expect(fourth).toMatchObject({ success: false, reason: 'sync-error' });
    expect(coordinator.status().consecutiveFailures).toBe(1);
  });

  it('reports a timeout as failure even if the sync later succeeds', async () => {
    const store = new ScriptedStore();
    store.entries = [{ uuid: 'late', status: 'pending', description: 'late arrival' }];
    const gate = new Deferred();
    store.syncImpl = () => gate.promise;
    const { coordinator } = await setup({ store, timeout: 0.05 });

    const result = await coordinator.syncAndFetch();
    expect(result).toMatchObject({ success: false, reason: 'timeout', source: 'none', tasks: [] });

    gate.resolve();
    await coordinator.close();

    expect(store.reads).toBe(1);
    expect(coordinator.lastSuccessfulSyncTime()).toBeUndefined();
    expect(coordinator.status()).toMatchObject({ consecutiveFailures: 1, cachedTasks: 0 });
  });

  it('replaces the cache with a fresh read even when the clock steps back', async () => {
    const clock = new ManualClock();
    const { server, coordinator } = await setup({ clock });
    await coordinator.syncAndFetch();

    server.seed(CLIENT, SECRET, [{ uuid: 'task-3', status: 'pending', description: 'New', modified: '2024-01-03T00:00:00Z' }]);
    clock.advance(11);
    const pending = coordinator.syncAndFetch();
    clock.advance(-60);
    const result = await pending;

    expect(result).toMatchObject({ success: true, source: 'synced' });
    expect(result.tasks.map((t) => t.uuid).sort()).toEqual(['task-1', 'task-2', 'task-3']);

    clock.advance(60);
    const cached = await coordinator.syncAndFetch();
    expect(cached.source).toBe('cache');
    expect(cached.tasks.map((t) => t.uuid).sort()).toEqual(['task-1', 'task-2', 'task-3']);
  });

  it('counts local read failures toward the reset like remote ones', async () => {
    const clock = new ManualClock();
    const store = new ScriptedStore();
    store.entries = [{ uuid: 'local-1', status: 'pending', description: 'Local' }];
    let broken = true;
    store.readImpl = async () => {
      if (broken) throw new Error('database disk image is malformed');
      return store.entries;
    };
    const { dataDir, coordinator } = await setup({ store, clock });

    for (let i = 1; i <= 3; i++) {
      const r = await coordinator.syncAndFetch();
      expect(r).toMatchObject({ success: false, reason: 'replica-error', source: 'none', tasks: [] });
      expect(coordinator.status().consecutiveFailures).toBe(i);
      clock.advance(11);
    }

    const marker = path.join(dataDir, 'possibly-corrupt');
    await writeFile(marker, 'x');
    broken = false;
    const fourth = await coordinator.syncAndFetch();

    expect(existsSync(marker)).toBe(false);
    expect(fourth).toMatchObject({ success: true, source: 'synced' });
    expect(fourth.tasks.map((t) => t.uuid)).toEqual(['local-1']);
    expect(coordinator.status().consecutiveFailures).toBe(0);
  });

  it('serves the cached snapshot when a later attempt times out', async () => {
    const clock = new ManualClock();
    const store = new ScriptedStore();
    store.entries = [{ uuid: 'cached-1', status: 'pending', description: 'Cached' }];
    const { coordinator } = await setup({ store, clock, timeout: 0.05 });

    const fresh = await coordinator.syncAndFetch();
    expect(fresh.success).toBe(true);

    const gate = new Deferred();
    store.syncImpl = () => gate.promise;
    clock.advance(11);
    const timedOut = await coordinator.syncAndFetch();

    expect(timedOut).toMatchObject({
      success: false,
      reason: 'timeout',
      source: 'cache',
      lastSuccessAt: new Date(T0),
    });
    expect(timedOut.tasks).toEqual(fresh.tasks);
    expect(coordinator.status().consecutiveFailures).toBe(1);

    gate.resolve();
    await coordinator.close();
  });

  it('answers liveness without touching sync state', async () => {
    const store = new ScriptedStore();
    const gate = new Deferred();
    store.syncImpl = () => gate.promise;
    const { coordinator } = await setup({ store });

    expect(coordinator.lastSuccessfulSyncTime()).toBeUndefined();
    expect(store.opens).toBe(0);

    const pending = coordinator.syncAndFetch();
    expect(coordinator.status().inFlight).toBe(true);
    expect(coordinator.lastSuccessfulSyncTime()).toBeUndefined();

    gate.resolve();
    const result = await pending;
    const before = coordinator.status();
    const last = coordinator.lastSuccessfulSyncTime();
    coordinator.lastSuccessfulSyncTime();

    expect(last).toEqual(result.lastSuccessAt);
    expect(coordinator.status()).toEqual(before);
    expect(store.syncCalls).toBe(1);
  });

  it('rejects invalid timing options at construction', async () => {
    const { worker } = await setup();
    expect(() => new SyncCoordinator({ worker, syncTimeoutSeconds: 0, minSyncIntervalSeconds: 10 })).toThrow(
      ConfigurationError,
    );
    expect(() => new SyncCoordinator({ worker, syncTimeoutSeconds: 5, minSyncIntervalSeconds: -1 })).toThrow(
      ConfigurationError,
    );
  });
});

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { NativeEntry } from '../model.js';
import { ReplicaError } from '../errors.js';
import { sleep } from '../async.js';
import type { ReplicaHandle, ReplicaStore } from './store.js';

const ReplicaFileSchema = z.object({
  version: z.literal(1),
  entries: z.array(z.record(z.string(), z.unknown())),
});

interface ReplicaFile {
  version: 1;
  entries: NativeEntry[];
}

interface ClientState {
  secret: string;
  entries: Map<string, NativeEntry>;
}

function uuidOf(e: NativeEntry): string | undefined {
  return typeof e.uuid === 'string' ? e.uuid : undefined;
}

function modifiedOf(e: NativeEntry): string {
  return typeof e.modified === 'string' ? e.modified : '';
}

/**
 * In-process stand-in for a sync server, for local demos and tests.
 *
 * - Keeps one entry set per client id, guarded by that client's secret.
 * - Merges by uuid; the later `modified` wins.
 * - `failNext` queues errors thrown by upcoming syncs, in order.
 */
export class MemorySyncServer {
  private clients = new Map<string, ClientState>();
  private pendingFailures: Error[] = [];
  syncCount = 0;

  constructor(
    readonly url = 'memory://sync',
    private readonly latencyMs = 0,
  ) {}

  seed(clientId: string, secret: string, entries: NativeEntry[]): void {
    const state = this.clientState(clientId, secret);
    for (const e of entries) {
      const id = uuidOf(e);
      if (id) state.entries.set(id, e);
    }
  }

  failNext(...errors: Error[]): void {
    this.pendingFailures.push(...errors);
  }

  private clientState(clientId: string, secret: string): ClientState {
    const existing = this.clients.get(clientId);
    if (existing) {
      if (existing.secret !== secret) throw new Error('sync server rejected encryption secret');
      return existing;
    }
    const created: ClientState = { secret, entries: new Map() };
    this.clients.set(clientId, created);
    return created;
  }

  async sync(clientId: string, secret: string, local: readonly NativeEntry[]): Promise<NativeEntry[]> {
    this.syncCount++;
    if (this.latencyMs) await sleep(this.latencyMs);
    const failure = this.pendingFailures.shift();
    if (failure) throw failure;

    const state = this.clientState(clientId, secret);
    for (const e of local) {
      const id = uuidOf(e);
      if (!id) continue;
      const remote = state.entries.get(id);
      if (!remote || modifiedOf(e) > modifiedOf(remote)) state.entries.set(id, e);
    }
    return [...state.entries.values()].map((e) => structuredClone(e));
  }
}

class JsonReplicaHandle implements ReplicaHandle {
  constructor(
    readonly dataDir: string,
    private readonly server: MemorySyncServer,
  ) {}

  private filePath() {
    return path.join(this.dataDir, 'replica.json');
  }

  private async load(): Promise<ReplicaFile> {
    let raw: string;
    try {
      raw = await readFile(this.filePath(), 'utf8');
    } catch (e) {
      throw new ReplicaError(`replica file unreadable in ${this.dataDir}`, this.dataDir, { cause: e });
    }
    try {
      return ReplicaFileSchema.parse(JSON.parse(raw));
    } catch (e) {
      throw new ReplicaError(`replica file corrupt in ${this.dataDir}`, this.dataDir, { cause: e });
    }
  }

  private async save(file: ReplicaFile): Promise<void> {
    const tmp = this.filePath() + '.tmp';
    await writeFile(tmp, JSON.stringify(file, null, 2) + '\n', 'utf8');
    await rename(tmp, this.filePath());
  }

  async readAll(): Promise<NativeEntry[]> {
    return (await this.load()).entries;
  }

  async synchronize(remoteUrl: string, clientId: string, secret: string, avoidSnapshots: boolean): Promise<void> {
    if (remoteUrl !== this.server.url) throw new Error(`no sync server at ${remoteUrl}`);
    void avoidSnapshots; // the memory server keeps no snapshots either way
    const local = await this.load();
    const merged = await this.server.sync(clientId, secret, local.entries);
    await this.save({ version: 1, entries: merged });
  }
}

/** JSON-file replica (`<dataDir>/replica.json`) synced against a {@link MemorySyncServer}. */
export class JsonReplicaStore implements ReplicaStore {
  readonly kind = 'json';
  opened = 0;

  constructor(readonly server: MemorySyncServer) {}

  async openOrCreate(dataDir: string): Promise<ReplicaHandle> {
    await mkdir(dataDir, { recursive: true });
    this.opened++;
    const handle = new JsonReplicaHandle(dataDir, this.server);
    try {
      await writeFile(path.join(dataDir, 'replica.json'), JSON.stringify({ version: 1, entries: [] }) + '\n', {
        flag: 'wx',
      });
    } catch (e) {
      // already there
      if (!(e instanceof Error && 'code' in e && e.code === 'EEXIST')) throw e;
    }
    return handle;
  }
}

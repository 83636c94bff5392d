import { mkdir, rm } from 'node:fs/promises';
import type { NativeEntry, TaskRecord } from '../model.js';
import type { ReplicaHandle, ReplicaStore } from '../replica/store.js';
import { readTaskRecords } from '../replica/records.js';
import { errorMessage, isTransientSyncError, ReplicaError, SyncError } from '../errors.js';
import { sleep as defaultSleep } from '../async.js';
import { createLogger, redactId, type Logger } from '../log.js';

export const SYNC_RETRY_ATTEMPTS = 3;
export const SYNC_RETRY_DELAY_MS = 2_000;

export interface RemoteReplica {
  url: string;
  clientId: string;
  secret: string;
}

export interface ReplicaWorkerOptions {
  store: ReplicaStore;
  dataDir: string;
  remote: RemoteReplica;
  logger?: Logger;
  /** Total synchronize calls per job while errors stay transient. */
  retryAttempts?: number;
  retryDelayMs?: number;
  /** Inject for tests. */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Sole owner of the replica handle. Every store operation is a job on one
 * promise chain, so the non-reentrant store never sees two at once: a sync
 * abandoned by its caller still finishes before the next read starts.
 */
export class ReplicaWorker {
  private handle?: ReplicaHandle;
  private tail: Promise<unknown> = Promise.resolve();
  private queued = 0;

  private readonly logger: Logger;
  private readonly retryAttempts: number;
  private readonly retryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly opts: ReplicaWorkerOptions) {
    this.logger = (opts.logger ?? createLogger('silent')).child('worker');
    this.retryAttempts = Math.max(1, opts.retryAttempts ?? SYNC_RETRY_ATTEMPTS);
    this.retryDelayMs = opts.retryDelayMs ?? SYNC_RETRY_DELAY_MS;
    this.sleep = opts.sleep ?? defaultSleep;
  }

  get dataDir() {
    return this.opts.dataDir;
  }

  /** Jobs queued or running. */
  get pending() {
    return this.queued;
  }

  private run<T>(label: string, job: () => Promise<T>): Promise<T> {
    this.queued++;
    const next = this.tail.then(async () => {
      this.logger.debug(`job start: ${label}`);
      try {
        return await job();
      } finally {
        this.queued--;
      }
    });
    // The caller gets `next` with its rejection; the chain only keeps order.
    this.tail = next.catch(() => undefined);
    return next;
  }

  /** Resolves once every job queued so far has settled. */
  async idle(): Promise<void> {
    await this.tail;
  }

  private async open(): Promise<ReplicaHandle> {
    if (this.handle) return this.handle;
    this.logger.info(`opening ${this.opts.store.kind} replica at ${this.dataDir}`);
    try {
      this.handle = await this.opts.store.openOrCreate(this.dataDir);
    } catch (e) {
      if (e instanceof ReplicaError) throw e;
      throw new ReplicaError(`cannot open replica at ${this.dataDir}: ${errorMessage(e)}`, this.dataDir, {
        cause: e,
      });
    }
    return this.handle;
  }

  private async readOpen(): Promise<TaskRecord[]> {
    const handle = await this.open();
    let entries: NativeEntry[];
    try {
      entries = await handle.readAll();
    } catch (e) {
      // a handle that failed to read is not trusted for the next job
      this.handle = undefined;
      if (e instanceof ReplicaError) throw e;
      throw new ReplicaError(`cannot read replica at ${this.dataDir}: ${errorMessage(e)}`, this.dataDir, {
        cause: e,
      });
    }
    return readTaskRecords(entries, this.logger);
  }

  private async resetDir(): Promise<void> {
    this.handle = undefined;
    try {
      await rm(this.dataDir, { recursive: true, force: true });
      await mkdir(this.dataDir, { recursive: true });
      this.logger.warn(`replica directory reset at ${this.dataDir}`);
    } catch (e) {
      // the sync that follows runs against whatever is left and counts as a failure if that is broken
      this.logger.error(`failed to reset replica directory ${this.dataDir}`, e);
    }
  }

  private async synchronizeWithRetry(): Promise<void> {
    const { url, clientId, secret } = this.opts.remote;

    for (let attempt = 1; ; attempt++) {
      try {
        this.logger.info(`sync attempt ${attempt}/${this.retryAttempts}`, { server: url, clientId: redactId(clientId) });
        const handle = await this.open();
        await handle.synchronize(url, clientId, secret, false);
        return;
      } catch (e) {
        this.handle = undefined;
        if (isTransientSyncError(e) && attempt < this.retryAttempts) {
          this.logger.warn(`sync attempt ${attempt} failed, retrying in ${this.retryDelayMs}ms`, errorMessage(e));
          await this.sleep(this.retryDelayMs);
          continue;
        }
        if (e instanceof ReplicaError) throw e;
        throw new SyncError(`sync failed after ${attempt} attempt(s): ${errorMessage(e)}`, attempt, { cause: e });
      }
    }
  }

  /**
   * Synchronize with the remote, then reopen the replica and read it so the
   * returned records reflect what the sync wrote.
   */
  syncAndRead(opts: { reset?: boolean } = {}): Promise<TaskRecord[]> {
    return this.run('sync', async () => {
      if (opts.reset) await this.resetDir();
      await this.synchronizeWithRetry();
      this.handle = undefined;
      return this.readOpen();
    });
  }

  read(): Promise<TaskRecord[]> {
    return this.run('read', () => this.readOpen());
  }
}

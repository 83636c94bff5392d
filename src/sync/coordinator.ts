import type { SyncFailureReason, SyncResult, TaskRecord, TaskSnapshot } from '../model.js';
import { ConfigurationError, errorMessage, ReplicaError } from '../errors.js';
import { withDeadline, type Deadline } from '../async.js';
import { createLogger, type Logger } from '../log.js';
import type { ReplicaWorker } from './worker.js';

export const CONSECUTIVE_FAILURES_BEFORE_RESET = 3;

export interface SyncCoordinatorOptions {
  worker: ReplicaWorker;
  syncTimeoutSeconds: number;
  minSyncIntervalSeconds: number;
  logger?: Logger;
  /** Epoch ms. Inject for tests. */
  now?: () => number;
}

/** Read-only view of the coordinator's bookkeeping. */
export interface SyncStatus {
  lastAttemptAt?: Date;
  lastSuccessAt?: Date;
  consecutiveFailures: number;
  inFlight: boolean;
  cachedTasks: number;
  cachedAt?: Date;
}

/**
 * Decides when the replica is synchronized and always answers with the best
 * snapshot it has.
 *
 * One instance per process and per replica directory. All bookkeeping is
 * written only by the attempt that currently holds the single-flight slot
 * (`inFlight`); callers arriving meanwhile join that attempt instead of
 * starting their own.
 */
export class SyncCoordinator {
  private lastAttemptAt?: number;
  private lastSuccessAt?: number;
  private consecutiveFailures = 0;
  private cached?: TaskSnapshot;
  private inFlight?: Promise<SyncResult>;

  private readonly worker: ReplicaWorker;
  private readonly timeoutMs: number;
  private readonly minIntervalMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(opts: SyncCoordinatorOptions) {
    const issues: string[] = [];
    if (!(opts.syncTimeoutSeconds > 0)) issues.push('syncTimeoutSeconds must be > 0');
    if (!(opts.minSyncIntervalSeconds >= 0)) issues.push('minSyncIntervalSeconds must be >= 0');
    if (issues.length) throw new ConfigurationError('Invalid sync coordinator options', issues);

    this.worker = opts.worker;
    this.timeoutMs = opts.syncTimeoutSeconds * 1000;
    this.minIntervalMs = opts.minSyncIntervalSeconds * 1000;
    this.logger = (opts.logger ?? createLogger('silent')).child('coordinator');
    this.now = opts.now ?? Date.now;
  }

  /** Passive; never syncs, never waits. */
  lastSuccessfulSyncTime(): Date | undefined {
    return this.lastSuccessAt === undefined ? undefined : new Date(this.lastSuccessAt);
  }

  status(): SyncStatus {
    return {
      lastAttemptAt: this.lastAttemptAt === undefined ? undefined : new Date(this.lastAttemptAt),
      lastSuccessAt: this.lastSuccessfulSyncTime(),
      consecutiveFailures: this.consecutiveFailures,
      inFlight: this.inFlight !== undefined,
      cachedTasks: this.cached?.tasks.length ?? 0,
      cachedAt: this.cached?.readAt,
    };
  }

  async syncAndFetch(): Promise<SyncResult> {
    if (this.inFlight) {
      this.logger.debug('sync in flight, joining it');
      return this.inFlight;
    }
    if (this.withinMinInterval(this.now())) {
      this.logger.debug('skipping sync: min interval not met');
      return this.fromCache();
    }

    // No await between the check above and this assignment: the slot is taken atomically.
    const attempt = this.attempt();
    this.inFlight = attempt;
    try {
      return await attempt;
    } finally {
      if (this.inFlight === attempt) this.inFlight = undefined;
    }
  }

  /** Wait for queued store work, including an abandoned timed-out sync. */
  async close(): Promise<void> {
    await this.worker.idle();
  }

  private withinMinInterval(now: number) {
    return this.lastAttemptAt !== undefined && now - this.lastAttemptAt < this.minIntervalMs;
  }

  private fromCache(): SyncResult {
    const tasks = this.cached?.tasks ?? [];
    if (this.consecutiveFailures === 0 && this.lastSuccessAt !== undefined) {
      return { success: true, tasks, lastSuccessAt: new Date(this.lastSuccessAt), source: 'cache' };
    }
    return this.failure('previous-failure', this.cached ? 'cache' : 'none');
  }

  private failure(reason: SyncFailureReason, source: 'cache' | 'replica' | 'none'): SyncResult {
    return {
      success: false,
      tasks: this.cached?.tasks ?? [],
      lastSuccessAt: this.lastSuccessfulSyncTime(),
      source,
      reason,
    };
  }

  // Attempts are serialized, so the latest read is always the newest one.
  // readAt is informational only; the wall clock may step backwards.
  private remember(tasks: readonly TaskRecord[]) {
    this.cached = { tasks: Object.freeze([...tasks]), readAt: new Date(this.now()) };
  }

  private onLate(outcome: Deadline<unknown>) {
    if (outcome.ok) {
      this.logger.info('abandoned sync finished after its timeout; result ignored');
    } else {
      this.logger.warn('abandoned sync failed after its timeout', errorMessage(outcome.error));
    }
  }

  private async attempt(): Promise<SyncResult> {
    const started = this.now();
    this.lastAttemptAt = started;

    const reset = this.consecutiveFailures >= CONSECUTIVE_FAILURES_BEFORE_RESET;
    if (reset) {
      this.logger.warn(
        `consecutive sync failures (${this.consecutiveFailures}), resetting replica and re-syncing from server`,
      );
      this.consecutiveFailures = 0;
    }

    const outcome = await withDeadline(this.worker.syncAndRead({ reset }), this.timeoutMs, 'sync', (late) =>
      this.onLate(late),
    );
    const durationMs = this.now() - started;

    if (outcome.ok) {
      this.lastSuccessAt = this.now();
      this.consecutiveFailures = 0;
      this.remember(outcome.value);
      this.logger.info(`sync succeeded in ${durationMs}ms`, { tasks: outcome.value.length });
      return {
        success: true,
        tasks: this.cached?.tasks ?? outcome.value,
        lastSuccessAt: new Date(this.lastSuccessAt),
        source: 'synced',
      };
    }

    this.consecutiveFailures++;
    const reason: SyncFailureReason = outcome.timedOut
      ? 'timeout'
      : outcome.error instanceof ReplicaError
        ? 'replica-error'
        : 'sync-error';
    this.logger.warn(`sync ${reason === 'timeout' ? 'timed out' : 'failed'} after ${durationMs}ms`, {
      consecutiveFailures: this.consecutiveFailures,
      error: errorMessage(outcome.error),
    });

    // The worker is still busy after a timeout and a fresh reset holds nothing
    // worth reading; otherwise seed an empty cache from the local replica.
    if (this.cached || outcome.timedOut || reset) {
      return this.failure(reason, this.cached ? 'cache' : 'none');
    }
    const remainingMs = Math.max(1, this.timeoutMs - durationMs);
    const fallback = await withDeadline(this.worker.read(), remainingMs, 'fallback read', (late) =>
      this.onLate(late),
    );
    if (fallback.ok) {
      this.remember(fallback.value);
      return this.failure(reason, 'replica');
    }
    this.logger.warn('fallback read of local replica failed', errorMessage(fallback.error));
    return this.failure(reason, 'none');
  }
}

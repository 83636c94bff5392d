export const TASK_STATUSES = ['pending', 'completed', 'deleted', 'recurring', 'unknown'] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

/**
 * Entry as the replica store hands it out (Taskwarrior `export` shape).
 * Everything beyond `uuid` is optional because the store does not validate
 * what other clients synced into it.
 */
export interface NativeEntry {
  uuid?: unknown;
  status?: unknown;
  description?: unknown;
  project?: unknown;
  tags?: unknown;
  entry?: unknown;
  modified?: unknown;
  scheduled?: unknown;
  start?: unknown;
  wait?: unknown;
  end?: unknown;
  [key: string]: unknown;
}

/** Immutable point-in-time copy of one task; never references the store. */
export interface TaskRecord {
  readonly uuid: string;
  readonly status: TaskStatus;
  readonly description: string;
  readonly project?: string;
  readonly tags: readonly string[];
  readonly entry?: Date;
  readonly modified?: Date;
  readonly scheduled?: Date;
  readonly start?: Date;
  readonly wait?: Date;
  readonly end?: Date;
  /** Started and not completed. */
  readonly active: boolean;
}

export interface TaskSnapshot {
  readonly tasks: readonly TaskRecord[];
  readonly readAt: Date;
}

export type SyncFailureReason = 'timeout' | 'sync-error' | 'replica-error' | 'previous-failure';

/** Where the tasks of a result came from. */
export type SnapshotSource = 'synced' | 'cache' | 'replica' | 'none';

export type SyncResult =
  | {
      success: true;
      tasks: readonly TaskRecord[];
      lastSuccessAt: Date;
      source: 'synced' | 'cache';
    }
  | {
      success: false;
      tasks: readonly TaskRecord[];
      lastSuccessAt?: Date;
      source: Exclude<SnapshotSource, 'synced'>;
      reason: SyncFailureReason;
    };

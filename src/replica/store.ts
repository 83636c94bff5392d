import type { NativeEntry } from '../model.js';

/**
 * Open handle on an on-disk replica. Not safe for concurrent use: callers
 * must never have two operations outstanding on the same handle, or on two
 * handles for the same directory.
 */
export interface ReplicaHandle {
  readonly dataDir: string;

  readAll(): Promise<NativeEntry[]>;

  /**
   * Pull and push changes against the remote sync server. On error the local
   * replica is left recoverable, though not necessarily in step with the
   * remote.
   */
  synchronize(remoteUrl: string, clientId: string, secret: string, avoidSnapshots: boolean): Promise<void>;
}

export interface ReplicaStore {
  readonly kind: string;

  /** Open the replica at `dataDir`, creating an empty one if none exists. */
  openOrCreate(dataDir: string): Promise<ReplicaHandle>;
}

import type { BridgeConfig } from './config.js';
import { createLogger, redactId, type Logger } from './log.js';
import type { ReplicaStore } from './replica/store.js';
import { TaskwarriorReplicaStore } from './replica/taskwarrior.js';
import { SyncCoordinator } from './sync/coordinator.js';
import { ReplicaWorker, type ReplicaWorkerOptions } from './sync/worker.js';

export interface Bridge {
  config: Readonly<BridgeConfig>;
  coordinator: SyncCoordinator;
  logger: Logger;
}

export interface CreateBridgeOptions {
  store?: ReplicaStore;
  logger?: Logger;
  now?: () => number;
  retry?: Pick<ReplicaWorkerOptions, 'retryAttempts' | 'retryDelayMs' | 'sleep'>;
}

/**
 * Build the process-wide worker + coordinator pair for one replica
 * directory. Construct once at startup and hand the result to the HTTP
 * layer; two bridges on the same directory would break the store's
 * single-owner rule.
 */
export function createBridge(config: Readonly<BridgeConfig>, opts: CreateBridgeOptions = {}): Bridge {
  const logger = opts.logger ?? createLogger(config.logLevel);
  const store = opts.store ?? new TaskwarriorReplicaStore({ bin: config.taskwarriorBin, logger });

  const worker = new ReplicaWorker({
    store,
    dataDir: config.dataDir,
    remote: { url: config.syncServerUrl, clientId: config.clientId, secret: config.encryptionSecret },
    logger,
    ...opts.retry,
  });
  const coordinator = new SyncCoordinator({
    worker,
    syncTimeoutSeconds: config.syncTimeoutSeconds,
    minSyncIntervalSeconds: config.minSyncIntervalSeconds,
    logger,
    now: opts.now,
  });

  logger.info('replica bridge configured', {
    store: store.kind,
    syncServer: config.syncServerUrl,
    dataDir: config.dataDir,
    clientId: redactId(config.clientId),
    secretLength: config.encryptionSecret.length,
  });

  return { config, coordinator, logger };
}

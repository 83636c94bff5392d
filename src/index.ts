export * from './model.js';
export * from './errors.js';
export { createLogger, type Logger, type LogLevel } from './log.js';
export { loadConfig, doctorReport, type BridgeConfig } from './config.js';
export { loadEnvFiles } from './env.js';
export type { ReplicaHandle, ReplicaStore } from './replica/store.js';
export { TaskwarriorReplicaStore, type CommandRunner } from './replica/taskwarrior.js';
export { JsonReplicaStore, MemorySyncServer } from './replica/jsonReplica.js';
export { readTaskRecords, toTaskRecord, mapStatus, parseTimestamp } from './replica/records.js';
export { ReplicaWorker, type ReplicaWorkerOptions } from './sync/worker.js';
export { SyncCoordinator, CONSECUTIVE_FAILURES_BEFORE_RESET, type SyncStatus } from './sync/coordinator.js';
export { createBridge, type Bridge } from './bridge.js';
export { createHandler, startServer } from './server.js';
export * from './format.js';

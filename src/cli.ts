import { Command } from 'commander';
import { mkdtemp } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { doctorReport, loadConfig, type BridgeConfig } from './config.js';
import { loadEnvFiles, type EnvLike } from './env.js';
import { ConfigurationError } from './errors.js';
import { createLogger } from './log.js';
import { createBridge } from './bridge.js';
import { formatTimestamp, overviewTasks, toApiTask } from './format.js';
import type { SyncResult } from './model.js';
import { JsonReplicaStore, MemorySyncServer } from './replica/jsonReplica.js';
import { startServer } from './server.js';

loadEnvFiles();

const program = new Command();

program
  .name('task-replica-bridge')
  .description('Read-only HTTP JSON view over a synchronized TaskChampion replica')
  .version('0.1.0');

/**
 * Configuration errors are fatal: report every issue and exit 2. Flag
 * overrides are validated like the env vars they replace.
 */
function configOrExit(overrides: EnvLike = {}): Readonly<BridgeConfig> | undefined {
  try {
    return loadConfig({ ...process.env, ...overrides });
  } catch (e) {
    if (!(e instanceof ConfigurationError)) throw e;
    console.error(e.message);
    console.error('Run: task-replica-bridge doctor');
    process.exitCode = 2;
    return undefined;
  }
}

function printResult(result: SyncResult, timeZone: string, format: string) {
  const tasks = overviewTasks(result.tasks).map((t) => toApiTask(t, timeZone));
  if (format === 'json') {
    console.log(JSON.stringify({ ...result, tasks }, null, 2));
    return;
  }

  console.log('task-replica-bridge sync');
  console.log(`success: ${result.success}${result.success ? '' : ` (${result.reason})`}`);
  console.log(`source: ${result.source}`);
  console.log(`lastSuccessAt: ${formatTimestamp(result.lastSuccessAt, timeZone) ?? '(never)'}`);
  console.log(`tasks: ${result.tasks.length} (${tasks.length} pending)`);
  for (const t of tasks) {
    const project = t.project ? `[${t.project}] ` : '';
    console.log(`- ${t.short_id} ${project}${t.description}${t.active ? ' (active)' : ''}`);
  }
}

program
  .command('doctor')
  .description('Check environment/config and print what is missing')
  .action(() => {
    const report = doctorReport();
    console.log('task-replica-bridge doctor');
    if (report.missing.length) {
      console.log('\nMissing env vars:');
      for (const k of report.missing) console.log(`- ${k}`);
    }
    if (report.invalid.length) {
      console.log('\nInvalid values:');
      for (const k of report.invalid) console.log(`- ${k}`);
    }
    if (!report.missing.length && !report.invalid.length) console.log('\nConfiguration looks complete.');

    if (report.notes.length) {
      console.log('\nNotes:');
      for (const n of report.notes) console.log(`- ${n}`);
    }

    if (report.missing.length || report.invalid.length) process.exitCode = 2;
  });

program
  .command('serve')
  .description('Serve /overview, /tasks and /health over HTTP')
  .option('--port <port>', 'Override PORT')
  .option('--host <host>', 'Override HOST')
  .action(async (opts: { port?: string; host?: string }) => {
    const config = configOrExit({
      ...(opts.port !== undefined ? { PORT: opts.port } : {}),
      ...(opts.host !== undefined ? { HOST: opts.host } : {}),
    });
    if (!config) return;

    const bridge = createBridge(config);
    const running = await startServer(bridge, { host: config.host, port: config.port });
    bridge.logger.info(`listening on ${running.url}`, { authRequired: config.authSecret.length > 0 });

    const shutdown = async (signal: string) => {
      bridge.logger.info(`${signal} received, shutting down`);
      await running.close();
      await bridge.coordinator.close();
    };
    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      process.once(signal, () => {
        shutdown(signal).catch((e: unknown) => {
          bridge.logger.error('shutdown failed', e);
          process.exitCode = 1;
        });
      });
    }
  });

program
  .command('sync')
  .description('Run one synchronization and print the overview')
  .option('--data-dir <dir>', 'Override DATA_DIR')
  .option('--format <format>', 'Output format: pretty|json', 'pretty')
  .action(async (opts: { dataDir?: string; format?: string }) => {
    const config = configOrExit(opts.dataDir ? { DATA_DIR: path.resolve(opts.dataDir) } : {});
    if (!config) return;

    const bridge = createBridge(config);
    const result = await bridge.coordinator.syncAndFetch();
    printResult(result, config.displayTimeZone, opts.format ?? 'pretty');
    await bridge.coordinator.close();
    if (!result.success) process.exitCode = 1;
  });

program
  .command('mock')
  .description('Sync a throwaway JSON replica against an in-memory server (for demos/tests)')
  .option('--format <format>', 'Output format: pretty|json', 'pretty')
  .action(async (opts: { format?: string }) => {
    const logger = createLogger('info');
    const server = new MemorySyncServer();
    const clientId = 'mock-client';
    const secret = 'mock-secret';
    const now = new Date();
    const stamp = (minutesAgo: number) => new Date(now.getTime() - minutesAgo * 60_000).toISOString();
    server.seed(clientId, secret, [
      { uuid: '0d9f3c1e-6a55-4f1e-9d0e-3b7c2a1f4e01', status: 'pending', description: 'Water the plants', project: 'home', entry: stamp(120), modified: stamp(120) },
      { uuid: '5b2e8a47-1c3d-4b6f-8e9a-0f1d2c3b4a02', status: 'pending', description: 'Draft quarterly notes', project: 'work', entry: stamp(90), modified: stamp(5), start: stamp(5) },
      { uuid: 'a7c4e2f1-9b8d-4c3a-b2e1-d0f9e8c7b603', status: 'completed', description: 'Book dentist', entry: stamp(300), modified: stamp(60), end: stamp(60) },
    ]);

    const dataDir = await mkdtemp(path.join(os.tmpdir(), 'task-replica-bridge-'));
    const bridge = createBridge(
      {
        dataDir,
        syncServerUrl: server.url,
        clientId,
        encryptionSecret: secret,
        syncTimeoutSeconds: 5,
        minSyncIntervalSeconds: 10,
        taskwarriorBin: 'task',
        authSecret: '',
        host: '127.0.0.1',
        port: 0,
        displayTimeZone: 'Europe/Zurich',
        logLevel: 'info',
      },
      { store: new JsonReplicaStore(server), logger },
    );

    logger.info('mock sync start', { dataDir });
    const result = await bridge.coordinator.syncAndFetch();
    printResult(result, 'Europe/Zurich', opts.format ?? 'pretty');
    await bridge.coordinator.close();
  });

program.parseAsync(process.argv).catch((err) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});

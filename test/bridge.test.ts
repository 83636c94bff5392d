import { describe, expect, it } from 'vitest';
import path from 'node:path';
import os from 'node:os';
import { mkdtemp } from 'node:fs/promises';
import { createBridge } from '../src/bridge.js';
import { loadConfig } from '../src/config.js';
import { createLogger, type LogSink } from '../src/log.js';
import { JsonReplicaStore, MemorySyncServer } from '../src/replica/jsonReplica.js';

describe('createBridge', () => {
  it('wires a coordinator to the given store and logs the config without the secret', async () => {
    const dataDir = await mkdtemp(path.join(os.tmpdir(), 'replica-bridge-'));
    const server = new MemorySyncServer();
    server.seed('client-0001-abcdef', 'test-secret', [{ uuid: 'u1', status: 'pending', description: 'one' }]);
    const config = loadConfig(
      {
        TASKCHAMPION_SYNC_SERVER_URL: 'https://sync.example.test',
        TASKCHAMPION_CLIENT_ID: 'client-0001-abcdef',
        TASKCHAMPION_ENCRYPTION_SECRET: 'test-secret',
        DATA_DIR: dataDir,
      },
      path.join(dataDir, 'no-secret-file'),
    );
    const lines: string[] = [];
    const sink: LogSink = { out: (l) => lines.push(l), err: (l) => lines.push(l) };

    const bridge = createBridge(
      { ...config, syncServerUrl: server.url },
      { store: new JsonReplicaStore(server), logger: createLogger('info', sink) },
    );
    const result = await bridge.coordinator.syncAndFetch();
    await bridge.coordinator.close();

    expect(result).toMatchObject({ success: true, source: 'synced' });
    expect(result.tasks.map((t) => t.uuid)).toEqual(['u1']);
    expect(lines[0]).toContain('replica bridge configured');
    expect(lines[0]).toContain('"clientId":"client-0..."');
    expect(lines.join('\n')).not.toContain('test-secret');
  });
});

import { execFile } from 'node:child_process';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { promisify } from 'node:util';
import type { NativeEntry } from '../model.js';
import { errorMessage, ReplicaError, SyncError } from '../errors.js';
import { createLogger, type Logger } from '../log.js';
import type { ReplicaHandle, ReplicaStore } from './store.js';

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  bin: string,
  args: string[],
  opts: { env: NodeJS.ProcessEnv; timeoutMs?: number },
) => Promise<CommandOutput>;

const execFileAsync = promisify(execFile);

export const execRunner: CommandRunner = async (bin, args, opts) => {
  try {
    const { stdout, stderr } = await execFileAsync(bin, args, {
      env: opts.env,
      timeout: opts.timeoutMs,
      maxBuffer: 64 * 1024 * 1024,
      encoding: 'utf8',
    });
    return { stdout, stderr };
  } catch (e) {
    // execFile puts the interesting part (task's own message) on stderr
    const stderr = e instanceof Error && 'stderr' in e && typeof e.stderr === 'string' ? e.stderr.trim() : '';
    const msg = errorMessage(e).split('\n')[0];
    throw new Error(stderr ? `${msg}: ${stderr}` : msg, { cause: e });
  }
};

export interface TaskwarriorReplicaStoreOptions {
  /** Path or name of the Taskwarrior 3 executable. */
  bin?: string;
  /** Inject a runner for tests. */
  runner?: CommandRunner;
  /** Kill a single `task` process after this long. */
  commandTimeoutMs?: number;
  logger?: Logger;
}

const RC_FILE = '.bridge-taskrc';

// Never let a stray ~/.taskrc, hooks or prompts leak into a headless replica.
const BASE_OVERRIDES = ['rc.hooks=off', 'rc.confirmation=off', 'rc.gc=off', 'rc.json.array=on'];

function rcLine(key: string, value: string) {
  if (/[\r\n]/.test(value)) throw new Error(`${key} must not contain newlines`);
  return `${key}=${value}\n`;
}

class TaskwarriorHandle implements ReplicaHandle {
  constructor(
    readonly dataDir: string,
    private readonly bin: string,
    private readonly runner: CommandRunner,
    private readonly logger: Logger,
    private readonly commandTimeoutMs?: number,
  ) {}

  private args(...rest: string[]) {
    return [`rc.data.location=${this.dataDir}`, ...BASE_OVERRIDES, ...rest];
  }

  async readAll(): Promise<NativeEntry[]> {
    let out: CommandOutput;
    try {
      out = await this.runner(this.bin, this.args('export'), {
        env: { ...process.env, TASKRC: '/dev/null' },
        timeoutMs: this.commandTimeoutMs,
      });
    } catch (e) {
      throw new ReplicaError(`task export failed in ${this.dataDir}`, this.dataDir, { cause: e });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(out.stdout.trim() || '[]');
    } catch (e) {
      throw new ReplicaError(`task export returned invalid JSON`, this.dataDir, { cause: e });
    }
    if (!Array.isArray(parsed)) {
      throw new ReplicaError('task export did not return an array', this.dataDir);
    }
    const entries = parsed.filter(
      (x): x is NativeEntry => typeof x === 'object' && x !== null && !Array.isArray(x),
    );
    if (entries.length < parsed.length) {
      this.logger.warn('task export returned non-object items; skipped', {
        dataDir: this.dataDir,
        skipped: parsed.length - entries.length,
      });
    }
    return entries;
  }

  async synchronize(remoteUrl: string, clientId: string, secret: string, avoidSnapshots: boolean): Promise<void> {
    if (avoidSnapshots) {
      throw new ReplicaError('the task CLI cannot sync with snapshot avoidance', this.dataDir);
    }

    // Secrets go through a private rc file rather than argv, where ps would show them.
    const rcPath = path.join(this.dataDir, RC_FILE);
    await writeFile(
      rcPath,
      rcLine('sync.server.url', remoteUrl) +
        rcLine('sync.server.client_id', clientId) +
        rcLine('sync.encryption_secret', secret),
      { mode: 0o600 },
    );
    try {
      await this.runner(this.bin, this.args('sync'), {
        env: { ...process.env, TASKRC: rcPath },
        timeoutMs: this.commandTimeoutMs,
      });
    } catch (e) {
      throw new SyncError(`task sync failed: ${errorMessage(e)}`, 1, { cause: e });
    } finally {
      await rm(rcPath, { force: true });
    }
  }
}

/** Replica backed by a Taskwarrior 3 data directory, driven through the `task` CLI. */
export class TaskwarriorReplicaStore implements ReplicaStore {
  readonly kind = 'taskwarrior';
  private readonly bin: string;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(private readonly opts: TaskwarriorReplicaStoreOptions = {}) {
    this.bin = opts.bin ?? 'task';
    this.runner = opts.runner ?? execRunner;
    this.logger = (opts.logger ?? createLogger('silent')).child('taskwarrior');
  }

  async openOrCreate(dataDir: string): Promise<ReplicaHandle> {
    try {
      await mkdir(dataDir, { recursive: true });
    } catch (e) {
      throw new ReplicaError(`cannot create replica directory ${dataDir}`, dataDir, { cause: e });
    }
    return new TaskwarriorHandle(dataDir, this.bin, this.runner, this.logger, this.opts.commandTimeoutMs);
  }
}

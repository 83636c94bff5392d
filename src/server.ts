import http from 'node:http';
import { once } from 'node:events';
import { createHash, timingSafeEqual } from 'node:crypto';
import { requiresAuth, type BridgeConfig } from './config.js';
import type { Logger } from './log.js';
import { TASK_STATUSES, type TaskStatus } from './model.js';
import type { SyncCoordinator } from './sync/coordinator.js';
import { filterTasks, formatTimestamp, overviewTasks, syncMeta, toApiTask } from './format.js';

export interface ServerDeps {
  coordinator: Pick<SyncCoordinator, 'syncAndFetch' | 'lastSuccessfulSyncTime' | 'status'>;
  config: Pick<BridgeConfig, 'authSecret' | 'displayTimeZone' | 'dataDir'>;
  logger: Logger;
}

class HttpProblem extends Error {
  constructor(
    public readonly status: number,
    message: string,
  ) {
    super(message);
  }
}

const ROUTES = new Set(['/overview', '/tasks', '/health']);

const CORS_HEADERS = {
  'access-control-allow-origin': '*',
  'access-control-allow-methods': 'GET, OPTIONS',
  'access-control-allow-headers': 'authorization, content-type',
};

function sendJson(res: http.ServerResponse, status: number, body: unknown) {
  res.writeHead(status, { 'content-type': 'application/json; charset=utf-8', ...CORS_HEADERS });
  res.end(JSON.stringify(body));
}

const digest = (s: string) => createHash('sha256').update(s).digest();

/** Bearer token check; a no-op when no secret is configured. */
export function checkAuth(header: string | undefined, config: Pick<BridgeConfig, 'authSecret'>): void {
  if (!requiresAuth(config)) return;
  if (!header?.startsWith('Bearer ')) {
    throw new HttpProblem(401, 'Missing or invalid Authorization header');
  }
  // equal-length digests so the comparison time does not leak the secret length
  if (!timingSafeEqual(digest(header.slice('Bearer '.length)), digest(config.authSecret))) {
    throw new HttpProblem(401, 'Invalid authentication token');
  }
}

function parseStatus(raw: string | null): TaskStatus | undefined {
  if (raw === null || raw === '') return undefined;
  const found = TASK_STATUSES.find((s) => s === raw);
  if (!found) throw new HttpProblem(400, `status must be one of: ${TASK_STATUSES.join(', ')}`);
  return found;
}

export function createHandler(deps: ServerDeps) {
  const { coordinator, config, logger } = deps;
  const tz = config.displayTimeZone;

  async function route(req: http.IncomingMessage, res: http.ServerResponse, url: URL) {
    if (!ROUTES.has(url.pathname)) throw new HttpProblem(404, 'Not found');
    if (req.method !== 'GET') throw new HttpProblem(405, 'Method not allowed');

    if (url.pathname === '/health') {
      // liveness must never trigger a sync
      const status = coordinator.status();
      sendJson(res, 200, {
        status: 'healthy',
        last_sync_at: formatTimestamp(coordinator.lastSuccessfulSyncTime(), tz),
        replica_path: config.dataDir,
        consecutive_failures: status.consecutiveFailures,
      });
      return;
    }

    checkAuth(req.headers.authorization, config);
    const filter =
      url.pathname === '/tasks'
        ? { status: parseStatus(url.searchParams.get('status')), project: url.searchParams.get('project') ?? undefined }
        : undefined;

    const started = Date.now();
    const result = await coordinator.syncAndFetch();
    const durationMs = Date.now() - started;

    const tasks = filter ? filterTasks(result.tasks, filter) : overviewTasks(result.tasks);
    sendJson(res, 200, {
      meta: syncMeta(result, durationMs, tz),
      tasks: tasks.map((t) => toApiTask(t, tz)),
    });
  }

  return async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    const started = Date.now();
    const url = new URL(req.url ?? '/', 'http://localhost');
    res.on('finish', () => {
      logger.info(`${req.method} ${url.pathname} -> ${res.statusCode} (${Date.now() - started}ms)`);
    });

    if (req.method === 'OPTIONS') {
      res.writeHead(204, CORS_HEADERS);
      res.end();
      return;
    }

    try {
      await route(req, res, url);
    } catch (e) {
      if (e instanceof HttpProblem) {
        sendJson(res, e.status, { error: e.message });
        return;
      }
      logger.error(`unhandled error for ${req.method} ${url.pathname}`, e);
      if (!res.headersSent) sendJson(res, 500, { error: 'Internal error' });
      else res.end();
    }
  };
}

export interface RunningServer {
  server: http.Server;
  url: string;
  close(): Promise<void>;
}

export async function startServer(deps: ServerDeps, opts: { host: string; port: number }): Promise<RunningServer> {
  const handler = createHandler(deps);
  const server = http.createServer((req, res) => {
    handler(req, res).catch((e: unknown) => deps.logger.error('request handler crashed', e));
  });
  server.listen(opts.port, opts.host);
  await once(server, 'listening');

  const addr = server.address();
  if (addr === null || typeof addr === 'string') throw new Error('server is not listening on a TCP port');
  const host = opts.host === '0.0.0.0' ? '127.0.0.1' : opts.host;
  return {
    server,
    url: `http://${host}:${addr.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      }),
  };
}

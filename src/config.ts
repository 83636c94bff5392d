import { z } from 'zod';
import { readSecretFile, type EnvLike } from './env.js';
import { ConfigurationError } from './errors.js';
import { LOG_LEVELS } from './log.js';

const str = z.string().min(1);

export const DEFAULT_DATA_DIR = '/data/replica';
export const DEFAULT_SECRET_PATH = '/run/secrets/taskchampion_encryption_secret';

function isTimeZone(tz: string) {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

export const EnvSchema = z.object({
  // remote replica
  TASKCHAMPION_SYNC_SERVER_URL: z.string().url(),
  TASKCHAMPION_CLIENT_ID: str,
  TASKCHAMPION_ENCRYPTION_SECRET: str.optional(),
  TASKCHAMPION_ENCRYPTION_SECRET_FILE: str.optional(),

  // local replica + sync behavior
  DATA_DIR: str.default(DEFAULT_DATA_DIR),
  SYNC_TIMEOUT_SECONDS: z.coerce.number().positive().default(30),
  MIN_SYNC_INTERVAL_SECONDS: z.coerce.number().nonnegative().default(10),
  TASKWARRIOR_BIN: str.default('task'),

  // http
  AUTH_SECRET: z.string().default(''),
  HOST: str.default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  DISPLAY_TIMEZONE: str.refine(isTimeZone, 'must be an IANA time zone').default('Europe/Zurich'),

  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export interface BridgeConfig {
  dataDir: string;
  syncServerUrl: string;
  clientId: string;
  encryptionSecret: string;
  syncTimeoutSeconds: number;
  minSyncIntervalSeconds: number;
  taskwarriorBin: string;
  /** Empty string disables auth. */
  authSecret: string;
  host: string;
  port: number;
  displayTimeZone: string;
  logLevel: EnvConfig['LOG_LEVEL'];
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join('.') || '(env)'}: ${i.message}`);
}

/**
 * Validate the environment into an immutable config. Every problem is
 * reported at once via {@link ConfigurationError}.
 */
export function loadConfig(env: EnvLike = process.env, secretPath = DEFAULT_SECRET_PATH): Readonly<BridgeConfig> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid configuration', formatIssues(parsed.error));
  }
  const e = parsed.data;

  const encryptionSecret =
    e.TASKCHAMPION_ENCRYPTION_SECRET ?? readSecretFile(e.TASKCHAMPION_ENCRYPTION_SECRET_FILE ?? secretPath);
  if (!encryptionSecret) {
    throw new ConfigurationError('Invalid configuration', [
      'TASKCHAMPION_ENCRYPTION_SECRET: not set and no secret file found',
    ]);
  }

  return Object.freeze({
    dataDir: e.DATA_DIR,
    syncServerUrl: e.TASKCHAMPION_SYNC_SERVER_URL,
    clientId: e.TASKCHAMPION_CLIENT_ID,
    encryptionSecret,
    syncTimeoutSeconds: e.SYNC_TIMEOUT_SECONDS,
    minSyncIntervalSeconds: e.MIN_SYNC_INTERVAL_SECONDS,
    taskwarriorBin: e.TASKWARRIOR_BIN,
    authSecret: e.AUTH_SECRET,
    host: e.HOST,
    port: e.PORT,
    displayTimeZone: e.DISPLAY_TIMEZONE,
    logLevel: e.LOG_LEVEL,
  });
}

export function requiresAuth(config: Pick<BridgeConfig, 'authSecret'>): boolean {
  return config.authSecret.length > 0;
}

export function doctorReport(env: EnvLike = process.env, secretPath = DEFAULT_SECRET_PATH) {
  const missing: string[] = [];
  const invalid: string[] = [];
  const notes: string[] = [];

  if (!env.TASKCHAMPION_SYNC_SERVER_URL) missing.push('TASKCHAMPION_SYNC_SERVER_URL');
  if (!env.TASKCHAMPION_CLIENT_ID) missing.push('TASKCHAMPION_CLIENT_ID');
  if (
    !env.TASKCHAMPION_ENCRYPTION_SECRET &&
    !readSecretFile(env.TASKCHAMPION_ENCRYPTION_SECRET_FILE ?? secretPath)
  ) {
    missing.push('TASKCHAMPION_ENCRYPTION_SECRET');
  }

  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    for (const issue of formatIssues(parsed.error)) {
      if (!missing.some((k) => issue.startsWith(`${k}:`))) invalid.push(issue);
    }
  }

  if (!env.AUTH_SECRET) notes.push('AUTH_SECRET not set: /overview and /tasks are served without auth.');
  notes.push(`DATA_DIR: ${env.DATA_DIR ?? DEFAULT_DATA_DIR}`);

  return {
    missing: [...new Set(missing)],
    invalid,
    notes,
  };
}

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const satisfies readonly LogLevel[];

const ORDER: Record<Exclude<LogLevel, 'silent'>, number> = {
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export interface Logger {
  error(msg: string, meta?: unknown): void;
  warn(msg: string, meta?: unknown): void;
  info(msg: string, meta?: unknown): void;
  debug(msg: string, meta?: unknown): void;
  /** Same sink and level, messages tagged with `[scope]`. */
  child(scope: string): Logger;
}

export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function fmtMeta(meta: unknown) {
  if (meta === undefined) return '';
  if (typeof meta === 'string') return ` ${meta}`;
  if (meta instanceof Error) return ` ${meta.name}: ${meta.message}`;
  try {
    return ` ${JSON.stringify(meta, (_k, v: unknown) => (v instanceof Error ? `${v.name}: ${v.message}` : v))}`;
  } catch {
    return ' [meta-unserializable]';
  }
}

/** First 8 characters, enough to tell client ids apart in logs. */
export function redactId(id: string): string {
  return id.length > 8 ? `${id.slice(0, 8)}...` : id;
}

export function createLogger(level: LogLevel = 'info', sink: LogSink = consoleSink, scope?: string): Logger {
  if (level === 'silent') {
    const silent: Logger = {
      error: () => {},
      warn: () => {},
      info: () => {},
      debug: () => {},
      child: () => silent,
    };
    return silent;
  }

  const threshold = ORDER[level];
  const tag = scope ? `[${scope}] ` : '';
  const prefix = (lvl: string) => `${new Date().toISOString()} ${lvl.toUpperCase()} ${tag}`;

  const can = (lvl: Exclude<LogLevel, 'silent'>) => ORDER[lvl] <= threshold;

  return {
    error: (msg, meta) => {
      if (can('error')) sink.err(prefix('error') + msg + fmtMeta(meta));
    },
    warn: (msg, meta) => {
      if (can('warn')) sink.err(prefix('warn') + msg + fmtMeta(meta));
    },
    info: (msg, meta) => {
      if (can('info')) sink.out(prefix('info') + msg + fmtMeta(meta));
    },
    debug: (msg, meta) => {
      if (can('debug')) sink.out(prefix('debug') + msg + fmtMeta(meta));
    },
    child: (name) => createLogger(level, sink, scope ? `${scope}:${name}` : name),
  };
}

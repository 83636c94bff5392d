import type { SyncResult, TaskRecord, TaskStatus } from './model.js';

export interface ApiTaskTimestamps {
  entry: string | null;
  modified: string | null;
  scheduled: string | null;
  start: string | null;
  wait: string | null;
}

/** Task as served over HTTP (snake_case, timestamps in the display zone). */
export interface ApiTask {
  uuid: string;
  short_id: string;
  description: string;
  status: TaskStatus;
  project: string | null;
  tags: string[];
  /** Sorted tags joined by ",", for deterministic client-side sorting. */
  tags_sort_key: string;
  active: boolean;
  timestamps: ApiTaskTimestamps;
}

export interface SyncMeta {
  sync_ok: boolean;
  stale: boolean;
  last_sync_at: string | null;
  duration_ms: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string) {
  let f = formatters.get(timeZone);
  if (!f) {
    f = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatters.set(timeZone, f);
  }
  return f;
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

/**
 * ISO 8601 with the zone's UTC offset at that instant, e.g.
 * `2024-01-31T13:00:00+01:00`. Sub-second precision is dropped.
 */
export function formatTimestamp(date: Date | undefined, timeZone: string): string | null {
  if (!date) return null;

  const parts: Record<string, number> = {};
  for (const p of formatterFor(timeZone).formatToParts(date)) {
    if (p.type !== 'literal') parts[p.type] = Number(p.value);
  }
  const { year = 0, month = 1, day = 1, hour = 0, minute = 0, second = 0 } = parts;

  const wholeSeconds = Math.floor(date.getTime() / 1000) * 1000;
  const offsetMin = Math.round((Date.UTC(year, month - 1, day, hour, minute, second) - wholeSeconds) / 60_000);
  const sign = offsetMin < 0 ? '-' : '+';
  const abs = Math.abs(offsetMin);

  return (
    `${pad(year, 4)}-${pad(month)}-${pad(day)}T${pad(hour)}:${pad(minute)}:${pad(second)}` +
    `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`
  );
}

export function toApiTask(t: TaskRecord, timeZone: string): ApiTask {
  const tags = [...t.tags];
  return {
    uuid: t.uuid,
    short_id: t.uuid.slice(0, 8),
    description: t.description,
    status: t.status,
    project: t.project ?? null,
    tags,
    tags_sort_key: [...tags].sort().join(','),
    active: t.active,
    timestamps: {
      entry: formatTimestamp(t.entry, timeZone),
      modified: formatTimestamp(t.modified, timeZone),
      scheduled: formatTimestamp(t.scheduled, timeZone),
      start: formatTimestamp(t.start, timeZone),
      wait: formatTimestamp(t.wait, timeZone),
    },
  };
}

/** Project first (no project sorts first), then entry time, then uuid. */
export function compareTasks(a: TaskRecord, b: TaskRecord): number {
  const pa = a.project ?? '';
  const pb = b.project ?? '';
  if (pa !== pb) return pa < pb ? -1 : 1;
  const ea = a.entry?.getTime() ?? 0;
  const eb = b.entry?.getTime() ?? 0;
  if (ea !== eb) return ea - eb;
  return a.uuid < b.uuid ? -1 : a.uuid > b.uuid ? 1 : 0;
}

export interface TaskFilter {
  status?: TaskStatus;
  project?: string;
}

export function filterTasks(tasks: readonly TaskRecord[], filter: TaskFilter = {}): TaskRecord[] {
  return tasks
    .filter((t) => (filter.status ? t.status === filter.status : true))
    .filter((t) => (filter.project !== undefined ? t.project === filter.project : true))
    .sort(compareTasks);
}

/** The overview report: pending tasks only. */
export function overviewTasks(tasks: readonly TaskRecord[]): TaskRecord[] {
  return filterTasks(tasks, { status: 'pending' });
}

export function syncMeta(result: SyncResult, durationMs: number, timeZone: string): SyncMeta {
  return {
    sync_ok: result.success,
    stale: !result.success,
    last_sync_at: formatTimestamp(result.lastSuccessAt, timeZone),
    duration_ms: durationMs,
  };
}

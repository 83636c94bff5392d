import { z } from 'zod';
import { TASK_STATUSES, type NativeEntry, type TaskRecord, type TaskStatus } from '../model.js';
import { errorMessage } from '../errors.js';
import type { Logger } from '../log.js';

const KNOWN = new Set<string>(TASK_STATUSES);

function isTaskStatus(v: string): v is TaskStatus {
  return KNOWN.has(v);
}

/**
 * Exact match first; otherwise tolerate casing, whitespace and enum-ish
 * renderings such as `Status.Pending` before giving up with `unknown`.
 */
export function mapStatus(raw: unknown): TaskStatus {
  if (typeof raw !== 'string') return 'unknown';
  if (isTaskStatus(raw)) return raw;

  const cleaned = raw.trim().toLowerCase().replace(/^status[.:]/, '');
  if (isTaskStatus(cleaned)) return cleaned;
  for (const s of TASK_STATUSES) {
    if (s !== 'unknown' && cleaned.startsWith(s)) return s;
  }
  return 'unknown';
}

// 20240131T120000Z, as written by `task export`
const COMPACT_UTC = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})Z$/;

function fromEpochSeconds(seconds: number, raw: unknown): Date {
  const d = new Date(seconds * 1000);
  // out of Date's range (about ±8.64e12 s) yields an Invalid Date
  if (Number.isNaN(d.getTime())) throw new Error(`epoch timestamp out of range: ${String(raw)}`);
  return d;
}

/** Compact Taskwarrior form, ISO 8601, or epoch seconds. */
export function parseTimestamp(raw: unknown): Date | undefined {
  if (raw === undefined || raw === null || raw === '') return undefined;

  if (typeof raw === 'number') {
    if (!Number.isFinite(raw)) throw new Error(`invalid epoch timestamp: ${raw}`);
    return fromEpochSeconds(raw, raw);
  }
  if (typeof raw !== 'string') throw new Error(`invalid timestamp type: ${typeof raw}`);

  const compact = COMPACT_UTC.exec(raw);
  if (compact) {
    const [, y, mo, d, h, mi, s] = compact.map(Number);
    return new Date(Date.UTC(y, mo - 1, d, h, mi, s));
  }
  if (/^\d+(\.\d+)?$/.test(raw)) return fromEpochSeconds(Number(raw), raw);

  const ms = Date.parse(raw);
  if (Number.isNaN(ms)) throw new Error(`unparseable timestamp: ${raw}`);
  return new Date(ms);
}

const EntrySchema = z.object({
  uuid: z.string().min(1),
  status: z.unknown(),
  description: z.string().default(''),
  project: z.string().nullish(),
  tags: z.array(z.string()).default([]),
});

export function toTaskRecord(native: NativeEntry): TaskRecord {
  const base = EntrySchema.parse(native);
  const status = mapStatus(base.status);
  const start = parseTimestamp(native.start);
  const end = parseTimestamp(native.end);

  return Object.freeze({
    uuid: base.uuid,
    status,
    description: base.description,
    project: base.project || undefined,
    tags: Object.freeze([...base.tags]),
    entry: parseTimestamp(native.entry),
    modified: parseTimestamp(native.modified),
    scheduled: parseTimestamp(native.scheduled),
    start,
    wait: parseTimestamp(native.wait),
    end,
    active: start !== undefined && end === undefined && status !== 'completed',
  });
}

/** One bad entry is logged and skipped; the rest of the read survives. */
export function readTaskRecords(entries: readonly NativeEntry[], logger: Logger): TaskRecord[] {
  const out: TaskRecord[] = [];
  let skipped = 0;
  for (const [i, entry] of entries.entries()) {
    try {
      out.push(toTaskRecord(entry));
    } catch (e) {
      skipped++;
      const uuid = typeof entry.uuid === 'string' ? entry.uuid : undefined;
      logger.warn('skipping malformed replica entry', { index: i, uuid, error: errorMessage(e) });
    }
  }
  if (skipped) logger.debug(`read ${out.length} tasks, skipped ${skipped}`);
  return out;
}

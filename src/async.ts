import { SyncTimeoutError } from './errors.js';

export const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export type Deadline<T> = { ok: true; value: T } | { ok: false; error: unknown; timedOut: boolean };

/**
 * Race `promise` against a timer. The promise is not cancelled on timeout:
 * whatever it settles to later goes to `onLate`, so a rejection is never
 * left unhandled.
 */
export function withDeadline<T>(
  promise: Promise<T>,
  ms: number,
  label: string,
  onLate: (outcome: Deadline<T>) => void = () => {},
): Promise<Deadline<T>> {
  return new Promise((resolve) => {
    let settled = false;
    const timer = setTimeout(() => {
      settled = true;
      resolve({ ok: false, error: new SyncTimeoutError(`${label} timed out after ${ms}ms`, ms), timedOut: true });
    }, ms);

    promise.then(
      (value) => {
        if (settled) return onLate({ ok: true, value });
        settled = true;
        clearTimeout(timer);
        resolve({ ok: true, value });
      },
      (error: unknown) => {
        if (settled) return onLate({ ok: false, error, timedOut: false });
        settled = true;
        clearTimeout(timer);
        resolve({ ok: false, error, timedOut: false });
      },
    );
  });
}

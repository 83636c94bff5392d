export class BridgeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid or missing configuration. Fatal at startup, never retried. */
export class ConfigurationError extends BridgeError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
  }
}

/** The local replica could not be opened, read or reset. */
export class ReplicaError extends BridgeError {
  constructor(
    message: string,
    public readonly dataDir: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The remote synchronize call failed after its retry budget. */
export class SyncError extends BridgeError {
  constructor(
    message: string,
    public readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class SyncTimeoutError extends BridgeError {
  constructor(
    message: string,
    public readonly timeoutMs: number,
  ) {
    super(message);
  }
}

const TRANSIENT_PATTERNS: readonly RegExp[] = [
  /synchroni[sz]e with (the )?server/i,
  /ECONNREFUSED|ECONNRESET|EAI_AGAIN|ETIMEDOUT|ENOTFOUND/,
  /connection (refused|reset|closed)/i,
  /timed out/i,
  /HTTP (429|5\d\d)\b/,
];

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Remote errors worth another try within the same attempt. */
export function isTransientSyncError(e: unknown): boolean {
  const msg = errorMessage(e);
  return TRANSIENT_PATTERNS.some((re) => re.test(msg));
}

import { readFileSync, existsSync } from 'node:fs';
import path from 'node:path';

export type EnvLike = Record<string, string | undefined>;

function unquote(value: string) {
  if (
    value.length >= 2 &&
    ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")))
  ) {
    return value.slice(1, -1);
  }
  return value;
}

/** Parse `KEY=VALUE` lines; comments, blanks and a leading `export ` are ignored. */
export function parseEnvFile(raw: string): Map<string, string> {
  const out = new Map<string, string>();
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;

    const body = trimmed.startsWith('export ') ? trimmed.slice('export '.length) : trimmed;
    const eq = body.indexOf('=');
    if (eq === -1) continue;
    const key = body.slice(0, eq).trim();
    if (!key) continue;
    out.set(key, unquote(body.slice(eq + 1).trim()));
  }
  return out;
}

/**
 * Load `.env` files into `env` without overriding keys that are already set,
 * so the real environment always wins.
 */
export function loadEnvFiles(
  filenames: string[] = ['.env', '.env.local'],
  cwd: string = process.cwd(),
  env: EnvLike = process.env,
): { loaded: string[] } {
  const loaded: string[] = [];

  for (const name of filenames) {
    const filePath = path.join(cwd, name);
    if (!existsSync(filePath)) continue;

    for (const [key, value] of parseEnvFile(readFileSync(filePath, 'utf8'))) {
      if (env[key] === undefined) env[key] = value;
    }
    loaded.push(name);
  }

  return { loaded };
}

/** Docker-style secret file: whole content, trailing newline dropped. */
export function readSecretFile(filePath: string): string | undefined {
  if (!existsSync(filePath)) return undefined;
  const value = readFileSync(filePath, 'utf8').replace(/\r?\n$/, '');
  return value || undefined;
}

/**
 * Store bootstrap: makes sure the SQLite file exists before any transport
 * starts. An existing file is verified, a missing one is downloaded from
 * `source` or created from a seed script. The result is a frozen
 * `ReadyStore`, the only handle the gateway accepts.
 */

import Database from 'better-sqlite3';
import { dirname } from 'path';
import { existsSync, mkdirSync, renameSync, rmSync, writeFileSync } from 'fs';
import type { Logger } from 'pino';
import { BootstrapError, errorMessage } from '../errors.js';

export type StoreOrigin = 'existing' | 'seeded' | 'downloaded';

export type ReadyStore = Readonly<{
  path: string;
  origin: StoreOrigin;
  busyTimeoutMs: number;
}>;

export type StoreInitResult =
  | { ok: true; store: ReadyStore }
  | { ok: false; error: BootstrapError };

export interface StoreInitOptions {
  path: string;
  /** URL of a prebuilt SQLite file, fetched when `path` is missing. */
  source?: string;
  /** SQL run against a fresh file instead of the sample schema. */
  seedSql?: string;
  busyTimeoutMs?: number;
  /** Abort the download of `source` after this long. */
  downloadTimeoutMs?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

const SQLITE_HEADER = 'SQLite format 3\0';

// Inline seed (TypeScript doesn't copy .sql files to dist/)
export const SAMPLE_SEED = `
CREATE TABLE IF NOT EXISTS users (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL,
  email TEXT UNIQUE NOT NULL,
  created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);
CREATE TABLE IF NOT EXISTS posts (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id INTEGER,
  title TEXT NOT NULL,
  content TEXT,
  created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
  FOREIGN KEY (user_id) REFERENCES users (id)
);
INSERT INTO users (name, email) VALUES ('John Doe', 'john@example.com');
INSERT INTO users (name, email) VALUES ('Jane Smith', 'jane@example.com');
INSERT INTO posts (user_id, title, content) VALUES (1, 'First Post', 'This is my first post!');
INSERT INTO posts (user_id, title, content) VALUES (2, 'Hello World', 'Hello from Jane!');
`;

export async function initializeStore(opts: StoreInitOptions): Promise<StoreInitResult> {
  const busyTimeoutMs = opts.busyTimeoutMs ?? 5000;

  try {
    let origin: StoreOrigin;
    if (existsSync(opts.path)) {
      origin = 'existing';
    } else if (opts.source) {
      await download(opts.path, opts.source, opts.fetch ?? fetch, opts.downloadTimeoutMs ?? 30_000);
      origin = 'downloaded';
    } else {
      seed(opts.path, opts.seedSql ?? SAMPLE_SEED);
      origin = 'seeded';
    }

    verify(opts.path);

    const store: ReadyStore = Object.freeze({ path: opts.path, origin, busyTimeoutMs });
    opts.logger?.info({ path: store.path, origin }, 'store ready');
    return { ok: true, store };
  } catch (err: unknown) {
    const error = err instanceof BootstrapError
      ? err
      : new BootstrapError(opts.path, `Failed to initialize database: ${errorMessage(err)}`, { cause: err });
    opts.logger?.error({ path: opts.path, err: error }, 'store bootstrap failed');
    return { ok: false, error };
  }
}

function ensureDir(path: string): void {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

function seed(path: string, sql: string): void {
  ensureDir(path);

  const db = new Database(path);
  try {
    db.transaction(() => db.exec(sql))();
  } catch (err: unknown) {
    db.close();
    rmSync(path, { force: true });
    throw new BootstrapError(path, `Seed script failed: ${errorMessage(err)}`, { cause: err });
  }
  db.close();
}

async function download(path: string, source: string, fetchImpl: typeof fetch, timeoutMs: number): Promise<void> {
  const signal = AbortSignal.timeout(timeoutMs);
  let body: Buffer;
  try {
    const res = await fetchImpl(source, { signal });
    if (!res.ok) {
      throw new BootstrapError(path, `Download from ${source} failed with status ${res.status}`);
    }
    body = Buffer.from(await res.arrayBuffer());
  } catch (err: unknown) {
    if (signal.aborted) {
      throw new BootstrapError(path, `Download from ${source} timed out after ${timeoutMs}ms`, { cause: err });
    }
    throw err;
  }

  if (body.subarray(0, SQLITE_HEADER.length).toString('latin1') !== SQLITE_HEADER) {
    throw new BootstrapError(path, `Download from ${source} is not a SQLite database`);
  }

  ensureDir(path);
  const partial = `${path}.download`;
  try {
    writeFileSync(partial, body);
    renameSync(partial, path);
  } catch (err: unknown) {
    rmSync(partial, { force: true });
    throw err;
  }
}

/** Opens read-only and touches the catalog so a corrupt file fails here, not on the first call. */
function verify(path: string): void {
  let db: Database.Database | undefined;
  try {
    db = new Database(path, { readonly: true, fileMustExist: true });
    db.prepare('SELECT count(*) FROM sqlite_master').get();
  } catch (err: unknown) {
    throw new BootstrapError(path, `Not a usable SQLite database: ${errorMessage(err)}`, { cause: err });
  } finally {
    db?.close();
  }
}

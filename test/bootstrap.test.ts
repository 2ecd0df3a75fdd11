import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { initializeStore } from '../src/db/bootstrap.js';
import { BootstrapError } from '../src/errors.js';
import { QueryGateway } from '../src/gateway.js';
import { makeTempDir, removeTempDir, silentLogger } from './helpers.js';

const SOURCE = 'https://example.test/dataset.db';

const renameFault = vi.hoisted(() => ({ enabled: false }));

vi.mock('fs', async importOriginal => {
  const actual = await importOriginal<typeof import('fs')>();
  return {
    ...actual,
    renameSync: (from: string, to: string) => {
      if (renameFault.enabled) throw new Error('EXDEV: cross-device link not permitted');
      actual.renameSync(from, to);
    },
  };
});

describe('initializeStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    renameFault.enabled = false;
    removeTempDir(dir);
  });

  it('seeds a missing file with the sample schema, creating parent directories', async () => {
    const path = join(dir, 'nested', 'data', 'sample.db');
    const result = await initializeStore({ path, logger: silentLogger });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.store).toEqual({ path, origin: 'seeded', busyTimeoutMs: 5000 });
    expect(Object.isFrozen(result.store)).toBe(true);

    const gateway = new QueryGateway(result.store);
    const outcome = await gateway.execute('SELECT count(*) AS n FROM posts');
    expect(outcome.ok && outcome.rows).toEqual([{ n: 2 }]);
  });

  it('leaves an existing file alone', async () => {
    const path = join(dir, 'existing.db');
    await initializeStore({ path, seedSql: 'CREATE TABLE only_this (id INTEGER);' });

    const result = await initializeStore({ path });
    expect(result.ok && result.store.origin).toBe('existing');
    if (!result.ok) return;
    expect(await new QueryGateway(result.store).listTables()).toEqual(['only_this']);
  });

  it('removes the file and fails when the seed script breaks', async () => {
    const path = join(dir, 'broken.db');
    const result = await initializeStore({ path, seedSql: 'CREATE TABLE ok (id INTEGER); CREATE TABLE (' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(BootstrapError);
    expect(result.error.path).toBe(path);
    expect(result.error.message).toMatch(/^Seed script failed: /);
    expect(existsSync(path)).toBe(false);
  });

  it('fails on a file that is not a SQLite database', async () => {
    const path = join(dir, 'notes.db');
    writeFileSync(path, 'these are plain text notes, not a database\n'.repeat(50));

    const result = await initializeStore({ path });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toMatch(/^Not a usable SQLite database: /);
  });

  it('downloads the database when a source is configured', async () => {
    const template = join(dir, 'template.db');
    await initializeStore({ path: template, seedSql: "CREATE TABLE remote (v TEXT); INSERT INTO remote VALUES ('fetched');" });
    const bytes = readFileSync(template);

    const requested: string[] = [];
    const path = join(dir, 'downloaded', 'copy.db');
    const result = await initializeStore({
      path,
      source: SOURCE,
      fetch: async input => {
        requested.push(String(input));
        return new Response(bytes);
      },
    });

    expect(requested).toEqual([SOURCE]);
    expect(result.ok && result.store.origin).toBe('downloaded');
    expect(existsSync(`${path}.download`)).toBe(false);
    if (!result.ok) return;
    const outcome = await new QueryGateway(result.store).execute('SELECT v FROM remote');
    expect(outcome.ok && outcome.rows).toEqual([{ v: 'fetched' }]);
  });

  it('rejects a download that is not a SQLite file', async () => {
    const path = join(dir, 'bad-download.db');
    const result = await initializeStore({
      path,
      source: SOURCE,
      fetch: async () => new Response('<html>not found</html>'),
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe(`Download from ${SOURCE} is not a SQLite database`);
    expect(existsSync(path)).toBe(false);
  });

  it('reports a failed HTTP status', async () => {
    const result = await initializeStore({
      path: join(dir, 'missing.db'),
      source: SOURCE,
      fetch: async () => new Response('gone', { status: 404 }),
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe(`Download from ${SOURCE} failed with status 404`);
  });

  it('wraps network errors', async () => {
    const result = await initializeStore({
      path: join(dir, 'offline.db'),
      source: SOURCE,
      fetch: async () => {
        throw new Error('connect ECONNREFUSED');
      },
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Failed to initialize database: connect ECONNREFUSED');
  });

  it('gives up on a download that does not finish in time', async () => {
    const path = join(dir, 'slow.db');
    const result = await initializeStore({
      path,
      source: SOURCE,
      downloadTimeoutMs: 20,
      fetch: (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(BootstrapError);
    expect(result.error.message).toBe(`Download from ${SOURCE} timed out after 20ms`);
    expect(existsSync(path)).toBe(false);
    expect(existsSync(`${path}.download`)).toBe(false);
  });

  it('removes the partial file when it cannot be moved into place', async () => {
    const template = join(dir, 'template.db');
    await initializeStore({ path: template, seedSql: 'CREATE TABLE remote (v TEXT);' });
    const bytes = readFileSync(template);

    renameFault.enabled = true;
    const path = join(dir, 'moved.db');
    const result = await initializeStore({ path, source: SOURCE, fetch: async () => new Response(bytes) });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Failed to initialize database: EXDEV: cross-device link not permitted');
    expect(existsSync(path)).toBe(false);
    expect(existsSync(`${path}.download`)).toBe(false);
  });
});

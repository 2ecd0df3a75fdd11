import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { loadConfig } from '../src/config.js';
import { initializeStore, type ReadyStore } from '../src/db/bootstrap.js';
import { QueryGateway } from '../src/gateway.js';
import { createLogger } from '../src/logger.js';
import type { Env, JsonRpcResponse } from '../src/types.js';

export const silentLogger = createLogger('silent');

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'sqlite-gateway-'));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export async function createTestStore(dir: string, seedSql?: string): Promise<ReadyStore> {
  const result = await initializeStore({ path: join(dir, 'test.db'), seedSql, logger: silentLogger });
  if (!result.ok) throw result.error;
  return result.store;
}

export function createTestEnv(store: ReadyStore): Env {
  return {
    gateway: new QueryGateway(store, { logger: silentLogger }),
    config: loadConfig({ dbPath: store.path }, {}),
    logger: silentLogger,
  };
}

const callResultSchema = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })).length(1),
  isError: z.boolean(),
});

/** Unwraps a tools/call response into its decoded JSON payload. */
export function toolPayload(res: JsonRpcResponse): { payload: unknown; isError: boolean } {
  const result = callResultSchema.parse(res.result);
  return { payload: JSON.parse(result.content[0].text), isError: result.isError };
}

export const ITEMS_SEED = `
CREATE TABLE items (id INTEGER PRIMARY KEY, label TEXT NOT NULL);
INSERT INTO items (id, label) VALUES (1, 'a'), (2, 'b'), (3, 'c'), (4, 'd'), (5, 'e');
CREATE TABLE numbers (n INTEGER NOT NULL);
WITH RECURSIVE seq(x) AS (SELECT 1 UNION ALL SELECT x + 1 FROM seq WHERE x < 12)
  INSERT INTO numbers (n) SELECT x FROM seq;
`;

#!/usr/bin/env node

/**
 * sqlite-gateway-mcp CLI
 *
 * Usage:
 *   sqlite-gateway-mcp serve                 Start MCP server (stdio)
 *   sqlite-gateway-mcp http --port 8080      Start HTTP server
 *   sqlite-gateway-mcp init --db ./my.db     Create the database and exit
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { loadConfig } from '../src/config.js';
import { createLogger } from '../src/logger.js';
import { initializeStore } from '../src/db/bootstrap.js';
import { QueryGateway } from '../src/gateway.js';
import { startStdioServer } from '../src/local/stdio.js';
import { startHttpServer } from '../src/http/server.js';
import type { Env } from '../src/types.js';

const args = process.argv.slice(2);
const command = args[0];

function printUsage(): void {
  console.error(`
sqlite-gateway-mcp — read-only SQL access to a SQLite dataset

Commands:
  serve     Start the MCP server (stdio transport)
  http      Start the HTTP server (tool manifest + tool calls)
  init      Create or fetch the database, then exit

Options:
  --db <path>       SQLite database path (env DATABASE_PATH, default: ./data/database.db)
  --source <url>    Fetch the database from this URL when it does not exist (env DATABASE_URL)
  --seed <file>     SQL script used to create a new database (env DATABASE_SEED)
  --port <n>        HTTP port (env PORT, default: 8000)

Examples:
  sqlite-gateway-mcp serve
  sqlite-gateway-mcp http --db ./dataset.db --port 3000
  `);
}

async function main(): Promise<void> {
  if (!command || command === '--help' || command === '-h') {
    printUsage();
    process.exit(0);
  }

  if (command !== 'serve' && command !== 'http' && command !== 'init') {
    console.error(`Unknown command: ${command}`);
    printUsage();
    process.exit(1);
  }

  const dbPath = getOption('--db');
  const port = getOption('--port');
  const config = loadConfig({
    ...(dbPath ? { dbPath: resolve(dbPath) } : {}),
    ...(port ? { port: Number(port) } : {}),
    source: getOption('--source'),
    seedFile: getOption('--seed'),
  });
  const logger = createLogger(config.logLevel);

  // The store must be ready before any transport accepts calls
  const init = await initializeStore({
    path: resolve(config.database.path),
    source: config.database.source,
    seedSql: config.database.seedFile ? readFileSync(resolve(config.database.seedFile), 'utf8') : undefined,
    busyTimeoutMs: config.database.busyTimeoutMs,
    logger,
  });
  if (!init.ok) {
    logger.fatal({ err: init.error }, 'cannot start without a database');
    process.exit(1);
  }

  if (command === 'init') {
    return;
  }

  const gateway = new QueryGateway(init.store, { allowCte: config.policy.allowCte, logger });
  const env: Env = { gateway, config, logger };

  if (command === 'serve') {
    const server = startStdioServer(env);
    logger.info({ path: init.store.path }, 'waiting for MCP client connection via stdio');

    const shutdown = () => {
      server.close();
      server.idle().then(
        () => process.exit(0),
        () => process.exit(1),
      );
    };
    process.stdin.on('end', shutdown);
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
    return;
  }

  const http = startHttpServer(env);
  const shutdown = () => {
    http.close(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

function getOption(flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return undefined;
  return args[idx + 1];
}

main().catch((err: unknown) => {
  console.error('Fatal error:', err);
  process.exit(1);
});

/**
 * Query gateway: the one path every transport uses to reach the store.
 *
 * Caller text goes through the read-only gate, then runs once on a fresh
 * read-only connection. Outcomes are values; caller-input problems never
 * throw out of here.
 */

import type { Logger } from 'pino';
import type { ReadyStore } from './db/bootstrap.js';
import { listTableNames, quoteIdentifier, readTableInfo, runStatement, withConnection } from './db/sqlite.js';
import { errorMessage } from './errors.js';
import { checkQuery } from './policy.js';
import type { GatewayFailure, QueryOutcome, QueryParams, TableInfo, TableLookup } from './types.js';

export const DEFAULT_SAMPLE_LIMIT = 10;
export const MAX_SAMPLE_LIMIT = 1000;

export interface GatewayOptions {
  allowCte?: boolean;
  logger?: Logger;
}

export class QueryGateway {
  private readonly store: ReadyStore;
  private readonly allowCte: boolean;
  private readonly logger?: Logger;

  constructor(store: ReadyStore, opts: GatewayOptions = {}) {
    this.store = store;
    this.allowCte = opts.allowCte ?? false;
    this.logger = opts.logger;
  }

  async execute(query: string, params?: QueryParams): Promise<QueryOutcome> {
    const decision = checkQuery(query, { allowCte: this.allowCte });
    if (!decision.allowed) {
      this.logger?.warn({ query }, 'query denied by read-only policy');
      return fail({ kind: 'policy_violation', message: decision.reason, query });
    }

    const started = Date.now();
    try {
      const { columns, rows } = withConnection(this.store, db => runStatement(db, query, params));
      this.logger?.debug({ query, rows: rows.length, ms: Date.now() - started }, 'query executed');
      return { ok: true, columns, rows };
    } catch (err: unknown) {
      const message = errorMessage(err);
      this.logger?.info({ query, err: message }, 'query failed');
      return fail({ kind: 'execution_error', message, query });
    }
  }

  async listTables(): Promise<string[]> {
    return withConnection(this.store, db => listTableNames(db));
  }

  async describeSchema(): Promise<Record<string, TableInfo>> {
    return withConnection(this.store, db => {
      const schema: Record<string, TableInfo> = {};
      for (const name of listTableNames(db)) {
        schema[name] = readTableInfo(db, name);
      }
      return schema;
    });
  }

  async describeTable(name: string): Promise<TableLookup> {
    const table = withConnection(this.store, db =>
      listTableNames(db).includes(name) ? readTableInfo(db, name) : null,
    );
    if (!table) {
      return { ok: false, failure: notFound(name) };
    }
    return { ok: true, table };
  }

  /** `SELECT * FROM <table> LIMIT <limit>` for a table that exists. */
  async sample(table: string, limit: number = DEFAULT_SAMPLE_LIMIT): Promise<QueryOutcome> {
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_SAMPLE_LIMIT) {
      return fail({
        kind: 'invalid_argument',
        message: `limit must be an integer between 1 and ${MAX_SAMPLE_LIMIT}`,
      });
    }

    const tables = await this.listTables();
    if (!tables.includes(table)) {
      return fail(notFound(table));
    }

    return this.execute(`SELECT * FROM ${quoteIdentifier(table)} LIMIT ${limit}`);
  }
}

function fail(failure: GatewayFailure): QueryOutcome {
  return { ok: false, failure };
}

function notFound(table: string): GatewayFailure {
  return { kind: 'not_found', message: `Table '${table}' not found` };
}

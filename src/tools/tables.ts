/** Table tools — list, info, sample */

import { z } from 'zod';
import type { McpTool, Env } from '../types.js';
import { DEFAULT_SAMPLE_LIMIT, MAX_SAMPLE_LIMIT } from '../gateway.js';
import { failurePayload, outcomePayload } from '../utils.js';
import { parseArgs, tableNameSchema } from './args.js';

const tableInfoArgs = z.object({ table_name: tableNameSchema });

const sampleArgs = z.object({
  table_name: tableNameSchema,
  limit: z.number().int().min(1).max(MAX_SAMPLE_LIMIT).default(DEFAULT_SAMPLE_LIMIT),
});

export const tableTools: McpTool[] = [
  {
    name: 'list_tables',
    description: 'List the names of all tables in the database.',
    inputSchema: {
      type: 'object',
      properties: {},
    },
    handler: async (_args, env: Env) => {
      const tables = await env.gateway.listTables();
      return { payload: { tables, count: tables.length }, isError: false };
    },
  },

  {
    name: 'get_table_info',
    description: 'Get detailed information about a specific table: columns, types, keys and foreign keys.',
    inputSchema: {
      type: 'object',
      properties: {
        table_name: { type: 'string', description: 'Name of the table to inspect' },
      },
      required: ['table_name'],
    },
    handler: async (args, env: Env) => {
      const { table_name } = parseArgs(tableInfoArgs, args);
      const lookup = await env.gateway.describeTable(table_name);
      if (!lookup.ok) {
        return { payload: failurePayload(lookup.failure), isError: true };
      }
      return { payload: lookup.table, isError: false };
    },
  },

  {
    name: 'sample_data',
    description: 'Get a sample of rows from a table.',
    inputSchema: {
      type: 'object',
      properties: {
        table_name: { type: 'string', description: 'Name of the table to sample from' },
        limit: {
          type: 'integer',
          description: `Number of rows to return (default: ${DEFAULT_SAMPLE_LIMIT})`,
          default: DEFAULT_SAMPLE_LIMIT,
          minimum: 1,
          maximum: MAX_SAMPLE_LIMIT,
        },
      },
      required: ['table_name'],
    },
    handler: async (args, env: Env) => {
      const { table_name, limit } = parseArgs(sampleArgs, args);
      const outcome = await env.gateway.sample(table_name, limit);
      return { payload: outcomePayload(outcome), isError: !outcome.ok };
    },
  },
];

/** Query tool — execute_query */

import { z } from 'zod';
import type { McpTool, Env } from '../types.js';
import { outcomePayload } from '../utils.js';
import { paramsSchema, parseArgs } from './args.js';

const executeQueryArgs = z.object({
  query: z.string(),
  params: paramsSchema.optional(),
});

export const queryTools: McpTool[] = [
  {
    name: 'execute_query',
    description: 'Execute a SQL SELECT query on the database. Returns rows as objects keyed by column name.',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'The SQL query to execute (SELECT only for safety)' },
        params: {
          description: 'Optional bound parameters: an array for ? placeholders or an object for :name placeholders',
          oneOf: [
            { type: 'array', items: { type: ['string', 'number', 'null'] } },
            { type: 'object', additionalProperties: { type: ['string', 'number', 'null'] } },
          ],
        },
      },
      required: ['query'],
    },
    handler: async (args, env: Env) => {
      const { query, params } = parseArgs(executeQueryArgs, args);
      const outcome = await env.gateway.execute(query, params);
      return { payload: outcomePayload(outcome), isError: !outcome.ok };
    },
  },
];

/**
 * HTTP transport: tool manifest, a single-tool call endpoint and the
 * JSON-RPC dispatcher over POST.
 */

import { randomUUID } from 'crypto';
import { Hono } from 'hono';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { Env } from '../types.js';
import { handleJsonRpc, isJsonRpcRequest, isNotification } from '../mcp.js';
import { toWire } from '../utils.js';
import { QUERY_TOOL_NAME, TOOL_MANIFEST } from './manifest.js';

export interface AppBindings {
  Variables: {
    logger: Logger;
  };
}

const toolCallSchema = z.object({
  tool: z.string().min(1),
  input: z.object({
    query: z.string(),
  }),
});

type ErrorKind = 'invalid_request' | 'unsupported' | 'policy_violation' | 'execution_error';

function errorBody(kind: ErrorKind, message: string, query?: string) {
  return { error: { kind, message, ...(query !== undefined ? { query } : {}) } };
}

async function readJson(req: { json: () => Promise<unknown> }): Promise<{ ok: true; body: unknown } | { ok: false }> {
  try {
    return { ok: true, body: await req.json() };
  } catch {
    return { ok: false };
  }
}

export function createApp(env: Env): Hono<AppBindings> {
  const app = new Hono<AppBindings>();

  app.use('*', async (c, next) => {
    const logger = env.logger.child({ reqId: randomUUID() });
    c.set('logger', logger);
    const started = Date.now();
    await next();
    logger.info(
      { method: c.req.method, path: c.req.path, status: c.res.status, ms: Date.now() - started },
      'request completed',
    );
  });

  app.get('/', c => c.json({ message: 'Hello from MCP server' }));

  app.get('/health', async c => {
    const tables = await env.gateway.listTables();
    return c.json({ status: 'ok', tables: tables.length });
  });

  app.get('/.well-known/mcp-schema.json', c => c.json(TOOL_MANIFEST));

  app.post('/tools/call', async c => {
    const json = await readJson(c.req);
    if (!json.ok) {
      return c.json(errorBody('invalid_request', 'Request body must be valid JSON'), 400);
    }

    const parsed = toolCallSchema.safeParse(json.body);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
      return c.json(errorBody('invalid_request', `Invalid tool call: ${issues.join('; ')}`), 400);
    }

    const { tool, input } = parsed.data;
    if (tool !== QUERY_TOOL_NAME) {
      return c.json(errorBody('unsupported', `Unsupported tool: ${tool}`), 400);
    }

    const outcome = await env.gateway.execute(input.query);
    if (outcome.ok) {
      return c.json({ tool: QUERY_TOOL_NAME, output: { result: toWire(outcome.rows) } });
    }

    const { kind, message, query } = outcome.failure;
    if (kind === 'policy_violation') {
      return c.json(errorBody('policy_violation', message, query), 403);
    }
    c.var.logger.error({ query, err: message }, 'tool call failed');
    return c.json(errorBody('execution_error', message, query), 500);
  });

  app.post('/mcp', async c => {
    const json = await readJson(c.req);
    if (!json.ok) {
      return c.json({ jsonrpc: '2.0', id: null, error: { code: -32700, message: 'Parse error' } }, 400);
    }
    if (!isJsonRpcRequest(json.body)) {
      return c.json({ jsonrpc: '2.0', id: null, error: { code: -32600, message: 'Invalid Request' } }, 400);
    }

    const response = await handleJsonRpc(json.body, env);
    if (isNotification(json.body)) {
      return c.body(null, 202);
    }
    return c.json(response);
  });

  return app;
}

/** JSON-RPC dispatcher + tool and resource registry */

import type { McpTool, Env, JsonRpcId, JsonRpcRequest, JsonRpcResponse } from './types.js';
import { queryTools } from './tools/query.js';
import { tableTools } from './tools/tables.js';
import { ALL_RESOURCES, RESOURCE_MAP } from './resources.js';
import { RpcError, errorMessage } from './errors.js';
import { toJsonText } from './utils.js';

export const PROTOCOL_VERSION = '2024-11-05';

const ALL_TOOLS: McpTool[] = [
  ...queryTools,
  ...tableTools,
];

const TOOL_MAP = new Map<string, McpTool>(ALL_TOOLS.map(t => [t.name, t]));

function mcpError(id: JsonRpcId, code: number, message: string): JsonRpcResponse {
  return { jsonrpc: '2.0', id, error: { code, message } };
}

function mcpResult(id: JsonRpcId, result: unknown): JsonRpcResponse {
  return { jsonrpc: '2.0', id, result };
}

function stringParam(params: Record<string, unknown> | undefined, key: string): string | undefined {
  const value = params?.[key];
  return typeof value === 'string' && value ? value : undefined;
}

function objectParam(params: Record<string, unknown> | undefined, key: string): Record<string, unknown> {
  const value = params?.[key];
  if (value === undefined || value === null) return {};
  if (typeof value !== 'object' || Array.isArray(value)) {
    throw new RpcError(-32602, `${key} must be an object`);
  }
  return { ...value };
}

async function dispatch(req: JsonRpcRequest, env: Env): Promise<unknown> {
  const { method, params } = req;

  switch (method) {
    case 'initialize':
      return {
        protocolVersion: PROTOCOL_VERSION,
        capabilities: { tools: {}, resources: {} },
        serverInfo: {
          name: env.config.name,
          version: env.config.version,
          description: env.config.description,
        },
      };

    case 'tools/list':
      return {
        tools: ALL_TOOLS.map(t => ({
          name: t.name,
          description: t.description,
          inputSchema: t.inputSchema,
        })),
      };

    case 'tools/call': {
      const toolName = stringParam(params, 'name');
      if (!toolName) {
        throw new RpcError(-32602, 'Missing tool name');
      }

      const tool = TOOL_MAP.get(toolName);
      if (!tool) {
        throw new RpcError(-32601, `Unknown tool: ${toolName}`);
      }

      const { payload, isError } = await tool.handler(objectParam(params, 'arguments'), env);
      return {
        content: [{ type: 'text', text: toJsonText(payload) }],
        isError,
      };
    }

    case 'resources/list':
      return {
        resources: ALL_RESOURCES.map(r => ({
          uri: r.uri,
          name: r.name,
          description: r.description,
          mimeType: r.mimeType,
        })),
      };

    case 'resources/read': {
      const uri = stringParam(params, 'uri');
      if (!uri) {
        throw new RpcError(-32602, 'Missing resource uri');
      }

      const resource = RESOURCE_MAP.get(uri);
      if (!resource) {
        throw new RpcError(-32002, `Unknown resource URI: ${uri}`);
      }

      return {
        contents: [{ uri, mimeType: resource.mimeType, text: toJsonText(await resource.read(env)) }],
      };
    }

    case 'notifications/initialized':
    case 'ping':
      return {};

    default:
      throw new RpcError(-32601, `Method not found: ${method}`);
  }
}

export async function handleJsonRpc(req: JsonRpcRequest, env: Env): Promise<JsonRpcResponse> {
  const id = req.id ?? null;

  try {
    return mcpResult(id, await dispatch(req, env));
  } catch (err: unknown) {
    if (err instanceof RpcError) {
      return mcpError(id, err.code, err.message);
    }
    env.logger.error({ method: req.method, err }, 'request failed');
    return mcpError(id, -32603, `Internal error: ${errorMessage(err)}`);
  }
}

/** Narrows a parsed JSON value to a request; anything else is an invalid request. */
export function isJsonRpcRequest(value: unknown): value is JsonRpcRequest {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const method: unknown = Reflect.get(value, 'method');
  const params: unknown = Reflect.get(value, 'params');
  const id: unknown = Reflect.get(value, 'id');
  return typeof method === 'string'
    && (id === undefined || id === null || typeof id === 'string' || typeof id === 'number')
    && (params === undefined || (typeof params === 'object' && params !== null && !Array.isArray(params)));
}

/** Only a missing id marks a notification; `"id": null` still gets a reply. */
export function isNotification(req: JsonRpcRequest): boolean {
  return req.id === undefined;
}

export { ALL_TOOLS };

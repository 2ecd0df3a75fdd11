/** sqlite-gateway-mcp — Type definitions */

import type { Logger } from 'pino';
import type { GatewayConfig } from './config.js';
import type { QueryGateway } from './gateway.js';

export interface Env {
  gateway: QueryGateway;
  config: GatewayConfig;
  logger: Logger;
}

export interface McpTool {
  name: string;
  description: string;
  inputSchema: object;
  handler: (args: Record<string, unknown>, env: Env) => Promise<ToolResult>;
}

export interface ToolResult {
  payload: unknown;
  isError: boolean;
}

export interface McpResource {
  uri: string;
  name: string;
  description: string;
  mimeType: string;
  read: (env: Env) => Promise<unknown>;
}

export type JsonRpcId = string | number | null;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id?: JsonRpcId;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result?: unknown;
  error?: { code: number; message: string; data?: unknown };
}

// Store values and query outcomes

export type Scalar = null | number | bigint | string | Buffer;

export type Row = Record<string, Scalar>;

export type QueryParams = Scalar[] | Record<string, Scalar>;

export type FailureKind = 'policy_violation' | 'execution_error' | 'not_found' | 'invalid_argument';

export interface GatewayFailure {
  kind: FailureKind;
  message: string;
  query?: string;
}

export type QueryOutcome =
  | { ok: true; columns: string[]; rows: Row[] }
  | { ok: false; failure: GatewayFailure };

export interface ColumnInfo {
  name: string;
  type: string;
  nullable: boolean;
  default: string | null;
  primary_key: boolean;
}

export interface ForeignKeyInfo {
  column: string;
  references_table: string;
  references_column: string | null;
}

export interface TableInfo {
  columns: ColumnInfo[];
  foreign_keys: ForeignKeyInfo[];
}

export type TableLookup =
  | { ok: true; table: TableInfo }
  | { ok: false; failure: GatewayFailure };

export type PolicyDecision =
  | { allowed: true }
  | { allowed: false; reason: string };

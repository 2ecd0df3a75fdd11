/** sqlite-gateway-mcp — Entry point */

export { handleJsonRpc, ALL_TOOLS, PROTOCOL_VERSION } from './mcp.js';
export { ALL_RESOURCES } from './resources.js';
export { QueryGateway, DEFAULT_SAMPLE_LIMIT, MAX_SAMPLE_LIMIT } from './gateway.js';
export { checkQuery } from './policy.js';
export { initializeStore, SAMPLE_SEED } from './db/bootstrap.js';
export { loadConfig } from './config.js';
export { createLogger } from './logger.js';
export { startStdioServer } from './local/stdio.js';
export { createApp } from './http/app.js';
export { startHttpServer } from './http/server.js';
export { TOOL_MANIFEST } from './http/manifest.js';
export { RpcError, ConfigError, BootstrapError } from './errors.js';
export { toWire } from './utils.js';
export type { GatewayConfig, ConfigOverrides, LogLevel } from './config.js';
export type { ReadyStore, StoreInitResult, StoreInitOptions, StoreOrigin } from './db/bootstrap.js';
export type { StdioServer, StdioStreams } from './local/stdio.js';
export type {
  Env,
  McpTool,
  McpResource,
  Row,
  Scalar,
  QueryParams,
  QueryOutcome,
  GatewayFailure,
  FailureKind,
  TableInfo,
  ColumnInfo,
  ForeignKeyInfo,
  TableLookup,
  PolicyDecision,
  JsonRpcRequest,
  JsonRpcResponse,
} from './types.js';

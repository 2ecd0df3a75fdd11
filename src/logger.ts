import pino, { type Logger } from 'pino';
import type { LogLevel } from './config.js';

/**
 * Process logger. Always writes to stderr: in stdio mode stdout carries
 * protocol frames only.
 */
export function createLogger(level: LogLevel, name = 'sqlite-gateway-mcp'): Logger {
  return pino({ name, level }, pino.destination(2));
}

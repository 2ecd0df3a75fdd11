/**
 * stdio transport for MCP — reads JSON-RPC from stdin, writes to stdout.
 * Supports both Content-Length framed and line-delimited JSON; each reply
 * uses the framing of the message it answers.
 * Messages are handled one at a time, in arrival order.
 */

import type { Readable, Writable } from 'stream';
import type { Env, JsonRpcResponse } from '../types.js';
import { handleJsonRpc, isJsonRpcRequest, isNotification } from '../mcp.js';

export type Framing = 'content-length' | 'line';

const HEADER_LINE = /^[A-Za-z][A-Za-z0-9-]*:/;

export interface StdioStreams {
  input: Readable;
  output: Writable;
}

export interface StdioServer {
  /** Resolves once every message received so far has been answered. */
  idle(): Promise<void>;
  close(): void;
}

export function startStdioServer(
  env: Env,
  streams: StdioStreams = { input: process.stdin, output: process.stdout },
): StdioServer {
  const { input, output } = streams;

  // Write a JSON-RPC response in the requested framing
  function send(response: JsonRpcResponse, framing: Framing): void {
    const json = JSON.stringify(response);
    if (framing === 'content-length') {
      output.write(`Content-Length: ${Buffer.byteLength(json)}\r\n\r\n${json}`);
    } else {
      output.write(`${json}\n`);
    }
  }

  let buffer = '';
  let queue: Promise<void> = Promise.resolve();

  function onData(chunk: string): void {
    buffer += chunk;
    for (const message of drainBuffer()) {
      queue = queue
        .then(() => handleMessage(message.body, message.framing))
        .catch((err: unknown) => {
          env.logger.error({ err }, 'failed to answer message');
        });
    }
  }

  function drainBuffer(): Array<{ body: string; framing: Framing }> {
    const messages: Array<{ body: string; framing: Framing }> = [];

    while (buffer.length > 0) {
      // Try Content-Length framed protocol first: any header block, in any order
      if (HEADER_LINE.test(buffer)) {
        const headerEnd = buffer.indexOf('\r\n\r\n');
        if (headerEnd === -1) break; // Wait for the rest of the header

        const header = buffer.slice(0, headerEnd);
        const match = /^Content-Length:[ \t]*(\d+)[ \t]*\r?$/im.exec(header);
        const bodyStart = headerEnd + 4;
        if (!match) {
          env.logger.warn({ header: buffer.slice(0, headerEnd) }, 'invalid Content-Length header');
          buffer = buffer.slice(bodyStart);
          continue;
        }

        const contentLength = parseInt(match[1], 10);
        const body = Buffer.from(buffer.slice(bodyStart), 'utf8');
        if (body.length < contentLength) break; // Wait for more data

        buffer = body.subarray(contentLength).toString('utf8');
        messages.push({ body: body.subarray(0, contentLength).toString('utf8'), framing: 'content-length' });
        continue;
      }

      // Fall back to line-delimited JSON
      const lineEnd = buffer.indexOf('\n');
      if (lineEnd === -1) break; // Wait for complete line

      const line = buffer.slice(0, lineEnd).trim();
      buffer = buffer.slice(lineEnd + 1);

      if (line) {
        messages.push({ body: line, framing: 'line' });
      }
    }

    return messages;
  }

  async function handleMessage(body: string, framing: Framing): Promise<void> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (err: unknown) {
      env.logger.warn({ err, body: body.slice(0, 200) }, 'malformed JSON-RPC message');
      send({ jsonrpc: '2.0', id: null, error: { code: -32700, message: 'Parse error' } }, framing);
      return;
    }

    if (!isJsonRpcRequest(parsed)) {
      send({ jsonrpc: '2.0', id: null, error: { code: -32600, message: 'Invalid Request' } }, framing);
      return;
    }

    const response = await handleJsonRpc(parsed, env);
    // Notifications carry no id — don't send response
    if (!isNotification(parsed)) {
      send(response, framing);
    }
  }

  input.setEncoding('utf8');
  input.on('data', onData);
  input.resume();

  return {
    idle: () => queue,
    close: () => {
      input.off('data', onData);
      input.pause();
    },
  };
}

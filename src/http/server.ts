import { serve } from '@hono/node-server';
import type { Env } from '../types.js';
import { createApp } from './app.js';

export function startHttpServer(env: Env, port: number = env.config.http.port) {
  const app = createApp(env);
  return serve({ fetch: app.fetch, port }, info => {
    env.logger.info({ port: info.port }, 'HTTP server listening');
  });
}

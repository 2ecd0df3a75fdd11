/** Readable resources — schema and table list */

import type { McpResource } from './types.js';

export const ALL_RESOURCES: McpResource[] = [
  {
    uri: 'sqlite:///schema',
    name: 'Database Schema',
    description: 'Complete database schema with tables and columns',
    mimeType: 'application/json',
    read: env => env.gateway.describeSchema(),
  },
  {
    uri: 'sqlite:///tables',
    name: 'Table List',
    description: 'List of all tables in the database',
    mimeType: 'application/json',
    read: env => env.gateway.listTables(),
  },
];

export const RESOURCE_MAP = new Map<string, McpResource>(ALL_RESOURCES.map(r => [r.uri, r]));

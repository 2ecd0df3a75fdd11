/** Tool argument validation */

import { z } from 'zod';
import { RpcError } from '../errors.js';

export const scalarSchema = z.union([z.null(), z.number(), z.string()]);

export const paramsSchema = z.union([z.array(scalarSchema), z.record(scalarSchema)]);

export const tableNameSchema = z.string().trim().min(1, 'table_name must not be empty');

export function parseArgs<T extends z.ZodTypeAny>(
  schema: T,
  args: Record<string, unknown>,
): z.infer<T> {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
    throw new RpcError(-32602, `Invalid arguments: ${issues.join('; ')}`);
  }
  return parsed.data;
}

import type { Context } from 'hono';
import type { z } from 'zod';
import { createBadRequestError } from '../lib/errors.js';

export const parseBody = async <T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.output<T>> => {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw createBadRequestError('Request body must be valid JSON');
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`);
    throw createBadRequestError(issues.join('; '));
  }
  return result.data;
};

import type { Context } from 'hono';
import type { z } from 'zod';
import { ValidationError } from '../errors.js';

/** Parse a JSON request body against a schema, failing with the offending field names */
export async function readBody<S extends z.ZodTypeAny>(c: Context, schema: S): Promise<z.output<S>> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch (error) {
    throw new ValidationError('Request body must be valid JSON.', { cause: error });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const fields = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.') || 'body'))];
    throw new ValidationError(`Missing or invalid fields: ${fields.join(', ')}.`);
  }
  return parsed.data;
}

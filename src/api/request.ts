/**
 * Request helpers shared by the route modules
 */

import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { z } from 'zod';
import type { FailureResult } from '../types/index.js';
import { validatePhoneNumber, validateRequest } from '../validator/index.js';

/**
 * Read the JSON body; an empty body counts as `{}`
 */
export async function readJson(c: Context): Promise<unknown> {
  const raw = await c.req.text();
  if (!raw.trim()) return {};

  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed ?? {};
  } catch {
    throw new HTTPException(400, { message: 'Request body must be valid JSON' });
  }
}

/**
 * Validate input against a schema or answer 400 with the first issue
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = validateRequest(schema, input);
  if (!result.success) {
    throw new HTTPException(400, { message: result.error });
  }
  return result.data;
}

export async function parseBody<S extends z.ZodTypeAny>(c: Context, schema: S): Promise<z.output<S>> {
  return parseInput(schema, await readJson(c));
}

/**
 * Normalized phone number, or 400
 */
export function requirePhoneNumber(phoneNumber: string): string {
  const phone = validatePhoneNumber(phoneNumber);
  if (!phone.success) {
    throw new HTTPException(400, { message: phone.error });
  }
  return phone.normalized;
}

/**
 * Answer 500 for a setup flow that did not succeed
 */
export function setupFailed(label: string, result: FailureResult): never {
  throw new HTTPException(500, { message: `Failed to setup ${label} integration: ${result.error}` });
}

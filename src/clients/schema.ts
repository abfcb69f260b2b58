/**
 * Runtime validation for values read back from a persistent cache.
 */

import { z } from 'zod';
import type { CachedHttpResponse } from './types.js';

export const CachedHttpResponseSchema = z.object({
  status: z.number().int().min(100).max(599),
  body: z.unknown(),
  contentType: z.string().nullable(),
  storedAt: z.number(),
});

/** Validate a stored value as a CachedHttpResponse; throws a ZodError otherwise. */
export function parseCachedHttpResponse(raw: unknown): CachedHttpResponse {
  const parsed = CachedHttpResponseSchema.parse(raw);
  return {
    status: parsed.status,
    body: parsed.body,
    contentType: parsed.contentType,
    storedAt: parsed.storedAt,
  };
}

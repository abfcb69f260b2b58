/**
 * Zod schemas for YAML config file validation.
 * These schemas are the single source of truth for config structure.
 * TypeScript types are inferred from these schemas in types.ts.
 */

import { z } from 'zod';

/** Schema for server settings. */
export const SettingsSchema = z.object({
  port: z.number().int().min(1).max(65535).default(3430),
  apiKeys: z
    .array(z.string().min(1, { message: 'API key must not be empty' }))
    .min(1, { message: 'At least one API key is required' }),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

/** Schema for the remote API every proxied request goes to. */
export const UpstreamSchema = z.object({
  id: z.string().min(1, { message: 'Upstream id must not be empty' }).default('upstream'),
  baseUrl: z.url({ message: 'Upstream baseUrl must be a valid URL' }),
  apiKey: z.string().min(1, { message: 'Upstream apiKey must not be empty' }).optional(),
  timeoutMs: z.number().int().min(1000).default(30000),
  headers: z.record(z.string(), z.string()).default({}),
});

/** Schema for the local quota window. */
export const QuotaSchema = z.object({
  windowMs: z.number().int().positive(),
  threshold: z.number().int().positive(),
  bufferMs: z.number().int().min(0).default(3000),
  resyncBeforeRequest: z.boolean().default(false),
  resyncFromHeaders: z.boolean().default(false),
  initialCount: z.number().int().min(0).default(0),
  consumeQuotaOnFailure: z.boolean().default(true),
});

/** Schema for the response cache. */
export const CacheSchema = z.object({
  driver: z.enum(['memory', 'sqlite']).default('memory'),
  dbPath: z.string().min(1).default('./data/cache.db'),
  ttlMs: z.number().int().positive().optional(),
  cacheOnFailure: z.boolean().default(false),
});

/** Schema for cache key derivation. */
export const FingerprintSchema = z.object({
  includeHeaders: z.array(z.string().min(1)).default([]),
});

/** Top-level config schema with cross-field validation. */
export const ConfigSchema = z
  .object({
    version: z.literal(1),
    settings: SettingsSchema,
    upstream: UpstreamSchema,
    quota: QuotaSchema,
    cache: CacheSchema.prefault({}),
    fingerprint: FingerprintSchema.prefault({}),
  })
  .refine((config) => !config.quota.resyncBeforeRequest || config.quota.resyncFromHeaders, {
    message: 'quota.resyncBeforeRequest requires quota.resyncFromHeaders',
  });

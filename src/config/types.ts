/**
 * TypeScript types inferred from Zod schemas.
 */

import type { z } from 'zod';
import type {
  CacheSchema,
  ConfigSchema,
  FingerprintSchema,
  QuotaSchema,
  SettingsSchema,
  UpstreamSchema,
} from './schema.js';

/** Fully validated server configuration. */
export type Config = z.infer<typeof ConfigSchema>;

export type Settings = z.infer<typeof SettingsSchema>;

/** The remote API proxied requests go to. */
export type UpstreamConfig = z.infer<typeof UpstreamSchema>;

export type QuotaConfig = z.infer<typeof QuotaSchema>;

export type CacheConfig = z.infer<typeof CacheSchema>;

export type FingerprintConfig = z.infer<typeof FingerprintSchema>;

import { z } from 'zod';

const ttlSeconds = z.number().int().positive();

export const CacheTtlSchema = z
  .object({
    default: ttlSeconds.optional(),
    tables: ttlSeconds.optional(),
    schema: ttlSeconds.optional(),
    metadata: ttlSeconds.optional(),
  })
  .strict();

export const CacheSchema = z
  .object({
    enabled: z.boolean().default(true),
    storage: z.enum(['sqlite', 'memory']).default('sqlite'),
    dir: z.string().min(1).optional(),
    ttl: CacheTtlSchema.optional(),
  })
  .strict();

export const BqSchema = z
  .object({
    path: z.string().min(1).default('bq'),
    max_results: z.number().int().positive().max(100_000).default(1000),
  })
  .strict();

export const ConfigFileSchema = z
  .object({
    cache: CacheSchema.default({}),
    bq: BqSchema.default({}),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

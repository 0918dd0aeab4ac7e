import type { CacheTtlSettings } from './types';

const MINUTE = 60_000;

export const DEFAULT_CACHE_TTL: Readonly<CacheTtlSettings> = Object.freeze({
  default: 15 * MINUTE,
  tables: 5 * MINUTE,
  metadata: 15 * MINUTE,
  schema: 30 * MINUTE,
});

export function isValidTtl(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

export function resolveTtl(override: number | undefined, fallback: number): number {
  return isValidTtl(override) ? override : fallback;
}

import { createHash } from 'node:crypto';
import type { Result } from '../../domain/result.js';
import type { EnvSnapshot, ValidationReport } from '../../domain/types.js';
import { pickEnv } from '../../infrastructure/env-file.js';
import { logger } from '../../infrastructure/logger.js';
import { listFields, type Settings } from '../schema-registry/index.js';
import { validateSnapshot } from '../validation/index.js';

export type LoadResult = Result<Settings, ValidationReport>;

export interface SettingsLoaderOptions {
  /** Distinct snapshots kept before the oldest outcome is evicted. */
  maxEntries?: number;
}

const DEFAULT_MAX_ENTRIES = 32;
const log = logger.child({ module: 'settings-loader' });

export function snapshotKey(snapshot: EnvSnapshot): string {
  const entries = Object.entries(snapshot).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return createHash('sha256').update(JSON.stringify(entries)).digest('hex');
}

function freezeOutcome(result: LoadResult): LoadResult {
  if (result.ok) return result;
  return { ok: false, error: Object.freeze({ errors: Object.freeze([...result.error.errors]) }) };
}

/**
 * Validates snapshots and remembers each outcome under a hash of the
 * snapshot. A changed snapshot always misses the cache; `invalidate()`
 * makes the next load rebuild even for an unchanged one.
 */
export class SettingsLoader {
  private readonly cache = new Map<string, LoadResult>();
  private readonly maxEntries: number;
  private builds = 0;

  constructor(options: SettingsLoaderOptions = {}) {
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_MAX_ENTRIES);
  }

  load(snapshot: EnvSnapshot): LoadResult {
    const key = snapshotKey(snapshot);
    const cached = this.cache.get(key);

    if (cached) {
      log.debug({ cacheKey: key.slice(0, 12) }, 'Returning cached settings outcome');
      return cached;
    }

    const result = freezeOutcome(validateSnapshot(Object.freeze({ ...snapshot })));
    this.builds += 1;
    this.remember(key, result);

    log.info(
      { cacheKey: key.slice(0, 12), valid: result.ok, errorCount: result.ok ? 0 : result.error.errors.length },
      'Settings built from snapshot',
    );
    return result;
  }

  invalidate(): void {
    const evicted = this.cache.size;
    this.cache.clear();
    log.info({ evicted }, 'Settings cache invalidated');
  }

  get size(): number {
    return this.cache.size;
  }

  /** How many times a snapshot was actually validated rather than served from cache. */
  get buildCount(): number {
    return this.builds;
  }

  private remember(key: string, result: LoadResult): void {
    if (this.cache.size >= this.maxEntries) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
    this.cache.set(key, result);
  }
}

let sharedLoader: SettingsLoader | null = null;

export function getSettingsLoader(): SettingsLoader {
  if (!sharedLoader) {
    sharedLoader = new SettingsLoader();
  }
  return sharedLoader;
}

/** Loads settings from a process environment, ignoring variables the schema does not declare. */
export function loadSettingsFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
  loader: SettingsLoader = getSettingsLoader(),
): LoadResult {
  const names = listFields().map((field) => field.name);
  return loader.load(pickEnv(env, names));
}

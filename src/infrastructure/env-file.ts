import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { parse } from 'dotenv';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../domain/errors.js';
import type { EnvSnapshot } from '../domain/types.js';
import { logger } from './logger.js';

const log = logger.child({ module: 'env-file' });

function isMissingFile(cause: unknown): boolean {
  return typeof cause === 'object' && cause !== null && 'code' in cause && cause.code === 'ENOENT';
}

export function parseEnvContent(content: string): EnvSnapshot {
  return Object.freeze(parse(content));
}

/** Reads a dotenv-style file into a snapshot. Values are not expanded. */
export async function readEnvFile(path: string): Promise<Result<EnvSnapshot, AppError>> {
  const absolutePath = resolve(path);

  try {
    const content = await readFile(absolutePath, 'utf-8');
    const snapshot = parseEnvContent(content);
    log.debug({ path: absolutePath, keyCount: Object.keys(snapshot).length }, 'Env file loaded');
    return ok(snapshot);
  } catch (cause) {
    const details = cause instanceof Error ? cause.message : String(cause);

    if (isMissingFile(cause)) {
      log.warn({ path: absolutePath }, 'Env file not found');
      return err(createAppError(ErrorCode.ENV_FILE_NOT_FOUND, `Env file '${path}' not found`, details));
    }

    log.error({ path: absolutePath, details }, 'Failed to read env file');
    return err(createAppError(ErrorCode.ENV_FILE_UNREADABLE, `Cannot read env file '${path}'`, details));
  }
}

/** Keeps only the keys in `names` whose value is set. */
export function pickEnv(
  env: Readonly<Record<string, string | undefined>>,
  names: readonly string[],
): EnvSnapshot {
  const snapshot: Record<string, string> = {};
  for (const name of names) {
    const value = env[name];
    if (value !== undefined) snapshot[name] = value;
  }
  return Object.freeze(snapshot);
}

import os from 'node:os';
import path from 'node:path';

import type { ConversionMode } from './hierarchy/document.js';
import { createLogger, type Logger } from './logger.js';

export type LogMode = 'quiet' | 'normal' | 'verbose';

export interface ConversionConfig {
  dictionaryPath: string;
  schemaPath: string | null;
  /** `null` disables the on-disk metadata cache. */
  cacheDir: string | null;
  mode: ConversionMode;
  logMode: LogMode;
}

export const ENV_PREFIX = 'FLATNEST_';

export const DEFAULT_CACHE_DIR = path.join(os.homedir(), '.cache', 'flatnest');

const DISABLED_CACHE_VALUES = new Set(['none', 'off', 'false']);

function pick(
  options: Map<string, string>,
  env: NodeJS.ProcessEnv,
  option: string,
  variable: string
): string | undefined {
  const value = options.get(option) ?? env[`${ENV_PREFIX}${variable}`];
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseMode(value: string | undefined): ConversionMode {
  if (value === undefined || value === 'strict') {
    return 'strict';
  }
  if (value === 'permissive') {
    return 'permissive';
  }
  throw new Error(`Invalid mode '${value}'. Expected strict|permissive`);
}

function parseLogMode(value: string | undefined): LogMode {
  if (value === undefined) {
    return 'normal';
  }
  if (value === 'quiet' || value === 'normal' || value === 'verbose') {
    return value;
  }
  throw new Error(`Invalid log mode '${value}'. Expected quiet|normal|verbose`);
}

/** CLI options win over `FLATNEST_*` environment variables. */
export function resolveConversionConfig(
  options: Map<string, string>,
  env: NodeJS.ProcessEnv = process.env
): ConversionConfig {
  const dictionaryPath = pick(options, env, 'dictionary', 'DICTIONARY');
  if (!dictionaryPath) {
    throw new Error(`A dictionary is required: pass --dictionary or set ${ENV_PREFIX}DICTIONARY`);
  }

  const cacheDir = pick(options, env, 'cache-dir', 'CACHE_DIR');
  const schemaPath = pick(options, env, 'schema', 'SCHEMA');

  return {
    dictionaryPath: path.resolve(dictionaryPath),
    schemaPath: schemaPath ? path.resolve(schemaPath) : null,
    cacheDir:
      cacheDir === undefined
        ? DEFAULT_CACHE_DIR
        : DISABLED_CACHE_VALUES.has(cacheDir.toLowerCase())
          ? null
          : path.resolve(cacheDir),
    mode: parseMode(pick(options, env, 'mode', 'MODE')),
    logMode: parseLogMode(pick(options, env, 'log', 'LOG'))
  };
}

export function createConfiguredLogger(config: Pick<ConversionConfig, 'logMode'>): Logger {
  if (config.logMode === 'quiet') {
    return createLogger({ level: 'error' });
  }
  return createLogger({ level: config.logMode === 'verbose' ? 'debug' : 'info' });
}

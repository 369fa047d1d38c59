/**
 * Environment variable handling with validation
 */

import { join } from 'path';

export interface EnvConfig {
  dbPath: string;
  engineConfigPath: string | null;
  maxConcurrency: number | null;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  nodeEnv: 'development' | 'production' | 'test';
}

function getEnvVar(name: string): string | undefined {
  const value = process.env[name];
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function parsePositiveInt(raw: string | undefined): number | null {
  if (!raw) return null;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
}

const LOG_LEVELS: ReadonlyArray<EnvConfig['logLevel']> = ['debug', 'info', 'warn', 'error'];
const NODE_ENVS: ReadonlyArray<EnvConfig['nodeEnv']> = ['development', 'production', 'test'];

export function loadEnvConfig(): EnvConfig {
  const logLevelRaw = getEnvVar('LOG_LEVEL') ?? 'info';
  const nodeEnvRaw = getEnvVar('NODE_ENV') ?? 'development';

  return {
    // Read on every call so tests can point the store at a temp file
    dbPath: getEnvVar('FACTOR_DB_PATH') ?? join(process.cwd(), 'data', 'factors.db'),
    engineConfigPath: getEnvVar('FACTOR_ENGINE_CONFIG') ?? null,
    maxConcurrency: parsePositiveInt(getEnvVar('MAX_CONCURRENCY')),
    logLevel: LOG_LEVELS.find((level) => level === logLevelRaw) ?? 'info',
    nodeEnv: NODE_ENVS.find((env) => env === nodeEnvRaw) ?? 'development',
  };
}

import dotenv from 'dotenv';
import { ConfigError } from './core/errors';
import { isLogLevel, LogLevel } from './lib/logger';

export interface RelayConfig {
  port: number;
  databasePath: string;
  leaseMs: number;
  heartbeatIntervalMs: number;
  livenessFactor: number;
  reaperIntervalMs: number;
  sweepIntervalMs: number;
  jobTimeoutMs: number;
  graceMs: number;
  defaultMaxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  workerConcurrency: number;
  cleanupAfterDays: number;
  logLevel: LogLevel;
}

/** Timers must tick at least this many times per lease to avoid false reclaims. */
export const LEASE_SAFETY_FACTOR = 3;

/** Largest delay Node timers accept; anything above fires after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min} (got "${raw}")`);
  }
  if (value > max) {
    throw new ConfigError(`${name} must be at most ${max} (got "${raw}")`);
  }
  return value;
}

function readMs(env: Env, name: string, fallback: number, min: number): number {
  return readInt(env, name, fallback, min, MAX_TIMER_MS);
}

/**
 * Reads configuration from the environment. Call `loadDotenv()` first to
 * pick up a local .env file.
 */
export function loadConfig(env: Env = process.env): RelayConfig {
  const logLevel = env.LOG_LEVEL ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error, silent (got "${logLevel}")`);
  }

  const config: RelayConfig = {
    port: readInt(env, 'PORT', 3000, 0, 65_535),
    databasePath: env.DATABASE_PATH || './data/relay-queue.db',
    leaseMs: readMs(env, 'LEASE_MS', 30_000, 1),
    heartbeatIntervalMs: readMs(env, 'HEARTBEAT_INTERVAL_MS', 5_000, 1),
    livenessFactor: readInt(env, 'LIVENESS_FACTOR', 3, 1),
    reaperIntervalMs: readMs(env, 'REAPER_INTERVAL_MS', 5_000, 1),
    sweepIntervalMs: readMs(env, 'SWEEP_INTERVAL_MS', 1_000, 1),
    jobTimeoutMs: readMs(env, 'JOB_TIMEOUT_MS', 60_000, 1),
    graceMs: readMs(env, 'GRACE_MS', 2_000, 0),
    defaultMaxAttempts: readInt(env, 'DEFAULT_MAX_ATTEMPTS', 3, 1),
    backoffBaseMs: readMs(env, 'BACKOFF_BASE_MS', 1_000, 0),
    backoffMaxMs: readMs(env, 'BACKOFF_MAX_MS', 60_000, 0),
    workerConcurrency: readInt(env, 'WORKER_CONCURRENCY', 1, 1),
    cleanupAfterDays: readInt(env, 'CLEANUP_AFTER_DAYS', 0, 0),
    logLevel,
  };

  const maxCadence = config.leaseMs / LEASE_SAFETY_FACTOR;
  if (config.heartbeatIntervalMs > maxCadence) {
    throw new ConfigError(
      `HEARTBEAT_INTERVAL_MS (${config.heartbeatIntervalMs}) must be at most LEASE_MS / ${LEASE_SAFETY_FACTOR} (${maxCadence})`
    );
  }
  if (config.reaperIntervalMs > maxCadence) {
    throw new ConfigError(
      `REAPER_INTERVAL_MS (${config.reaperIntervalMs}) must be at most LEASE_MS / ${LEASE_SAFETY_FACTOR} (${maxCadence})`
    );
  }
  if (config.backoffMaxMs < config.backoffBaseMs) {
    throw new ConfigError('BACKOFF_MAX_MS must not be smaller than BACKOFF_BASE_MS');
  }

  return config;
}

export function loadDotenv(path?: string) {
  dotenv.config(path ? { path } : undefined);
}

import type {LogLevel} from '@rocicorp/logger';
import * as v from '../../shared/src/valita.ts';
import {DEFAULT_SPARSE_MAX_REGISTERS} from './redis-codec.ts';

const logLevelSchema: v.Type<LogLevel> = v.union(
  v.literal('debug'),
  v.literal('info'),
  v.literal('warn'),
  v.literal('error'),
);

const nonNegativeInteger = v
  .number()
  .assert(
    n => Number.isInteger(n) && n >= 0,
    'must be a non-negative integer',
  );

const configSchema = v.object({
  logLevel: logLevelSchema.optional(),
  redisSparseMaxRegisters: nonNegativeInteger.optional(),
});

export type Config = {
  logLevel: LogLevel;
  /** Populated register limit for the Redis sparse encoding. */
  redisSparseMaxRegisters: number;
};

export const DEFAULT_LOG_LEVEL: LogLevel = 'error';

/**
 * Validates `input` and fills in defaults. Throws a `TypeError` describing
 * the first invalid field.
 */
export function parseConfig(input: unknown = {}): Config {
  const parsed = v.parse(input, configSchema);
  return {
    logLevel: parsed.logLevel ?? DEFAULT_LOG_LEVEL,
    redisSparseMaxRegisters:
      parsed.redisSparseMaxRegisters ?? DEFAULT_SPARSE_MAX_REGISTERS,
  };
}

/**
 * Reads `HLL_LOG_LEVEL` and `HLL_REDIS_SPARSE_MAX_REGISTERS`.
 */
export function configFromEnv(
  env: Record<string, string | undefined>,
): Config {
  const input: Record<string, unknown> = {};
  const logLevel = env.HLL_LOG_LEVEL;
  const sparseMax = env.HLL_REDIS_SPARSE_MAX_REGISTERS;
  if (logLevel !== undefined && logLevel !== '') {
    input.logLevel = logLevel;
  }
  if (sparseMax !== undefined && sparseMax !== '') {
    input.redisSparseMaxRegisters = /^\d+$/.test(sparseMax)
      ? Number(sparseMax)
      : sparseMax;
  }
  return parseConfig(input);
}

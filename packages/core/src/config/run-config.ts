/**
 * Run configuration: environment variables validated once per process.
 *
 * Everything has a default so a bare `node` invocation reconciles with the
 * same settings the downstream upload tool expects.
 */

import { z } from 'zod';
import { assertValidated } from '@mastersync/shared';
import { LOG_LEVELS, setLogLevel } from '../observability/logger';
import type { LogLevel } from '../observability/logger';

export interface RunConfig {
  logLevel: LogLevel;
  changeSet: {
    chunkSize: number;
  };
  users: {
    retirementSentinel: string;
    departmentColumn: string;
    groupColumnCount: number;
  };
}

const envSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).catch('info'),
  CHANGESET_CHUNK_SIZE: z.coerce.number().int().positive().default(100),
  RETIREMENT_SENTINEL: z.string().min(1).default('SYS_RETIRE'),
  USER_DEPARTMENT_COLUMN: z.string().min(1).default('department_code'),
  USER_GROUP_COLUMN_COUNT: z.coerce.number().int().min(0).default(10),
});

let _config: RunConfig | null = null;

export function loadRunConfig(env: Record<string, string | undefined>): RunConfig {
  const parsed = envSchema.safeParse(env);
  assertValidated(parsed, 'Invalid run configuration');
  const e = parsed.data;

  return {
    logLevel: e.LOG_LEVEL,
    changeSet: {
      chunkSize: e.CHANGESET_CHUNK_SIZE,
    },
    users: {
      retirementSentinel: e.RETIREMENT_SENTINEL,
      departmentColumn: e.USER_DEPARTMENT_COLUMN,
      groupColumnCount: e.USER_GROUP_COLUMN_COUNT,
    },
  };
}

/** Loads the config on first call and applies its log level to the logger. */
export function getRunConfig(): RunConfig {
  if (_config) return _config;
  _config = loadRunConfig(process.env);
  setLogLevel(_config.logLevel);
  return _config;
}

/** Reset cached config (for testing) */
export function resetRunConfig(): void {
  _config = null;
}

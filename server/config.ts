/**
 * Server configuration loaded from the environment
 * `.env` is read by dotenv in the entrypoint before this is called
 */

import { z } from 'zod';
import type { IdStrategy } from './types';
import { formatZodIssues } from './utils/error-handler';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

// An empty variable (`PORT=`) falls back to the default
const blankAsUnset = (value: unknown) => (value === '' ? undefined : value);

const envSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.preprocess(
    blankAsUnset,
    z.coerce.number().int().min(0).max(65535).default(5002)
  ),
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  POST_ID_STRATEGY: z.enum(['length', 'sequence']).default('length'),
  BODY_LIMIT_BYTES: z.preprocess(
    blankAsUnset,
    z.coerce.number().int().positive().default(1024 * 1024)
  ),
  LOG_REQUESTS: booleanFlag.default('true'),
});

export interface ServerConfig {
  host: string;
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  idStrategy: IdStrategy;
  bodyLimitBytes: number;
  logRequests: boolean;
}

/**
 * Parse configuration from an environment map
 * @throws Error naming every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new Error(`Invalid configuration: ${formatZodIssues(result.error)}`);
  }

  const parsed = result.data;
  return {
    host: parsed.HOST,
    port: parsed.PORT,
    nodeEnv: parsed.NODE_ENV,
    idStrategy: parsed.POST_ID_STRATEGY,
    bodyLimitBytes: parsed.BODY_LIMIT_BYTES,
    logRequests: parsed.LOG_REQUESTS,
  };
}

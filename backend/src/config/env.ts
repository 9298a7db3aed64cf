/**
 * ENVIRONMENT CONFIG
 * ==================
 *
 * Parsed once at import. Defaults keep local runs and tests zero-config.
 */

import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('*'),

  // Asset graph
  GRAPH_LAYOUT_SEED: z.coerce.number().int().default(42),
  GRAPH_TOP_N: z.coerce.number().int().min(1).max(100).default(10),
  GRAPH_LOAD_SAMPLE: booleanFlag.default('true'),
  GRAPH_SAMPLE_PATH: z.string().default('backend/data/sample-universe.json'),
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return EnvSchema.parse(source);
}

export const env: Env = parseEnv(process.env);

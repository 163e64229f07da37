import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  NODE_ENV: z.string().default('development'),

  // Optional user YAML merged over config/default.yaml
  OC_CONFIG: z.string().optional(),

  OC_OUTPUT_DIR: z.string().default('output'),
  OC_TEMPLATE: z.string().default('template/NSE Option Chain.xlsx'),

  // Polling cadence and retry budget
  OC_POLL_SECONDS: z.coerce.number().int().positive().default(30),
  OC_RETRY_SECONDS: z.coerce.number().int().nonnegative().default(20),
  OC_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),
  OC_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),

  // Live feed (--serve)
  PORT: z.coerce.number().int().positive().default(3001),
});

export type EnvConfig = z.infer<typeof envSchema>;

export const parseEnv = (env: NodeJS.ProcessEnv): EnvConfig => envSchema.parse(env);

const config = parseEnv(process.env);

export default config;

import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const booleanFlag = z
  .enum(['true', 'false'])
  .default('true')
  .transform((value) => value === 'true');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(8000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  DB_CONNECTION_STRING: z.string().optional(),
  DB_POOL_MAX: z.coerce.number().int().positive().default(20),
  DB_POOL_IDLE_TIMEOUT: z.coerce.number().int().min(0).default(30000),
  DB_POOL_CONNECTION_TIMEOUT: z.coerce.number().int().min(0).default(2000),

  AWS_REGION: z.string().default('us-east-1'),
  AWS_ACCESS_KEY_ID: z.string().optional(),
  AWS_SECRET_ACCESS_KEY: z.string().optional(),
  S3_BUCKET_NAME: z.string().optional(),

  GCP_PROJECT_ID: z.string().optional(),
  GCP_LOCATION: z.string().default('us'),
  GCP_OCR_PROCESSOR_ID: z.string().optional(),

  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().default('gemini-2.0-flash'),

  REGISTRY_AGENT_URL: z.string().url().default('http://localhost:8001'),
  REGISTRY_AGENT_TIMEOUT_MS: z.coerce.number().int().positive().default(180000),
  REGISTRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(3).default(3),
  REGISTRY_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(2000),

  DOWNLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  CALLBACK_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),

  AUTH_MIN_FILE_SIZE_KB: z.coerce.number().min(0).default(10),
  AUTH_MAX_FILE_SIZE_KB: z.coerce.number().positive().default(5120),
  AUTH_MAX_MODIFICATION_SKEW_SECONDS: z.coerce.number().int().min(0).default(3600),

  COMPARE_RETRIEVED_COPY: booleanFlag,
  QUEUE_MAX_CONCURRENT: z.coerce.number().int().min(1).default(3),
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return Object.freeze(parsed.data);
}

export const config = loadConfig();

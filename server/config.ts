import 'dotenv/config';
import path from 'node:path';
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(5001),
  LOG_DIR: z.string().default(path.resolve(process.cwd(), 'logs')),
  LOG_TO_FILE: booleanFlag.optional(),
  UPLOAD_MAX_MB: z.coerce.number().positive().default(10),
  DEMO_RECORD_COUNT: z.coerce.number().int().min(0).default(2000),
  DEMO_SEED: z.coerce.number().int().min(0).max(0xffffffff).default(42),
  SESSION_COOKIE_NAME: z.string().min(1).default('dataset_session'),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
});

export interface AppConfig {
  env: string;
  isProduction: boolean;
  port: number;
  logDir: string;
  logToFile: boolean;
  uploadMaxBytes: number;
  demoRecordCount: number;
  demoSeed: number;
  sessionCookieName: string;
  rateLimitMax: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Некорректная конфигурация окружения: ${details}`);
  }

  const values = parsed.data;
  const isTest = values.NODE_ENV === 'test';

  return {
    env: values.NODE_ENV,
    isProduction: values.NODE_ENV === 'production',
    port: values.PORT,
    logDir: values.LOG_DIR,
    // Тесты не пишут в файл, если явно не попросили
    logToFile: values.LOG_TO_FILE ?? !isTest,
    uploadMaxBytes: Math.round(values.UPLOAD_MAX_MB * 1024 * 1024),
    demoRecordCount: values.DEMO_RECORD_COUNT,
    demoSeed: values.DEMO_SEED,
    sessionCookieName: values.SESSION_COOKIE_NAME,
    rateLimitMax: values.RATE_LIMIT_MAX,
  };
}

export const config = loadConfig();

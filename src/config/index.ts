import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const booleanFlag = (fallback: 'true' | 'false') =>
  z.string().transform(val => val !== 'false').default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'silent']).default('info'),

  // Storage
  STORAGE_DRIVER: z.enum(['sqlite', 'supabase']).default('sqlite'),
  DATABASE_PATH: z.string().min(1).default('./data/patients.db'),
  NAME_MATCHING: z.enum(['exact', 'case-insensitive']).default('exact'),
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_KEY: z.string().min(1).optional(),

  // OCR
  OCR_ENGINE: z.enum(['tesseract', 'gemini']).default('tesseract'),
  TESSERACT_CMD: z.string().min(1).default('tesseract'),
  OCR_LANGUAGE: z.string().min(1).default('eng'),
  OCR_PSM: z.string().transform(Number).pipe(z.number().int().min(0).max(13)).default('6'),
  GEMINI_API_KEY: z.string().optional(),
  OCR_GEMINI_MODEL: z.string().default('gemini-2.0-flash'),
  OCR_TIMEOUT_MS: z.string().transform(Number).pipe(z.number().int().positive()).default('60000'),
  OCR_MAX_ATTEMPTS: z.string().transform(Number).pipe(z.number().int().min(1).max(10)).default('2'),
  OCR_PAGE_CONCURRENCY: z.string().transform(Number).pipe(z.number().int().min(1).max(16)).default('2'),
  OCR_LOW_CONFIDENCE: z.string().transform(Number).pipe(z.number().min(0).max(1)).default('0.6'),
  OCR_ENHANCE: booleanFlag('true'),
  OCR_TEMP_DIR: z.string().default('/tmp/intake-ocr'),
  PDF_VIEWPORT_SCALE: z.string().transform(Number).pipe(z.number().min(0.5).max(6)).default('2.0'),

  // Parsing
  DATE_ORDER: z.enum(['MDY', 'DMY']).optional(),
});

export type EnvInput = Record<string, string | undefined>;

export function loadConfig(source: EnvInput = process.env) {
  const env = envSchema.parse(source);

  return {
    env: env.NODE_ENV,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
    logging: {
      level: env.LOG_LEVEL,
    },
    storage: {
      driver: env.STORAGE_DRIVER,
      databasePath: env.DATABASE_PATH,
      nameMatching: env.NAME_MATCHING,
      supabase: env.SUPABASE_URL && env.SUPABASE_SERVICE_KEY
        ? { url: env.SUPABASE_URL, serviceKey: env.SUPABASE_SERVICE_KEY }
        : null,
    },
    ocr: {
      engine: env.OCR_ENGINE,
      tesseract: {
        command: env.TESSERACT_CMD,
        language: env.OCR_LANGUAGE,
        pageSegmentationMode: env.OCR_PSM,
      },
      gemini: {
        apiKey: env.GEMINI_API_KEY,
        model: env.OCR_GEMINI_MODEL,
      },
      timeoutMs: env.OCR_TIMEOUT_MS,
      maxAttempts: env.OCR_MAX_ATTEMPTS,
      pageConcurrency: env.OCR_PAGE_CONCURRENCY,
      lowConfidenceThreshold: env.OCR_LOW_CONFIDENCE,
      enhance: env.OCR_ENHANCE,
      tempDir: env.OCR_TEMP_DIR,
      viewportScale: env.PDF_VIEWPORT_SCALE,
    },
    parsing: {
      dateOrder: env.DATE_ORDER,
    },
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const config: AppConfig = loadConfig();

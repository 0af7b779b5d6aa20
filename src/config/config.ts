import { z } from 'zod';
import { ConfigError } from '../core/errors.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const ConfigSchema = z
  .object({
    SEC_USER_AGENT: z
      .string()
      .min(1)
      .default('riskdrift-cli admin@example.com')
      .refine((v) => v.includes('@'), 'must contain a contact e-mail address'),
    SEC_RATE_LIMIT_MS: z.coerce.number().int().min(0).default(120),
    HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
    OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
    ANALYSIS_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
    CACHE_DIR: z.string().min(1).default('.cache'),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    CHUNK_MAX_CHARS: z.coerce.number().int().positive().default(6000),
    CHUNK_OVERLAP_CHARS: z.coerce.number().int().min(0).default(400),
    ANALYSIS_CONCURRENCY: z.coerce.number().int().positive().default(4),
    BATCH_CONCURRENCY: z.coerce.number().int().positive().default(2),
    RETRY_ATTEMPTS: z.coerce.number().int().min(0).default(2),
    RETRY_DELAY_MS: z.coerce.number().int().min(0).default(2000),
    AGGREGATION: z.enum(['weighted-mean', 'max-severity']).default('weighted-mean'),
    COMPARE_YEARS: z.coerce.number().int().min(2).max(10).default(3),
  })
  .refine((c) => c.CHUNK_OVERLAP_CHARS < c.CHUNK_MAX_CHARS, {
    message: 'CHUNK_OVERLAP_CHARS must be smaller than CHUNK_MAX_CHARS',
    path: ['CHUNK_OVERLAP_CHARS'],
  });

export type EnvConfig = z.infer<typeof ConfigSchema>;

export interface AppConfig {
  sec: { userAgent: string; rateLimitMs: number; timeoutMs: number };
  openai: { apiKey?: string; model: string; temperature: number; timeoutMs: number };
  cacheDir: string;
  logLevel: EnvConfig['LOG_LEVEL'];
  chunk: { maxChars: number; overlapChars: number };
  analysisConcurrency: number;
  batchConcurrency: number;
  retry: { attempts: number; delayMs: number };
  aggregation: EnvConfig['AGGREGATION'];
  /** Fiscal years compared when the command line names none. */
  compareYears: number;
}

/**
 * Reads configuration from the environment. Empty strings count as unset so
 * that a blank line in `.env` falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value.trim();
  }

  const parsed = ConfigSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.') || 'config'}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const c = parsed.data;
  return {
    sec: { userAgent: c.SEC_USER_AGENT, rateLimitMs: c.SEC_RATE_LIMIT_MS, timeoutMs: c.HTTP_TIMEOUT_MS },
    openai: {
      apiKey: c.OPENAI_API_KEY,
      model: c.OPENAI_MODEL,
      temperature: c.OPENAI_TEMPERATURE,
      timeoutMs: c.ANALYSIS_TIMEOUT_MS,
    },
    cacheDir: c.CACHE_DIR,
    logLevel: c.LOG_LEVEL,
    chunk: { maxChars: c.CHUNK_MAX_CHARS, overlapChars: c.CHUNK_OVERLAP_CHARS },
    analysisConcurrency: c.ANALYSIS_CONCURRENCY,
    batchConcurrency: c.BATCH_CONCURRENCY,
    retry: { attempts: c.RETRY_ATTEMPTS, delayMs: c.RETRY_DELAY_MS },
    aggregation: c.AGGREGATION,
    compareYears: c.COMPARE_YEARS,
  };
}

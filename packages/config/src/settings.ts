/**
 * Immutable application settings, validated from environment variables
 */

import { z } from 'zod';

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const SettingsSchema = z.object({
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  DEFAULT_AI_MODEL: z.string().min(1).default('gpt-4-turbo-preview'),
  EMBEDDING_MODEL: z.string().min(1).default('text-embedding-ada-002'),
  LLM_TIMEOUT_MS: intFromEnv(120000),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  DATABASE_PATH: z.string().min(1).default('./data/knowledge-expiry.sqlite'),
  QDRANT_URL: z.string().url().default('http://localhost:6333'),
  QDRANT_API_KEY: optionalString,
  QDRANT_COLLECTION_NAME: z.string().min(1).default('knowledge_documents'),
  QDRANT_TIMEOUT_MS: intFromEnv(30000),
  VECTOR_SIZE: intFromEnv(1536),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  MAX_FILE_SIZE_MB: intFromEnv(50),
  BATCH_SIZE: intFromEnv(10),
  ENUM_DECODING: z.enum(['strict', 'lenient']).default('strict'),
});

export type EnumDecoding = 'strict' | 'lenient';

export interface Settings {
  readonly ai: {
    readonly apiKey: string | undefined;
    readonly baseUrl: string;
    readonly model: string;
    readonly embeddingModel: string;
    readonly timeoutMs: number;
    readonly maxRetries: number;
  };
  readonly database: {
    readonly path: string;
  };
  readonly qdrant: {
    readonly url: string;
    readonly apiKey: string | undefined;
    readonly collection: string;
    readonly timeoutMs: number;
    readonly vectorSize: number;
  };
  readonly logLevel: string;
  readonly maxFileSizeMb: number;
  readonly batchSize: number;
  readonly enumDecoding: EnumDecoding;
}

/**
 * Build the settings value from an environment map (process.env by default)
 * @throws Error listing every invalid variable
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  // Blank values count as unset so defaults apply
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim().length > 0) {
      cleaned[key] = value;
    }
  }

  const result = SettingsSchema.safeParse(cleaned);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
  }

  const values = result.data;
  return Object.freeze({
    ai: Object.freeze({
      apiKey: values.OPENAI_API_KEY,
      baseUrl: values.OPENAI_BASE_URL.replace(/\/+$/, ''),
      model: values.DEFAULT_AI_MODEL,
      embeddingModel: values.EMBEDDING_MODEL,
      timeoutMs: values.LLM_TIMEOUT_MS,
      maxRetries: values.LLM_MAX_RETRIES,
    }),
    database: Object.freeze({ path: values.DATABASE_PATH }),
    qdrant: Object.freeze({
      url: values.QDRANT_URL.replace(/\/+$/, ''),
      apiKey: values.QDRANT_API_KEY,
      collection: values.QDRANT_COLLECTION_NAME,
      timeoutMs: values.QDRANT_TIMEOUT_MS,
      vectorSize: values.VECTOR_SIZE,
    }),
    logLevel: values.LOG_LEVEL,
    maxFileSizeMb: values.MAX_FILE_SIZE_MB,
    batchSize: values.BATCH_SIZE,
    enumDecoding: values.ENUM_DECODING,
  });
}

/**
 * Environment keys read by loadSettings, for diagnostics
 */
export const SETTINGS_KEYS = Object.keys(SettingsSchema.shape);

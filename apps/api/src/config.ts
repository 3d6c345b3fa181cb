import { DEFAULT_RETRY_MAX_ATTEMPTS, DEFAULT_RETRY_MAX_DELAY_MS } from '@context-qa/core';
import { z } from 'zod';

export const REQUIRED_ENV_VARS = ['BUCKET_NAME', 'BLOB_NAME', 'PROJECT_ID', 'LOCATION', 'CACHE_NAME'] as const;

const DEFAULT_MODEL_NAME = 'gemini-1.5-flash-002';
const DEFAULT_CACHE_TTL_SECONDS = 360 * 24 * 60 * 60;

const requiredString = z.string().trim().min(1);

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  BUCKET_NAME: requiredString,
  BLOB_NAME: requiredString,
  PROJECT_ID: requiredString,
  LOCATION: requiredString,
  CACHE_NAME: requiredString,
  PORT: z.coerce.number().int().min(1).max(65_535).default(8080),
  MODEL_NAME: optionalString,
  CLEANUP_MODEL_NAME: optionalString,
  CACHE_TTL_SECONDS: positiveInt(DEFAULT_CACHE_TTL_SECONDS),
  DOCUMENT_MIME_TYPE: optionalString,
  SYSTEM_INSTRUCTIONS_PATH: optionalString,
  PROMPT_TEMPLATE_PATH: optionalString,
  CORS_ALLOW_ORIGINS: optionalString,
  RETRY_MAX_ATTEMPTS: positiveInt(DEFAULT_RETRY_MAX_ATTEMPTS),
  RETRY_MAX_DELAY_MS: positiveInt(DEFAULT_RETRY_MAX_DELAY_MS)
});

export interface ApiConfig {
  port: number;
  projectId: string;
  location: string;
  cacheName: string;
  documentUri: string;
  documentMimeType: string;
  model: string;
  cleanupModel: string;
  cacheTtlSeconds: number;
  systemInstructionsPath: string;
  promptTemplatePath: string;
  corsOrigins: string[];
  retry: {
    maxAttempts: number;
    maxDelayMs: number;
  };
}

export class ConfigError extends Error {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.missing = missing;
  }
}

const parseCsv = (value: string | undefined): string[] =>
  (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

// Unset and blank values are both treated as missing.
const missingRequired = (env: NodeJS.ProcessEnv): string[] =>
  REQUIRED_ENV_VARS.filter((name) => !env[name]?.trim());

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ApiConfig => {
  const missing = missingRequired(env);
  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variable(s): ${missing.join(', ')}`, missing);
  }

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid environment configuration: ${details}`);
  }

  const values = parsed.data;
  const model = values.MODEL_NAME ?? DEFAULT_MODEL_NAME;

  return {
    port: values.PORT,
    projectId: values.PROJECT_ID,
    location: values.LOCATION,
    cacheName: values.CACHE_NAME,
    documentUri: `gs://${values.BUCKET_NAME}/${values.BLOB_NAME}`,
    documentMimeType: values.DOCUMENT_MIME_TYPE ?? 'text/markdown',
    model,
    cleanupModel: values.CLEANUP_MODEL_NAME ?? model,
    cacheTtlSeconds: values.CACHE_TTL_SECONDS,
    systemInstructionsPath: values.SYSTEM_INSTRUCTIONS_PATH ?? './system_instructions.txt',
    promptTemplatePath: values.PROMPT_TEMPLATE_PATH ?? './prompt_template.txt',
    corsOrigins: parseCsv(values.CORS_ALLOW_ORIGINS),
    retry: {
      maxAttempts: values.RETRY_MAX_ATTEMPTS,
      maxDelayMs: values.RETRY_MAX_DELAY_MS
    }
  };
};

import { z } from 'zod';
import {
  BEDROCK_MODELS,
  DEFAULT_MODEL_ID,
  SUPPORTED_REGIONS,
  getModelInfo,
  type SupportedRegion,
} from './providers/models.js';

const envBoolean = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform(value => (value === undefined || value === '' ? fallback : value.trim().toLowerCase() === 'true'));

const envNumber = (fallback: number) =>
  z
    .string()
    .optional()
    .transform(value => (value === undefined || value.trim() === '' ? fallback : Number(value)));

const envList = z
  .string()
  .optional()
  .transform(value => (value ?? '').split(',').map(item => item.trim()).filter(item => item.length > 0));

export const EnvSchema = z.object({
  AWS_REGION: z.enum(SUPPORTED_REGIONS).default('us-east-1'),
  BEDROCK_MODEL_ID: z
    .string()
    .default(DEFAULT_MODEL_ID)
    .refine(id => getModelInfo(id) !== undefined, {
      message: `Must be one of: ${Object.keys(BEDROCK_MODELS).join(', ')}`,
    }),
  BEDROCK_TEMPERATURE: envNumber(0).pipe(z.number().min(0).max(1)),
  BEDROCK_MAX_TOKENS: envNumber(8192).pipe(z.number().int().positive()),
  BEDROCK_USE_CROSS_REGION: envBoolean(false),
  BEDROCK_MAX_RETRIES: envNumber(3).pipe(z.number().int().nonnegative()),
  BEDROCK_TIMEOUT: envNumber(30).pipe(z.number().positive()),
  BEDROCK_CACHE_RESPONSES: envBoolean(true),
  BEDROCK_CACHE_MAX_ENTRIES: envNumber(1000).pipe(z.number().int().positive()),
  BEDROCK_CACHE_TTL_MS: envNumber(0).pipe(z.number().int().nonnegative()),
  BEDROCK_ANTHROPIC_BETA: envList,
  PORT: envNumber(8000).pipe(z.number().int().min(0).max(65535)),
  HOST: z.string().default('0.0.0.0'),
  CORS_ORIGIN: z.string().default('*'),
});

export interface AppConfig {
  region: SupportedRegion;
  modelId: string;
  temperature: number;
  maxTokens: number;
  useCrossRegion: boolean;
  maxRetries: number;
  /** Seconds. */
  timeout: number;
  cacheResponses: boolean;
  cacheMaxEntries: number;
  cacheTtlMs: number;
  anthropicBeta: string[];
  headers: Readonly<Record<string, string>>;
  port: number;
  host: string;
  corsOrigin: string;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

const DEFAULT_HEADERS = Object.freeze({
  'Content-Type': 'application/json',
  Accept: 'application/json',
});

/**
 * Read and validate configuration once at startup. Every problem is reported
 * together rather than on first use.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const e = parsed.data;

  return {
    region: e.AWS_REGION,
    modelId: e.BEDROCK_MODEL_ID,
    temperature: e.BEDROCK_TEMPERATURE,
    maxTokens: e.BEDROCK_MAX_TOKENS,
    useCrossRegion: e.BEDROCK_USE_CROSS_REGION,
    maxRetries: e.BEDROCK_MAX_RETRIES,
    timeout: e.BEDROCK_TIMEOUT,
    cacheResponses: e.BEDROCK_CACHE_RESPONSES,
    cacheMaxEntries: e.BEDROCK_CACHE_MAX_ENTRIES,
    cacheTtlMs: e.BEDROCK_CACHE_TTL_MS,
    anthropicBeta: e.BEDROCK_ANTHROPIC_BETA,
    headers: DEFAULT_HEADERS,
    port: e.PORT,
    host: e.HOST,
    corsOrigin: e.CORS_ORIGIN,
  };
}

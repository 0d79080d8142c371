import { z } from 'zod';

import { NodeEnvs } from '.';


/******************************************************************************
                                 Schema
******************************************************************************/

const EnvSchema = z.object({
  NODE_ENV: z.nativeEnum(NodeEnvs).default(NodeEnvs.Dev),
  PORT: z.coerce.number().int().positive().default(3000),
  MONGODB_URI: z.string().default(''),
  JWT_SECRET: z.string().default(''),
  ALLOWED_ORIGINS: z.string().default('http://localhost:4200'),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),
  UPLOAD_MAX_BYTES: z.coerce.number().int().positive().default(20 * 1024 * 1024),

  // Skip-trace provider
  SKIP_TRACE_API_URL: z.string().default(''),
  SKIP_TRACE_API_KEY: z.string().default(''),
  ENRICHMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  ENRICHMENT_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  ENRICHMENT_BACKOFF_MS: z.coerce.number().int().min(0).default(1000),
  ENRICHMENT_CONCURRENCY: z.coerce.number().int().positive().default(4),
  ENRICHMENT_MAX_AGE_DAYS: z.coerce.number().min(0).default(0),
  ENRICHMENT_HOT_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(60 * 60),

  // Pipeline
  PIPELINE_CONCURRENCY: z.coerce.number().int().positive().default(8),
  // Must outlast one row's worst case (timeout x attempts + backoff)
  PIPELINE_LEASE_SECONDS: z.coerce.number().int().positive().default(120),
  FIELD_ALIASES_PATH: z.string().optional(),
});

const parsed = EnvSchema.parse(process.env);


/******************************************************************************
                                 Export
******************************************************************************/

export default {
  NodeEnv: parsed.NODE_ENV,
  Port: parsed.PORT,
  MongodbUri: parsed.MONGODB_URI,
  JwtSecret: parsed.JWT_SECRET,
  AllowedOrigins: parsed.ALLOWED_ORIGINS
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean),
  RateLimitMaxRequests: parsed.RATE_LIMIT_MAX_REQUESTS,
  UploadMaxBytes: parsed.UPLOAD_MAX_BYTES,
  SkipTrace: {
    ApiUrl: parsed.SKIP_TRACE_API_URL,
    ApiKey: parsed.SKIP_TRACE_API_KEY,
    TimeoutMs: parsed.ENRICHMENT_TIMEOUT_MS,
    MaxAttempts: parsed.ENRICHMENT_MAX_ATTEMPTS,
    BackoffMs: parsed.ENRICHMENT_BACKOFF_MS,
    Concurrency: parsed.ENRICHMENT_CONCURRENCY,
  },
  Enrichment: {
    MaxAgeDays: parsed.ENRICHMENT_MAX_AGE_DAYS,
    HotCacheTtlSeconds: parsed.ENRICHMENT_HOT_CACHE_TTL_SECONDS,
  },
  PipelineConcurrency: parsed.PIPELINE_CONCURRENCY,
  PipelineLeaseMs: parsed.PIPELINE_LEASE_SECONDS * 1000,
  FieldAliasesPath: parsed.FIELD_ALIASES_PATH,
} as const;

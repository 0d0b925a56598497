import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import { ConfigError } from '../common/pipeline-error';

/**
 * Bounded exponential backoff for store writes.
 * Delay before retry n (1-based) is
 * min(retryIntervalMs * exponentialBase^(n-1), maxRetryDelayMs).
 */
export interface RetryPolicy {
  maxRetries: number;
  retryIntervalMs: number;
  maxRetryDelayMs: number;
  exponentialBase: number;
}

export interface InfluxSettings {
  url: string;
  token: string;
  org: string;
  bucket: string;
  timeoutMs: number;
}

export interface EndpointSettings {
  url: string;
  user: string;
  password: string;
  attempts: number;
  retryDelayMs: number;
}

export interface UpstreamSettings {
  live: EndpointSettings;
  daily: EndpointSettings;
  timeoutMs: number;
}

/**
 * Process-wide configuration, built once at start-up and injected
 * into every component.
 */
export interface PipelineConfig {
  /** IANA zone of the wall-clock timestamps the API reports */
  timezone: string;
  timestampField: string;
  batchSize: number;
  writeDelayMs: number;
  retry: RetryPolicy;
  /** Target period between live polls */
  cadenceMs: number;
  /** Pause between (date, range) units in range mode */
  unitDelayMs: number;
  outputDir: string;
  logDir: string;
  ledgerPath: string;
  mappingsPath: string;
  influx: InfluxSettings;
  upstream: UpstreamSettings;
}

function isKnownTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

const count = (fallback: number) => z.coerce.number().int().min(0).default(fallback);
const positive = (fallback: number) => z.coerce.number().int().min(1).default(fallback);

const envSchema = z.object({
  PIPELINE_TIMEZONE: z
    .string()
    .default('Asia/Kolkata')
    .refine(isKnownTimeZone, { message: 'unknown IANA time zone' }),
  PIPELINE_TIMESTAMP_FIELD: z.string().min(1).default('Timelogged'),
  PIPELINE_BATCH_SIZE: positive(5000),
  PIPELINE_WRITE_DELAY_MS: count(5000),
  PIPELINE_CADENCE_MS: count(120_000),
  PIPELINE_UNIT_DELAY_MS: count(0),
  PIPELINE_OUTPUT_DIR: z.string().min(1).default('output'),
  PIPELINE_LOG_DIR: z.string().min(1).default('logs'),
  PIPELINE_LEDGER_PATH: z.string().min(1).default('db/run_metadata.db'),
  PIPELINE_MAPPINGS_PATH: z
    .string()
    .min(1)
    .default('config/field-mappings.json'),

  WRITE_MAX_RETRIES: count(5),
  WRITE_RETRY_INTERVAL_MS: count(5000),
  WRITE_MAX_RETRY_DELAY_MS: count(30_000),
  WRITE_EXPONENTIAL_BASE: z.coerce.number().min(1).default(2),

  INFLUX_URL: z.string().url().default('http://localhost:8086'),
  INFLUX_TOKEN: z.string().default(''),
  INFLUX_ORG: z.string().default(''),
  INFLUX_BUCKET: z.string().default(''),
  INFLUX_TIMEOUT_MS: positive(30_000),

  API_URL_LIVE: z.string().default(''),
  API_USER_LIVE: z.string().default(''),
  API_PASSWORD_LIVE: z.string().default(''),
  API_URL_DAILY: z.string().default(''),
  API_USER_DAILY: z.string().default(''),
  API_PASSWORD_DAILY: z.string().default(''),
  API_TIMEOUT_MS: positive(60_000),
  API_LIVE_ATTEMPTS: positive(3),
  API_LIVE_RETRY_DELAY_MS: count(5000),
  API_DAILY_ATTEMPTS: positive(3),
  API_DAILY_RETRY_DELAY_MS: count(10_000),
});

/**
 * Build the pipeline configuration from environment variables.
 *
 * @throws ConfigError listing every invalid variable
 */
export function parsePipelineConfig(
  env: Record<string, string | undefined>,
): PipelineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid pipeline configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    timezone: e.PIPELINE_TIMEZONE,
    timestampField: e.PIPELINE_TIMESTAMP_FIELD,
    batchSize: e.PIPELINE_BATCH_SIZE,
    writeDelayMs: e.PIPELINE_WRITE_DELAY_MS,
    retry: {
      maxRetries: e.WRITE_MAX_RETRIES,
      retryIntervalMs: e.WRITE_RETRY_INTERVAL_MS,
      maxRetryDelayMs: e.WRITE_MAX_RETRY_DELAY_MS,
      exponentialBase: e.WRITE_EXPONENTIAL_BASE,
    },
    cadenceMs: e.PIPELINE_CADENCE_MS,
    unitDelayMs: e.PIPELINE_UNIT_DELAY_MS,
    outputDir: e.PIPELINE_OUTPUT_DIR,
    logDir: e.PIPELINE_LOG_DIR,
    ledgerPath: e.PIPELINE_LEDGER_PATH,
    mappingsPath: e.PIPELINE_MAPPINGS_PATH,
    influx: {
      url: e.INFLUX_URL,
      token: e.INFLUX_TOKEN,
      org: e.INFLUX_ORG,
      bucket: e.INFLUX_BUCKET,
      timeoutMs: e.INFLUX_TIMEOUT_MS,
    },
    upstream: {
      live: {
        url: e.API_URL_LIVE,
        user: e.API_USER_LIVE,
        password: e.API_PASSWORD_LIVE,
        attempts: e.API_LIVE_ATTEMPTS,
        retryDelayMs: e.API_LIVE_RETRY_DELAY_MS,
      },
      daily: {
        url: e.API_URL_DAILY,
        user: e.API_USER_DAILY,
        password: e.API_PASSWORD_DAILY,
        attempts: e.API_DAILY_ATTEMPTS,
        retryDelayMs: e.API_DAILY_RETRY_DELAY_MS,
      },
      timeoutMs: e.API_TIMEOUT_MS,
    },
  };
}

export const pipelineConfig = registerAs('pipeline', () =>
  parsePipelineConfig(process.env),
);

import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './utils/errors';
import type { LogLevel } from './utils/logger';

// ==========================================
// SCHEMA
// ==========================================
const DeviceSchema = z.enum(['cpu', 'cuda', 'mps']);

const EnvSchema = z.object({
  MODEL_SERVER_URL: z.string().url().default('http://127.0.0.1:8000'),
  MODEL_DEVICE: DeviceSchema.default('cpu'),
  DETECTOR_MODEL: z.string().min(1).default('microsoft/Florence-2-large'),
  SEGMENTER_MODEL: z.string().min(1).default('checkpoints/sam2.1_hiera_large.pt'),
  CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.3),
  CACHE_MAX_ENTRIES: z.coerce.number().int().min(0).default(0),
  INFERENCE_TIMEOUT_MS: z.coerce.number().int().min(0).default(120_000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type PipelineConfig = {
  modelServerUrl: string;
  device: z.infer<typeof DeviceSchema>;
  detectorModel: string;
  segmenterModel: string;
  confidenceThreshold: number;
  cacheMaxEntries: number;  // 0 = unbounded
  inferenceTimeoutMs: number;  // 0 = no timeout
  logLevel: LogLevel;
};

// ==========================================
// LOADING
// ==========================================

/**
 * Read pipeline settings from the environment. Empty strings count as unset.
 * Throws ConfigError listing every invalid key.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value.trim();
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  return {
    modelServerUrl: values.MODEL_SERVER_URL,
    device: values.MODEL_DEVICE,
    detectorModel: values.DETECTOR_MODEL,
    segmenterModel: values.SEGMENTER_MODEL,
    confidenceThreshold: values.CONFIDENCE_THRESHOLD,
    cacheMaxEntries: values.CACHE_MAX_ENTRIES,
    inferenceTimeoutMs: values.INFERENCE_TIMEOUT_MS,
    logLevel: values.LOG_LEVEL,
  };
}

/** loadConfig over process.env after reading a .env file, if one exists. */
export function loadConfigFromEnvFile(path?: string): PipelineConfig {
  dotenv.config(path ? { path } : undefined);
  return loadConfig(process.env);
}

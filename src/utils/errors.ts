import { isAxiosError } from 'axios';

export type ErrorCode =
  | 'LOAD_FAILED'
  | 'MODEL_NOT_LOADED'
  | 'MODELS_NOT_LOADED'
  | 'INVALID_IMAGE'
  | 'INVALID_PROMPT'
  | 'INFERENCE_FAILED'
  | 'INVALID_RESPONSE'
  | 'TIMEOUT'
  | 'ORCHESTRATION_FAILED'
  | 'BUSY'
  | 'IMAGE_LOAD_FAILED'
  | 'CONFIG_INVALID';

/**
 * Base error for everything the pipeline raises.
 * `details` carries structured context for logs; it is never shown to users as-is.
 */
export class AnnotationError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AnnotationError';
  }
}

export class LoadError extends AnnotationError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'LOAD_FAILED', details, options);
    this.name = 'LoadError';
  }
}

export class ModelNotLoadedError extends AnnotationError {
  constructor(message = 'Model not loaded. Call load() first.') {
    super(message, 'MODEL_NOT_LOADED');
    this.name = 'ModelNotLoadedError';
  }
}

export class ModelsNotLoadedError extends AnnotationError {
  constructor(missing: string[]) {
    super(`Models not loaded: ${missing.join(', ')}. Call loadModels() first.`, 'MODELS_NOT_LOADED', { missing });
    this.name = 'ModelsNotLoadedError';
  }
}

export class InvalidImageError extends AnnotationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_IMAGE', details);
    this.name = 'InvalidImageError';
  }
}

export class InvalidPromptError extends AnnotationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_PROMPT', details);
    this.name = 'InvalidPromptError';
  }
}

export class InferenceError extends AnnotationError {
  constructor(
    message: string,
    code: 'INFERENCE_FAILED' | 'INVALID_RESPONSE' | 'TIMEOUT' = 'INFERENCE_FAILED',
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, code, details, options);
    this.name = 'InferenceError';
  }
}

export type PipelineStage = 'detection' | 'segmentation';

export class OrchestrationError extends AnnotationError {
  constructor(
    message: string,
    public readonly stage: PipelineStage,
    options?: { cause?: unknown }
  ) {
    super(message, 'ORCHESTRATION_FAILED', { stage }, options);
    this.name = 'OrchestrationError';
  }
}

export class OrchestratorBusyError extends AnnotationError {
  constructor() {
    super('Auto-annotation already running on this orchestrator', 'BUSY');
    this.name = 'OrchestratorBusyError';
  }
}

export class ImageLoadError extends AnnotationError {
  constructor(path: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause ?? 'unknown error');
    super(`Cannot load image ${path}: ${reason}`, 'IMAGE_LOAD_FAILED', { path }, options);
    this.name = 'ImageLoadError';
  }
}

export class ConfigError extends AnnotationError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'CONFIG_INVALID', { issues });
    this.name = 'ConfigError';
  }
}

function safeStringify(value: unknown) {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

/**
 * One-line rendering of an error for logs, following the cause chain.
 */
export function formatError(error: unknown): string {
  if (!(error instanceof Error)) return safeStringify(error);

  const parts: string[] = [`${error.name || 'Error'}: ${error.message}`];
  if (error instanceof AnnotationError) {
    parts.push(`code=${error.code}`);
  }
  if (isAxiosError(error)) {
    if (error.code) parts.push(`code=${error.code}`);
    if (error.response) {
      const { status, statusText, data } = error.response;
      parts.push(`response=${safeStringify({ status, statusText, data })}`);
    }
  }
  if (error.cause !== undefined) {
    parts.push(`cause=${formatError(error.cause)}`);
  }
  return parts.join(' | ');
}

/**
 * Human-readable message from a server failure: prefers the server's `detail`
 * field (FastAPI style), then the error message.
 */
export function describeServerError(error: unknown): string {
  if (isAxiosError(error)) {
    const data: unknown = error.response?.data;
    if (data && typeof data === 'object' && 'detail' in data && typeof data.detail === 'string') {
      return data.detail;
    }
    if (error.response) return `HTTP ${error.response.status}`;
    return error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

export function isTimeoutError(error: unknown): boolean {
  return isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT');
}

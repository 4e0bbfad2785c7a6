// ============================================================
// PROVIDER IDENTIFICATION
// ============================================================

/**
 * Available image generation backends
 */
export enum ImageProvider {
  /** Black Forest Labs (Flux). Asynchronous: submit, then poll. */
  BLACKFOREST = 'blackforest',
  /** Ideogram. Synchronous. */
  IDEOGRAM = 'ideogram',
  /** Luma AI (Photon). Asynchronous: submit, then poll. */
  LUMA = 'luma',
  /** Runway. Asynchronous: submit, then poll. */
  RUNWAY = 'runway',
  /** Stability AI. Synchronous, returns raw image bytes. */
  STABILITY = 'stability',
  /** OpenAI-compatible images API. Synchronous. */
  OPENAI = 'openai',
}

// ============================================================
// LOGGING CONFIGURATION
// ============================================================

/**
 * Log levels for provider logging
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Log level priority (higher = more severe)
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

// ============================================================
// REQUEST & RESPONSE
// ============================================================

/**
 * Canonical image generation request.
 *
 * Field names follow the OpenAI images API so that requests arriving in that
 * format can be handed over without renaming.
 */
export interface ImageGenerationRequest {
  /** The text prompt describing what to generate */
  prompt: string;
  /** Backend-specific model identifier (each adapter has its own default) */
  model?: string;
  /** Requested size as "WxH" (default: "1024x1024") */
  size?: string;
  /** Quality hint, e.g. 'standard' or 'hd' */
  quality?: string;
  /** Style hint, e.g. 'vivid' or 'natural' */
  style?: string;
  seed?: number;
  /** 'url' (default), or an encoding such as 'png' / 'jpeg' / 'webp' */
  response_format?: string;
  negative_prompt?: string;
  /** Number of images (only forwarded to the OpenAI-style backend) */
  n?: number;
}

/**
 * One generated image in the canonical result
 */
export interface ImageItem {
  /** Remote URL, or a data URI carrying base64-encoded bytes */
  readonly url: string;
  /** The prompt as used by the backend (echoes the input unless revised) */
  readonly revised_prompt: string;
}

/**
 * Canonical image generation result
 */
export interface ImageGenerationResult {
  /** Unix timestamp in seconds */
  readonly created: number;
  readonly data: readonly ImageItem[];
}

/**
 * Where a generated image lives before it is flattened into `ImageItem.url`
 */
export type ImageLocation =
  | { kind: 'remote'; url: string }
  | { kind: 'data-uri'; mimeType: string; base64: string };

/**
 * Per-call options for image generation
 */
export interface GenerationOptions {
  /** Aborts the in-flight request or the wait between polls */
  signal?: AbortSignal;
}

// ============================================================
// ERROR HANDLING
// ============================================================

export type ImageErrorCode =
  | 'INVALID_REQUEST'
  | 'INVALID_CONFIG'
  | 'UNSUPPORTED_OPERATION'
  | 'PROVIDER_API_ERROR'
  | 'PROVIDER_TIMEOUT'
  | 'NETWORK_ERROR'
  | 'CANCELLED';

// ============================================================
// JOB POLLING
// ============================================================

/**
 * Lifecycle of an asynchronous backend job
 */
export type JobState = 'submitted' | 'pending' | 'succeeded' | 'failed' | 'timed_out';

/**
 * Result of classifying one status response
 */
export type PollOutcome<TPayload> =
  | { state: 'pending'; status?: string }
  | { state: 'succeeded'; payload?: TPayload }
  | { state: 'failed'; reason?: string };

/**
 * Fixed polling cadence of a backend
 */
export interface PollingSchedule {
  /** Wait before each status request, in milliseconds */
  pollIntervalMs: number;
  /** Maximum number of status requests before giving up */
  maxAttempts: number;
}

// ============================================================
// USAGE RECORDING
// ============================================================

/**
 * Usage event emitted after a successful generation
 */
export interface UsageEvent {
  provider: string;
  model: string;
  endpoint: string;
  imagesGenerated: number;
  durationMs: number;
  createdAt: Date;
}

/**
 * Sink for usage events (persistence lives outside this library)
 */
export interface UsageRecorder {
  record(event: UsageEvent): Promise<void>;
}

// ============================================================
// PROVIDER INTERFACE
// ============================================================

/**
 * Interface that all image provider adapters must implement
 */
export interface IImageProviderAdapter {
  // Identity
  /** Get the provider identifier */
  getName(): ImageProvider;
  /** Constant identity used in error messages and log context */
  providerName(): string;
  /** Get human-readable display name */
  getDisplayName(): string;

  // Models
  /** Model requested by the caller; throws when the request names none */
  getModelId(request: ImageGenerationRequest): string;
  getDefaultModel(): string;
  /** List model ids, served from the model cache when present */
  listModels(
    credential: string,
    baseUrl?: string,
    queryParams?: Record<string, string>
  ): Promise<string[]>;
  /** Drop the cached model list for (credential, baseUrl) */
  invalidateModels(credential: string, baseUrl?: string): void;

  // Operations
  processCompletion(
    endpoint: string,
    payload: Record<string, unknown>,
    credential: string
  ): Promise<unknown>;
  processEmbeddings(
    endpoint: string,
    payload: Record<string, unknown>,
    credential: string
  ): Promise<unknown>;
  processImageGeneration(
    endpoint: string,
    request: Readonly<ImageGenerationRequest>,
    credential: string,
    options?: GenerationOptions
  ): Promise<ImageGenerationResult>;
}

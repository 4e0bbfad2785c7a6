/**
 * Base Image Provider Abstract Class
 *
 * All providers extend this class and implement the IImageProviderAdapter
 * interface. Provides request validation, the model cache contract, error
 * conversion, usage recording and logging.
 */

import {
  GenerationOptions,
  IImageProviderAdapter,
  ImageGenerationRequest,
  ImageGenerationResult,
  ImageItem,
  ImageLocation,
  ImageProvider,
  UsageRecorder,
} from '../../../types';
import { ProviderConfig, resolveApiUrl } from '../../../config/provider-config';
import { FetchHttpClient, HttpClient, normalizeBaseUrl } from '../utils/http-client';
import { JobEngine } from '../utils/job-engine';
import { ProviderLogger } from '../utils/logger';
import { ModelCache } from '../utils/model-cache';
import { realTimer } from '../utils/timer';
import {
  InvalidRequestError,
  UnsupportedOperationError,
  toProviderError,
} from './errors';

export * from './errors';

/**
 * One image produced by a backend, before conversion to the canonical shape
 */
export interface GeneratedImage {
  location: ImageLocation;
  revisedPrompt?: string;
}

export interface GenerationOutput {
  images: GeneratedImage[];
  /** Backend-supplied creation time in Unix seconds */
  created?: number;
}

/**
 * What a provider's doGenerate() receives besides the request
 */
export interface GenerationContext {
  endpoint: string;
  credential: string;
  model: string;
  signal?: AbortSignal;
}

export abstract class BaseImageProvider implements IImageProviderAdapter {
  protected readonly name: ImageProvider;
  protected readonly apiUrl: string;
  protected readonly httpClient: HttpClient;
  protected readonly engine: JobEngine;
  protected readonly logger: ProviderLogger;
  private readonly modelCache: ModelCache;
  private readonly usageRecorder?: UsageRecorder;

  constructor(name: ImageProvider, config?: Partial<ProviderConfig>) {
    this.name = name;
    this.apiUrl = resolveApiUrl(name, config?.apiUrl);
    this.httpClient = config?.httpClient || new FetchHttpClient();
    this.modelCache = config?.modelCache || new ModelCache();
    this.usageRecorder = config?.usageRecorder;
    this.logger = new ProviderLogger(name);
    this.engine = new JobEngine(name, this.httpClient, config?.timer || realTimer, this.logger);
  }

  // ============================================================
  // ABSTRACT METHODS (must be implemented by subclasses)
  // ============================================================

  abstract getDisplayName(): string;
  abstract getDefaultModel(): string;

  /**
   * Produce the model list for a cache miss
   */
  protected abstract fetchModelCatalog(
    credential: string,
    baseUrl: string,
    queryParams?: Record<string, string>
  ): Promise<string[]>;

  /**
   * Run the backend protocol for an already validated request
   */
  protected abstract doGenerate(
    request: Readonly<ImageGenerationRequest>,
    context: GenerationContext
  ): Promise<GenerationOutput>;

  // ============================================================
  // IMPLEMENTED METHODS
  // ============================================================

  public getName(): ImageProvider {
    return this.name;
  }

  public providerName(): string {
    return this.name;
  }

  public getApiUrl(): string {
    return this.apiUrl;
  }

  public getModelId(request: ImageGenerationRequest): string {
    if (!request.model) {
      this.logger.error(`Model ID not found in payload for ${this.name}`);
      throw new InvalidRequestError(this.name, 'model', 'Model ID not found in payload');
    }
    return request.model;
  }

  public async listModels(
    credential: string,
    baseUrl?: string,
    queryParams?: Record<string, string>
  ): Promise<string[]> {
    const effectiveUrl = baseUrl ? normalizeBaseUrl(baseUrl) : this.apiUrl;

    const cached = this.modelCache.get(credential, effectiveUrl);
    if (cached) {
      return cached;
    }

    const models = await this.fetchModelCatalog(credential, effectiveUrl, queryParams);
    this.modelCache.set(credential, effectiveUrl, models);
    return [...models];
  }

  public invalidateModels(credential: string, baseUrl?: string): void {
    this.modelCache.invalidate(credential, baseUrl ? normalizeBaseUrl(baseUrl) : this.apiUrl);
  }

  public async processCompletion(
    endpoint: string,
    _payload: Record<string, unknown>,
    _credential: string
  ): Promise<unknown> {
    throw new UnsupportedOperationError(this.name, 'text completion', endpoint);
  }

  public async processEmbeddings(
    endpoint: string,
    _payload: Record<string, unknown>,
    _credential: string
  ): Promise<unknown> {
    throw new UnsupportedOperationError(this.name, 'embeddings', endpoint);
  }

  public async processImageGeneration(
    endpoint: string,
    request: Readonly<ImageGenerationRequest>,
    credential: string,
    options?: GenerationOptions
  ): Promise<ImageGenerationResult> {
    this.validateRequest(request);

    const startTime = Date.now();
    const model = request.model || this.getDefaultModel();
    const signal = options?.signal;

    this.logger.debug('Generating image', { endpoint, model, size: request.size });

    let output: GenerationOutput;
    try {
      output = await this.doGenerate(request, { endpoint, credential, model, signal });
    } catch (error) {
      throw toProviderError(this.name, error, signal, `during ${this.getDisplayName()} API call`);
    }

    const result = this.buildResult(request.prompt, output);
    await this.recordUsage({
      model,
      endpoint,
      imagesGenerated: result.data.length,
      durationMs: Date.now() - startTime,
    });

    return result;
  }

  // ============================================================
  // PROTECTED HELPERS
  // ============================================================

  /**
   * Validate that the request can be sent at all
   */
  protected validateRequest(request: Readonly<ImageGenerationRequest>): void {
    if (!request.prompt || request.prompt.trim().length === 0) {
      throw new InvalidRequestError(
        this.name,
        'prompt',
        'Prompt is required for image generation'
      );
    }
  }

  protected buildResult(prompt: string, output: GenerationOutput): ImageGenerationResult {
    const data: ImageItem[] = output.images.map((image) =>
      Object.freeze({
        url: toImageUrl(image.location),
        revised_prompt: image.revisedPrompt || prompt,
      })
    );

    return Object.freeze({
      created: output.created ?? Math.floor(Date.now() / 1000),
      data: Object.freeze(data),
    });
  }

  protected jsonHeaders(extra: Record<string, string>): Record<string, string> {
    return { ...extra, 'Content-Type': 'application/json' };
  }

  private async recordUsage(event: {
    model: string;
    endpoint: string;
    imagesGenerated: number;
    durationMs: number;
  }): Promise<void> {
    if (!this.usageRecorder) {
      return;
    }

    try {
      await this.usageRecorder.record({ ...event, provider: this.name, createdAt: new Date() });
    } catch (error) {
      this.logger.error('Failed to record usage', {
        error: error instanceof Error ? error.message : String(error),
        model: event.model,
      });
    }
  }
}

// ============================================================
// HELPER FUNCTIONS
// ============================================================

export function remoteImage(url: string): ImageLocation {
  return { kind: 'remote', url };
}

export function dataUriImage(mimeType: string, base64: string): ImageLocation {
  return { kind: 'data-uri', mimeType, base64 };
}

/**
 * Flatten an image location into the canonical url string
 */
export function toImageUrl(location: ImageLocation): string {
  switch (location.kind) {
    case 'remote':
      return location.url;
    case 'data-uri':
      return `data:${location.mimeType};base64,${location.base64}`;
  }
}

/**
 * Type guard for plain JSON objects
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Non-empty string field of a JSON object, if present
 */
export function stringField(value: unknown, key: string): string | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const field = value[key];
  return typeof field === 'string' && field.length > 0 ? field : undefined;
}

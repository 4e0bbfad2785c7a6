/**
 * Black Forest Labs Provider
 *
 * Flux models. Asynchronous API: the submission returns a polling URL which
 * is checked every 2 seconds until the job reports "Ready" or "Error".
 *
 * @see https://docs.bfl.ai/
 */

import {
  ImageGenerationRequest,
  ImageProvider,
  PollOutcome,
  PollingSchedule,
} from '../../../types';
import { ProviderConfig } from '../../../config/provider-config';
import {
  BaseImageProvider,
  GenerationContext,
  GenerationOutput,
  isRecord,
  remoteImage,
  stringField,
} from './base-image-provider';
import {
  Dimensions,
  parseSizeParam,
  toBlackForestDimensions,
} from '../translators/blackforest-translator';

// ============================================================
// CONSTANTS
// ============================================================

const BLACKFOREST_MODELS = ['flux-pro-1.1', 'flux-pro', 'flux-dev', 'flux-schnell'];

/** 30 attempts * 2 seconds = 1 minute */
export const BLACKFOREST_POLLING: PollingSchedule = {
  pollIntervalMs: 2000,
  maxAttempts: 30,
};

const DEFAULT_SEED = 42;

// ============================================================
// STATUS CLASSIFICATION
// ============================================================

/**
 * Map a polling response onto the job state. Yields the sample URL on success.
 */
export function classifyBlackForestStatus(body: unknown): PollOutcome<string> {
  const status = stringField(body, 'status');

  if (status === 'Ready') {
    const result = isRecord(body) ? body.result : undefined;
    return { state: 'succeeded', payload: stringField(result, 'sample') };
  }

  if (status === 'Error') {
    return { state: 'failed', reason: stringField(body, 'error') };
  }

  return { state: 'pending', status };
}

// ============================================================
// PROVIDER IMPLEMENTATION
// ============================================================

export class BlackForestProvider extends BaseImageProvider {
  constructor(config?: Partial<ProviderConfig>) {
    super(ImageProvider.BLACKFOREST, config);
    this.logger.info('Black Forest Labs Provider initialized', { apiUrl: this.apiUrl });
  }

  getDisplayName(): string {
    return 'Black Forest Labs';
  }

  getDefaultModel(): string {
    return 'flux-pro-1.1';
  }

  protected async fetchModelCatalog(): Promise<string[]> {
    return [...BLACKFOREST_MODELS];
  }

  protected async doGenerate(
    request: Readonly<ImageGenerationRequest>,
    { credential, model, signal }: GenerationContext
  ): Promise<GenerationOutput> {
    const { width, height } = this.resolveDimensions(request.size);

    const body = {
      prompt: request.prompt,
      width,
      height,
      prompt_upsampling: false,
      seed: request.seed ?? DEFAULT_SEED,
      safety_tolerance: 2,
      output_format: 'jpeg',
    };

    const sampleUrl = await this.engine.run<string>(
      {
        ...BLACKFOREST_POLLING,
        submitRequest: {
          method: 'POST',
          url: `${this.apiUrl}/v1/${model}`,
          headers: this.jsonHeaders({ 'x-key': credential }),
          body: JSON.stringify(body),
        },
        acceptedSubmitStatuses: [200],
        extractJobHandle: (submission) => stringField(submission, 'polling_url'),
        statusRequest: (pollingUrl) => ({
          method: 'GET',
          url: pollingUrl,
          headers: { 'x-key': credential, Accept: 'application/json' },
        }),
        classify: classifyBlackForestStatus,
      },
      signal
    );

    return { images: [{ location: remoteImage(sampleUrl) }] };
  }

  private resolveDimensions(size?: string): Dimensions {
    if (size !== undefined && !parseSizeParam(size)) {
      this.logger.warn(`Invalid size parameter: ${size}, using default 1024x1024`);
    }
    return toBlackForestDimensions(size);
  }
}

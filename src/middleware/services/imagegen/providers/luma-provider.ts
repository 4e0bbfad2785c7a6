/**
 * Luma AI Provider
 *
 * Photon image models on the Dream Machine API. Jobs are polled every
 * 5 seconds for up to 5 minutes.
 *
 * @see https://docs.lumalabs.ai/
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
import { toLumaAspectRatio } from '../translators/luma-translator';

const LUMA_MODELS = ['photon-1', 'photon-flash-1'];

/** 60 attempts * 5 seconds = 5 minutes */
export const LUMA_POLLING: PollingSchedule = {
  pollIntervalMs: 5000,
  maxAttempts: 60,
};

export function classifyLumaStatus(body: unknown): PollOutcome<string> {
  const state = stringField(body, 'state');

  if (state === 'completed') {
    const assets = isRecord(body) ? body.assets : undefined;
    return { state: 'succeeded', payload: stringField(assets, 'image') };
  }

  if (state === 'failed') {
    return { state: 'failed', reason: stringField(body, 'failure_reason') };
  }

  return { state: 'pending', status: state };
}

export class LumaProvider extends BaseImageProvider {
  constructor(config?: Partial<ProviderConfig>) {
    super(ImageProvider.LUMA, config);
    this.logger.info('Luma AI Provider initialized', { apiUrl: this.apiUrl });
  }

  getDisplayName(): string {
    return 'Luma AI';
  }

  getDefaultModel(): string {
    return 'photon-1';
  }

  protected async fetchModelCatalog(): Promise<string[]> {
    return [...LUMA_MODELS];
  }

  protected async doGenerate(
    request: Readonly<ImageGenerationRequest>,
    { credential, model, signal }: GenerationContext
  ): Promise<GenerationOutput> {
    const headers = this.jsonHeaders({
      Accept: 'application/json',
      Authorization: `Bearer ${credential}`,
    });

    const body = {
      prompt: request.prompt,
      model,
      aspect_ratio: toLumaAspectRatio(request.size),
    };

    const imageUrl = await this.engine.run<string>(
      {
        ...LUMA_POLLING,
        submitRequest: {
          method: 'POST',
          url: `${this.apiUrl}/dream-machine/v1/generations/image`,
          headers,
          body: JSON.stringify(body),
        },
        acceptedSubmitStatuses: [200, 201],
        extractJobHandle: (submission) => stringField(submission, 'id'),
        statusRequest: (generationId) => ({
          method: 'GET',
          url: `${this.apiUrl}/dream-machine/v1/generations/${encodeURIComponent(generationId)}`,
          headers,
        }),
        classify: classifyLumaStatus,
      },
      signal
    );

    return { images: [{ location: remoteImage(imageUrl) }] };
  }
}

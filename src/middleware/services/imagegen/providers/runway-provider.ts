/**
 * Runway Provider
 *
 * Text-to-image tasks, polled every 2 seconds for up to 2 minutes.
 *
 * @see https://docs.dev.runwayml.com/
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
import { toRunwayRatio } from '../translators/runway-translator';

const RUNWAY_MODELS = ['gen4_image', 'gen3_image', 'gen2_image'];

/** API version header required by Runway */
export const RUNWAY_API_VERSION = '2024-11-06';

/** 60 attempts * 2 seconds = 2 minutes */
export const RUNWAY_POLLING: PollingSchedule = {
  pollIntervalMs: 2000,
  maxAttempts: 60,
};

export function classifyRunwayStatus(body: unknown): PollOutcome<string> {
  const status = stringField(body, 'status');

  if (status === 'SUCCEEDED') {
    const output = isRecord(body) ? body.output : undefined;
    const first = Array.isArray(output) ? output[0] : undefined;
    return {
      state: 'succeeded',
      payload: typeof first === 'string' && first.length > 0 ? first : undefined,
    };
  }

  if (status === 'FAILED') {
    return {
      state: 'failed',
      reason: stringField(body, 'failure') ?? stringField(body, 'error'),
    };
  }

  return { state: 'pending', status };
}

export class RunwayProvider extends BaseImageProvider {
  constructor(config?: Partial<ProviderConfig>) {
    super(ImageProvider.RUNWAY, config);
    this.logger.info('Runway Provider initialized', { apiUrl: this.apiUrl });
  }

  getDisplayName(): string {
    return 'Runway';
  }

  getDefaultModel(): string {
    return 'gen4_image';
  }

  protected async fetchModelCatalog(): Promise<string[]> {
    return [...RUNWAY_MODELS];
  }

  protected async doGenerate(
    request: Readonly<ImageGenerationRequest>,
    { credential, model, signal }: GenerationContext
  ): Promise<GenerationOutput> {
    const headers = this.jsonHeaders({
      Authorization: `Bearer ${credential}`,
      'X-Runway-Version': RUNWAY_API_VERSION,
    });

    const body: Record<string, unknown> = {
      model,
      prompt_text: request.prompt,
      ratio: toRunwayRatio(request.size),
    };

    if (request.seed !== undefined) {
      body.seed = request.seed;
    }

    const outputUrl = await this.engine.run<string>(
      {
        ...RUNWAY_POLLING,
        submitRequest: {
          method: 'POST',
          url: `${this.apiUrl}/v1/text_to_image`,
          headers,
          body: JSON.stringify(body),
        },
        acceptedSubmitStatuses: [200, 201],
        extractJobHandle: (submission) => stringField(submission, 'id'),
        statusRequest: (taskId) => ({
          method: 'GET',
          url: `${this.apiUrl}/v1/tasks/${encodeURIComponent(taskId)}`,
          headers,
        }),
        classify: classifyRunwayStatus,
      },
      signal
    );

    return { images: [{ location: remoteImage(outputUrl) }] };
  }
}

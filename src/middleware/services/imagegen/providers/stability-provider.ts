/**
 * Stability AI Provider
 *
 * Stable Image endpoints (v2beta). Requests are multipart forms; with
 * `accept: image/*` the reply body is the encoded image itself, which is
 * returned as a data URI.
 *
 * @see https://platform.stability.ai/docs/api-reference
 */

import { ImageGenerationRequest, ImageProvider } from '../../../types';
import { ProviderConfig } from '../../../config/provider-config';
import {
  BaseImageProvider,
  GenerationContext,
  GenerationOutput,
  ProviderAPIError,
  dataUriImage,
} from './base-image-provider';
import {
  supportsAspectRatio,
  toStabilityAspectRatio,
  toStabilityEndpoint,
  toStabilityOutputFormat,
  toStabilityStylePreset,
} from '../translators/stability-translator';

const STABILITY_MODELS = [
  'stable-image-ultra',
  'stable-image-core',
  'stable-diffusion-v1-6',
  'stable-diffusion-xl-1024-v1-0',
  'stable-diffusion-3-medium',
  'stable-diffusion-3-large',
];

export const STABILITY_REQUEST_TIMEOUT_MS = 30000;

export class StabilityProvider extends BaseImageProvider {
  constructor(config?: Partial<ProviderConfig>) {
    super(ImageProvider.STABILITY, config);
    this.logger.info('Stability AI Provider initialized', { apiUrl: this.apiUrl });
  }

  getDisplayName(): string {
    return 'Stability AI';
  }

  getDefaultModel(): string {
    return 'stable-image-ultra';
  }

  protected async fetchModelCatalog(): Promise<string[]> {
    return [...STABILITY_MODELS];
  }

  protected async doGenerate(
    request: Readonly<ImageGenerationRequest>,
    { credential, model, signal }: GenerationContext
  ): Promise<GenerationOutput> {
    const outputFormat = toStabilityOutputFormat(request.response_format);

    const form = new FormData();
    form.append('prompt', request.prompt);
    form.append('output_format', outputFormat);

    if (supportsAspectRatio(model)) {
      form.append('aspect_ratio', toStabilityAspectRatio(request.size));
    }
    if (request.seed !== undefined) {
      form.append('seed', String(request.seed));
    }
    if (request.negative_prompt) {
      form.append('negative_prompt', request.negative_prompt);
    }
    if (request.style) {
      form.append('style_preset', toStabilityStylePreset(request.style));
    }
    // empty extra part, as in the API's reference requests
    form.append('none', '');

    const response = await this.engine.send(
      {
        method: 'POST',
        url: `${this.apiUrl}/v2beta/${toStabilityEndpoint(model)}`,
        headers: {
          authorization: `Bearer ${credential}`,
          accept: 'image/*',
        },
        body: form,
        timeoutMs: STABILITY_REQUEST_TIMEOUT_MS,
      },
      [200],
      signal
    );

    const bytes = Buffer.from(await response.arrayBuffer());
    if (bytes.length === 0) {
      throw new ProviderAPIError(this.name, 500, 'No image data returned from Stability AI API');
    }

    return {
      images: [{ location: dataUriImage(`image/${outputFormat}`, bytes.toString('base64')) }],
    };
  }
}

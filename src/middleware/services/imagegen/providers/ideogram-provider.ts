/**
 * Ideogram Provider
 *
 * Ideogram v3 generation. The API answers the submitting call with the
 * finished images, so no polling is involved.
 *
 * @see https://developer.ideogram.ai/
 */

import { ImageGenerationRequest, ImageProvider } from '../../../types';
import { ProviderConfig } from '../../../config/provider-config';
import {
  BaseImageProvider,
  GeneratedImage,
  GenerationContext,
  GenerationOutput,
  ProviderAPIError,
  isRecord,
  remoteImage,
  stringField,
} from './base-image-provider';
import {
  toIdeogramAspectRatio,
  toIdeogramRenderingSpeed,
  toIdeogramStyleType,
} from '../translators/ideogram-translator';

const IDEOGRAM_MODELS = ['ideogram-v3', 'ideogram-v2', 'ideogram-v1-turbo', 'ideogram-v1'];

const IDEOGRAM_DEFAULT_MODEL = 'ideogram-v3';

/**
 * Image URLs from a generate response. Entries without a url are skipped.
 */
export function extractIdeogramImages(body: unknown): GeneratedImage[] {
  const data = isRecord(body) ? body.data : undefined;
  if (!Array.isArray(data)) {
    return [];
  }

  const images: GeneratedImage[] = [];
  for (const item of data) {
    const url = stringField(item, 'url');
    if (url) {
      images.push({ location: remoteImage(url), revisedPrompt: stringField(item, 'prompt') });
    }
  }
  return images;
}

export class IdeogramProvider extends BaseImageProvider {
  constructor(config?: Partial<ProviderConfig>) {
    super(ImageProvider.IDEOGRAM, config);
    this.logger.info('Ideogram Provider initialized', { apiUrl: this.apiUrl });
  }

  getDisplayName(): string {
    return 'Ideogram';
  }

  getDefaultModel(): string {
    return IDEOGRAM_DEFAULT_MODEL;
  }

  protected async fetchModelCatalog(): Promise<string[]> {
    return [...IDEOGRAM_MODELS];
  }

  protected async doGenerate(
    request: Readonly<ImageGenerationRequest>,
    { credential, model, signal }: GenerationContext
  ): Promise<GenerationOutput> {
    const body: Record<string, unknown> = {
      prompt: request.prompt,
      aspect_ratio: toIdeogramAspectRatio(request.size),
      rendering_speed: toIdeogramRenderingSpeed(request.quality),
    };

    if (request.style) {
      body.style_type = toIdeogramStyleType(request.style);
    }
    if (request.negative_prompt) {
      body.negative_prompt = request.negative_prompt;
    }
    if (request.seed !== undefined) {
      body.seed = request.seed;
    }
    if (model !== IDEOGRAM_DEFAULT_MODEL) {
      body.model = model;
    }

    const response = await this.engine.send(
      {
        method: 'POST',
        url: `${this.apiUrl}/v1/ideogram-v3/generate`,
        headers: this.jsonHeaders({ 'Api-Key': credential }),
        body: JSON.stringify(body),
      },
      [200],
      signal
    );

    const images = extractIdeogramImages(await this.engine.readJson(response));
    if (images.length === 0) {
      throw new ProviderAPIError(this.name, 500, 'No image data returned from Ideogram API');
    }

    return { images };
  }
}

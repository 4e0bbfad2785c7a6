/**
 * OpenAI-compatible Provider
 *
 * Speaks the OpenAI REST shape: images are generated synchronously, the model
 * list is read live from `/models`, and completion / embeddings payloads are
 * forwarded unchanged. Works with any server exposing the same API through
 * OPENAI_API_URL.
 *
 * @see https://platform.openai.com/docs/api-reference/images
 */

import { ImageGenerationRequest, ImageProvider } from '../../../types';
import { ProviderConfig } from '../../../config/provider-config';
import { withQuery } from '../utils/http-client';
import {
  BaseImageProvider,
  GeneratedImage,
  GenerationContext,
  GenerationOutput,
  ProviderAPIError,
  dataUriImage,
  isRecord,
  remoteImage,
  stringField,
  toProviderError,
} from './base-image-provider';

const DEFAULT_IMAGES_ENDPOINT = 'images/generations';

/**
 * Images from an images/generations response. `b64_json` items become
 * PNG data URIs.
 */
export function extractOpenAIImages(body: unknown): GeneratedImage[] {
  const data = isRecord(body) ? body.data : undefined;
  if (!Array.isArray(data)) {
    return [];
  }

  const images: GeneratedImage[] = [];
  for (const item of data) {
    const revisedPrompt = stringField(item, 'revised_prompt');
    const url = stringField(item, 'url');
    const b64 = stringField(item, 'b64_json');

    if (url) {
      images.push({ location: remoteImage(url), revisedPrompt });
    } else if (b64) {
      images.push({ location: dataUriImage('image/png', b64), revisedPrompt });
    }
  }
  return images;
}

/**
 * Model ids from a /models response
 */
export function extractModelIds(body: unknown): string[] {
  const data = isRecord(body) ? body.data : undefined;
  if (!Array.isArray(data)) {
    return [];
  }
  return data
    .map((entry) => stringField(entry, 'id'))
    .filter((id): id is string => id !== undefined);
}

export class OpenAIProvider extends BaseImageProvider {
  constructor(config?: Partial<ProviderConfig>) {
    super(ImageProvider.OPENAI, config);
    this.logger.info('OpenAI Provider initialized', { apiUrl: this.apiUrl });
  }

  getDisplayName(): string {
    return 'OpenAI';
  }

  getDefaultModel(): string {
    return 'dall-e-3';
  }

  protected async fetchModelCatalog(
    credential: string,
    baseUrl: string,
    queryParams?: Record<string, string>
  ): Promise<string[]> {
    const response = await this.engine.send(
      {
        method: 'GET',
        url: withQuery(`${baseUrl}/models`, queryParams),
        headers: { Authorization: `Bearer ${credential}` },
      },
      [200]
    );

    const models = extractModelIds(await this.engine.readJson(response));
    this.logger.debug('Fetched model list', { count: models.length });
    return models;
  }

  public async processCompletion(
    endpoint: string,
    payload: Record<string, unknown>,
    credential: string
  ): Promise<unknown> {
    return this.forward(endpoint, payload, credential);
  }

  public async processEmbeddings(
    endpoint: string,
    payload: Record<string, unknown>,
    credential: string
  ): Promise<unknown> {
    return this.forward(endpoint, payload, credential);
  }

  protected async doGenerate(
    request: Readonly<ImageGenerationRequest>,
    { endpoint, credential, model, signal }: GenerationContext
  ): Promise<GenerationOutput> {
    const body = {
      model,
      prompt: request.prompt,
      n: request.n ?? 1,
      size: request.size ?? '1024x1024',
      quality: request.quality,
      style: request.style,
      response_format: request.response_format ?? 'url',
    };

    const response = await this.engine.send(
      {
        method: 'POST',
        url: this.endpointUrl(endpoint || DEFAULT_IMAGES_ENDPOINT),
        headers: this.jsonHeaders({ Authorization: `Bearer ${credential}` }),
        body: JSON.stringify(body),
      },
      [200],
      signal
    );

    const reply = await this.engine.readJson(response);
    const images = extractOpenAIImages(reply);
    if (images.length === 0) {
      throw new ProviderAPIError(this.name, 500, 'No image data returned from OpenAI API');
    }

    const created = isRecord(reply) && typeof reply.created === 'number' ? reply.created : undefined;
    return { images, created };
  }

  private async forward(
    endpoint: string,
    payload: Record<string, unknown>,
    credential: string
  ): Promise<unknown> {
    try {
      const response = await this.engine.send(
        {
          method: 'POST',
          url: this.endpointUrl(endpoint),
          headers: this.jsonHeaders({ Authorization: `Bearer ${credential}` }),
          body: JSON.stringify(payload),
        },
        [200]
      );
      return await this.engine.readJson(response);
    } catch (error) {
      throw toProviderError(this.name, error, undefined, `during ${endpoint} call`);
    }
  }

  private endpointUrl(endpoint: string): string {
    return `${this.apiUrl}/${endpoint.replace(/^\/+/, '')}`;
  }
}

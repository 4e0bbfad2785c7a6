/**
 * Image Generation Service
 *
 * Main entry point for image generation.
 * Keeps the registered adapters and routes requests to one of them.
 */

import {
  GenerationOptions,
  IImageProviderAdapter,
  ImageGenerationRequest,
  ImageGenerationResult,
  ImageProvider,
} from '../../types';
import { resolveApiKey } from '../../config/provider-config';
import { InvalidConfigError } from './providers/errors';
import { ProviderLogger } from './utils/logger';

const SERVICE_NAME = 'ImageGenerationService';

export const DEFAULT_IMAGE_ENDPOINT = 'images/generations';

export interface GenerateOptions extends GenerationOptions {
  /** Backend to use (default: the service's default provider) */
  provider?: ImageProvider | string;
  /** API key (default: the key registered with the provider, then the environment) */
  credential?: string;
  /** Endpoint name passed to the adapter (default: images/generations) */
  endpoint?: string;
}

export interface ProviderModels {
  provider: ImageProvider;
  models: string[];
}

const PROVIDER_ALIASES: Record<string, ImageProvider> = {
  // Black Forest Labs
  blackforest: ImageProvider.BLACKFOREST,
  'black-forest': ImageProvider.BLACKFOREST,
  black_forest: ImageProvider.BLACKFOREST,
  bfl: ImageProvider.BLACKFOREST,
  flux: ImageProvider.BLACKFOREST,
  // Ideogram
  ideogram: ImageProvider.IDEOGRAM,
  // Luma
  luma: ImageProvider.LUMA,
  lumaai: ImageProvider.LUMA,
  'luma-ai': ImageProvider.LUMA,
  // Runway
  runway: ImageProvider.RUNWAY,
  runwayml: ImageProvider.RUNWAY,
  // Stability
  stability: ImageProvider.STABILITY,
  'stability-ai': ImageProvider.STABILITY,
  stabilityai: ImageProvider.STABILITY,
  // OpenAI
  openai: ImageProvider.OPENAI,
  dalle: ImageProvider.OPENAI,
  'dall-e': ImageProvider.OPENAI,
};

/**
 * Parse a provider name or alias to the ImageProvider enum
 */
export function parseProvider(value: string): ImageProvider | undefined {
  return PROVIDER_ALIASES[value.toLowerCase().trim()];
}

export class ImageGenerationService {
  private providers: Map<ImageProvider, IImageProviderAdapter> = new Map();
  private credentials: Map<ImageProvider, string> = new Map();
  private defaultProvider: ImageProvider = ImageProvider.OPENAI;
  private readonly logger = new ProviderLogger(SERVICE_NAME);

  constructor() {
    const envDefault = process.env.IMAGEGEN_DEFAULT_PROVIDER;
    if (envDefault) {
      const parsed = parseProvider(envDefault);
      if (parsed) {
        this.defaultProvider = parsed;
      } else {
        this.logger.warn(`Unknown IMAGEGEN_DEFAULT_PROVIDER: ${envDefault}`);
      }
    }
  }

  /**
   * Register an adapter, optionally with the API key to use for it
   */
  registerProvider(provider: IImageProviderAdapter, credential?: string): void {
    this.providers.set(provider.getName(), provider);
    if (credential) {
      this.credentials.set(provider.getName(), credential);
    }
    this.logger.info(`Registered provider: ${provider.getDisplayName()}`);
  }

  getProvider(name: ImageProvider): IImageProviderAdapter | undefined {
    return this.providers.get(name);
  }

  getAvailableProviders(): ImageProvider[] {
    return Array.from(this.providers.keys());
  }

  isProviderAvailable(provider: ImageProvider): boolean {
    return this.providers.has(provider);
  }

  getDefaultProvider(): ImageProvider {
    return this.defaultProvider;
  }

  setDefaultProvider(provider: ImageProvider): void {
    if (!this.providers.has(provider)) {
      this.logger.warn(`Provider ${provider} is not registered. Setting as default anyway.`);
    }
    this.defaultProvider = provider;
  }

  /**
   * List the models of every registered provider that has a credential.
   * Providers without one, or whose catalog cannot be fetched, are skipped.
   */
  async listAllModels(
    credentials: Partial<Record<ImageProvider, string>> = {}
  ): Promise<ProviderModels[]> {
    const result: ProviderModels[] = [];

    for (const [name, provider] of this.providers) {
      const credential = credentials[name] || this.resolveCredential(name);
      if (!credential) {
        this.logger.debug(`Skipping ${name}: no credential`);
        continue;
      }

      try {
        result.push({ provider: name, models: await provider.listModels(credential) });
      } catch (error) {
        this.logger.warn(`Skipping ${name}: model list unavailable`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return result;
  }

  /**
   * Generate an image with the requested (or default) provider
   */
  async generate(
    request: ImageGenerationRequest,
    options: GenerateOptions = {}
  ): Promise<ImageGenerationResult> {
    const providerKey = this.resolveProviderKey(options.provider);
    const provider = this.providers.get(providerKey);

    if (!provider) {
      throw new InvalidConfigError(SERVICE_NAME, `Provider '${providerKey}' is not registered.`);
    }

    const credential = options.credential || this.resolveCredential(providerKey);
    if (!credential) {
      throw new InvalidConfigError(
        providerKey,
        `No API key configured for ${provider.getDisplayName()}.`
      );
    }

    return provider.processImageGeneration(
      options.endpoint || DEFAULT_IMAGE_ENDPOINT,
      request,
      credential,
      { signal: options.signal }
    );
  }

  private resolveProviderKey(provider?: ImageProvider | string): ImageProvider {
    if (provider === undefined) {
      return this.defaultProvider;
    }

    const parsed = parseProvider(provider);
    if (!parsed) {
      throw new InvalidConfigError(SERVICE_NAME, `Unknown provider '${provider}'.`);
    }
    return parsed;
  }

  private resolveCredential(provider: ImageProvider): string | undefined {
    return this.credentials.get(provider) || resolveApiKey(provider);
  }
}

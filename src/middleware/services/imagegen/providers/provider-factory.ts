import { IImageProviderAdapter, ImageProvider } from '../../../types';
import { ProviderConfig, getConfiguredProviders } from '../../../config/provider-config';
import { BaseImageProvider } from './base-image-provider';
import { BlackForestProvider } from './blackforest-provider';
import { IdeogramProvider } from './ideogram-provider';
import { LumaProvider } from './luma-provider';
import { OpenAIProvider } from './openai-provider';
import { RunwayProvider } from './runway-provider';
import { StabilityProvider } from './stability-provider';

/**
 * Build the adapter for a backend
 */
export function createProvider(
  name: ImageProvider,
  config?: Partial<ProviderConfig>
): BaseImageProvider {
  switch (name) {
    case ImageProvider.BLACKFOREST:
      return new BlackForestProvider(config);
    case ImageProvider.IDEOGRAM:
      return new IdeogramProvider(config);
    case ImageProvider.LUMA:
      return new LumaProvider(config);
    case ImageProvider.RUNWAY:
      return new RunwayProvider(config);
    case ImageProvider.STABILITY:
      return new StabilityProvider(config);
    case ImageProvider.OPENAI:
      return new OpenAIProvider(config);
  }
}

/**
 * One adapter per backend whose API key is set in the environment.
 * `config.apiUrl` is ignored here since each backend has its own.
 */
export function createConfiguredProviders(
  config?: Partial<Omit<ProviderConfig, 'apiUrl'>>
): IImageProviderAdapter[] {
  return getConfiguredProviders().map((name) => createProvider(name, { ...config }));
}

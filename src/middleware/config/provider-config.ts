/**
 * Provider configuration
 *
 * Base URLs and API keys come from explicit config first, then from the
 * environment ({PREFIX}_API_URL / {PREFIX}_API_KEY), then from built-in
 * defaults. Polling cadence is fixed per backend and not configurable here.
 */

import { ImageProvider, UsageRecorder } from '../types';
import { HttpClient, normalizeBaseUrl } from '../services/imagegen/utils/http-client';
import { ModelCache } from '../services/imagegen/utils/model-cache';
import { Timer } from '../services/imagegen/utils/timer';

/**
 * Construction-time configuration of a provider adapter
 */
export interface ProviderConfig {
  /** Base URL of the backend API */
  apiUrl: string;
  /** Transport (default: fetch) */
  httpClient: HttpClient;
  /** Wait between polls (default: setTimeout) */
  timer: Timer;
  /** Model list cache (default: one per adapter instance) */
  modelCache: ModelCache;
  /** Receives one event per successful generation */
  usageRecorder?: UsageRecorder;
}

interface ProviderEnvironment {
  envPrefix: string;
  defaultApiUrl: string;
}

export const PROVIDER_ENVIRONMENT: Record<ImageProvider, ProviderEnvironment> = {
  [ImageProvider.BLACKFOREST]: { envPrefix: 'BLACKFOREST', defaultApiUrl: 'https://api.bfl.ai' },
  [ImageProvider.IDEOGRAM]: { envPrefix: 'IDEOGRAM', defaultApiUrl: 'https://api.ideogram.ai' },
  [ImageProvider.LUMA]: { envPrefix: 'LUMA', defaultApiUrl: 'https://api.lumalabs.ai' },
  [ImageProvider.RUNWAY]: { envPrefix: 'RUNWAY', defaultApiUrl: 'https://api.dev.runwayml.com' },
  [ImageProvider.STABILITY]: { envPrefix: 'STABILITY', defaultApiUrl: 'https://api.stability.ai' },
  [ImageProvider.OPENAI]: { envPrefix: 'OPENAI', defaultApiUrl: 'https://api.openai.com/v1' },
};

/**
 * Effective base URL for a provider
 */
export function resolveApiUrl(provider: ImageProvider, explicit?: string): string {
  const { envPrefix, defaultApiUrl } = PROVIDER_ENVIRONMENT[provider];
  return normalizeBaseUrl(explicit || process.env[`${envPrefix}_API_URL`] || defaultApiUrl);
}

/**
 * API key for a provider from the environment, if set
 */
export function resolveApiKey(provider: ImageProvider): string | undefined {
  const { envPrefix } = PROVIDER_ENVIRONMENT[provider];
  const value = process.env[`${envPrefix}_API_KEY`];
  return value && value.trim().length > 0 ? value : undefined;
}

/**
 * Providers whose API key is present in the environment
 */
export function getConfiguredProviders(): ImageProvider[] {
  return Object.values(ImageProvider).filter((provider) => resolveApiKey(provider) !== undefined);
}

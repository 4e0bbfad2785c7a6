/**
 * Canonical → Stability AI parameter mapping.
 *
 * Stability answers with raw image bytes, so response_format selects the
 * encoding of those bytes rather than url vs. base64.
 */

const ASPECT_RATIOS = new Map<string, string>([
  ['256x256', '1:1'],
  ['512x512', '1:1'],
  ['1024x1024', '1:1'],
  ['1792x1024', '16:9'],
  ['1024x1792', '9:16'],
  ['1536x1024', '3:2'],
  ['1024x1536', '2:3'],
]);

const STYLE_PRESETS = new Map<string, string>([
  ['vivid', 'enhance'],
  ['natural', 'photographic'],
]);

const MODEL_ENDPOINTS = new Map<string, string>([
  ['stable-image-ultra', 'stable-image/generate/ultra'],
  ['stable-image-core', 'stable-image/generate/core'],
  ['stable-diffusion-v1-6', 'stable-image/generate/sd3'],
  ['stable-diffusion-xl-1024-v1-0', 'stable-image/generate/sdxl'],
  ['stable-diffusion-3-medium', 'stable-image/generate/sd3'],
  ['stable-diffusion-3-large', 'stable-image/generate/sd3'],
]);

export const STABILITY_DEFAULT_ASPECT_RATIO = '1:1';
export const STABILITY_DEFAULT_STYLE_PRESET = 'enhance';
export const STABILITY_DEFAULT_ENDPOINT = 'stable-image/generate/ultra';
export const STABILITY_DEFAULT_OUTPUT_FORMAT = 'png';

export function toStabilityAspectRatio(size: string = '1024x1024'): string {
  return ASPECT_RATIOS.get(size) ?? STABILITY_DEFAULT_ASPECT_RATIO;
}

export function toStabilityStylePreset(style: string): string {
  return STYLE_PRESETS.get(style.toLowerCase()) ?? STABILITY_DEFAULT_STYLE_PRESET;
}

/**
 * 'url' has no meaning for a binary reply and becomes png; other formats pass through
 */
export function toStabilityOutputFormat(responseFormat: string = 'url'): string {
  return responseFormat === 'url' ? STABILITY_DEFAULT_OUTPUT_FORMAT : responseFormat;
}

export function toStabilityEndpoint(model: string): string {
  return MODEL_ENDPOINTS.get(model) ?? STABILITY_DEFAULT_ENDPOINT;
}

/**
 * Only the Ultra and Core endpoints take aspect_ratio
 */
export function supportsAspectRatio(model: string): boolean {
  const normalized = model.toLowerCase();
  return normalized.includes('ultra') || normalized.includes('core');
}

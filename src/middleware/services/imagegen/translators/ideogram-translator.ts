/**
 * Canonical → Ideogram parameter mapping
 */

const ASPECT_RATIOS = new Map<string, string>([
  ['256x256', 'ASPECT_1_1'],
  ['512x512', 'ASPECT_1_1'],
  ['1024x1024', 'ASPECT_1_1'],
  ['1792x1024', 'ASPECT_16_9'],
  ['1024x1792', 'ASPECT_9_16'],
  ['1536x1024', 'ASPECT_3_2'],
  ['1024x1536', 'ASPECT_2_3'],
]);

const RENDERING_SPEEDS = new Map<string, string>([
  ['standard', 'TURBO'],
  ['hd', 'STANDARD'],
]);

const STYLE_TYPES = new Map<string, string>([
  ['vivid', 'GENERAL'],
  ['natural', 'REALISTIC'],
]);

export const IDEOGRAM_DEFAULT_ASPECT_RATIO = 'ASPECT_1_1';
export const IDEOGRAM_DEFAULT_RENDERING_SPEED = 'TURBO';
export const IDEOGRAM_DEFAULT_STYLE_TYPE = 'GENERAL';

export function toIdeogramAspectRatio(size: string = '1024x1024'): string {
  return ASPECT_RATIOS.get(size) ?? IDEOGRAM_DEFAULT_ASPECT_RATIO;
}

/**
 * Quality → rendering_speed, case-insensitive
 */
export function toIdeogramRenderingSpeed(quality: string = 'standard'): string {
  return RENDERING_SPEEDS.get(quality.toLowerCase()) ?? IDEOGRAM_DEFAULT_RENDERING_SPEED;
}

/**
 * Style → style_type, case-insensitive
 */
export function toIdeogramStyleType(style: string): string {
  return STYLE_TYPES.get(style.toLowerCase()) ?? IDEOGRAM_DEFAULT_STYLE_TYPE;
}

/**
 * Canonical → Runway parameter mapping
 */

const RATIOS = new Map<string, string>([
  ['256x256', '1:1'],
  ['512x512', '1:1'],
  ['1024x1024', '1:1'],
  ['1792x1024', '16:9'],
  ['1024x1792', '9:16'],
  ['1536x1024', '3:2'],
  ['1024x1536', '2:3'],
  ['1920x1080', '16:9'],
]);

export const RUNWAY_DEFAULT_RATIO = '1:1';

export function toRunwayRatio(size: string = '1024x1024'): string {
  return RATIOS.get(size) ?? RUNWAY_DEFAULT_RATIO;
}

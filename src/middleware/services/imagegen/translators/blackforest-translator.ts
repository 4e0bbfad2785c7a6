/**
 * Canonical → Black Forest Labs parameter mapping.
 *
 * Black Forest takes explicit pixel dimensions instead of an aspect ratio.
 */

export interface Dimensions {
  width: number;
  height: number;
}

export const BLACKFOREST_DEFAULT_DIMENSIONS: Readonly<Dimensions> = Object.freeze({
  width: 1024,
  height: 1024,
});

/**
 * Parse "WxH" into integers. Undefined when the string is not of that form.
 */
export function parseSizeParam(size: string): Dimensions | undefined {
  const parts = size.split('x');
  if (parts.length !== 2 || !parts.every((part) => /^\d+$/.test(part.trim()))) {
    return undefined;
  }
  return { width: parseInt(parts[0], 10), height: parseInt(parts[1], 10) };
}

/**
 * Dimensions for a canonical size, 1024x1024 when it cannot be parsed
 */
export function toBlackForestDimensions(size: string = '1024x1024'): Dimensions {
  return parseSizeParam(size) ?? { ...BLACKFOREST_DEFAULT_DIMENSIONS };
}

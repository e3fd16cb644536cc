/**
 * Option defaults and validation.
 */

import { InvalidOptionError } from './errors.js';
import { DEFAULT_OPTIONS, type PixelmatchOptions, type ResolvedOptions, type RGBColor } from './types.js';

function unitInterval(name: string, value: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidOptionError(name, `${name} must be a number between 0 and 1, got ${String(value)}`);
  }
  return value;
}

function color(name: string, value: RGBColor): RGBColor {
  const valid =
    Array.isArray(value) &&
    value.length === 3 &&
    value.every((channel) => Number.isInteger(channel) && channel >= 0 && channel <= 255);
  if (!valid) {
    throw new InvalidOptionError(
      name,
      `${name} must be three integers between 0 and 255, got ${JSON.stringify(value)}`
    );
  }
  return [value[0], value[1], value[2]];
}

/**
 * Fill in defaults and validate. Throws `InvalidOptionError` on the first
 * bad field.
 */
export function resolveOptions(options: PixelmatchOptions = {}): ResolvedOptions {
  const {
    threshold = DEFAULT_OPTIONS.threshold,
    includeAA = DEFAULT_OPTIONS.includeAA,
    alpha = DEFAULT_OPTIONS.alpha,
    aaColor = DEFAULT_OPTIONS.aaColor,
    diffColor = DEFAULT_OPTIONS.diffColor,
    diffColorAlt = DEFAULT_OPTIONS.diffColorAlt,
    diffMask = DEFAULT_OPTIONS.diffMask,
  } = options;

  return {
    threshold: unitInterval('threshold', threshold),
    includeAA: Boolean(includeAA),
    alpha: unitInterval('alpha', alpha),
    aaColor: color('aaColor', aaColor),
    diffColor: color('diffColor', diffColor),
    diffColorAlt: color('diffColorAlt', diffColorAlt),
    diffMask: Boolean(diffMask),
  };
}

/**
 * pixeldiff
 * Barrel export for the comparison core and the PNG layer.
 */

export * from './core/types.js';
export * from './core/errors.js';
export { rgb2y, rgb2i, rgb2q, blend, colorDelta, maxDeltaFor } from './core/color-delta.js';
export { antialiased, hasManySiblings } from './core/antialias.js';
export { paintPixel, drawGrayPixel, diffColorFor } from './core/diff-compositor.js';
export { resolveOptions } from './core/options.js';
export { pixelmatch, compare, compareRows, classifyPixel } from './core/pixelmatch.js';
export {
  createPixelBuffer,
  pixelOffset,
  inBounds,
  pixelsEqual,
  writePixel,
  CHANNELS,
} from './core/pixel-buffer.js';
export { PixelComparator, type PixelCompareOptions } from './core/pixel-comparator.js';

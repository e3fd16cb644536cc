/**
 * Diff image compositing.
 */

import { blend, rgb2y } from './color-delta.js';
import { writePixel } from './pixel-buffer.js';
import type { PixelClassification, ResolvedOptions, RGBColor } from './types.js';

function drawColor(output: Uint8Array, offset: number, color: RGBColor): void {
  writePixel(output, offset, color[0], color[1], color[2], 255);
}

/**
 * Paint the source pixel as grayscale faded toward white by `alpha`.
 */
export function drawGrayPixel(
  source: Uint8Array,
  offset: number,
  alpha: number,
  output: Uint8Array
): void {
  const value = blend(
    rgb2y(source[offset], source[offset + 1], source[offset + 2]),
    (alpha * source[offset + 3]) / 255
  );
  writePixel(output, offset, value, value, value, 255);
}

function clearPixel(output: Uint8Array, offset: number): void {
  writePixel(output, offset, 0, 0, 0, 0);
}

/**
 * Pick the diff color for a signed delta: `diffColorAlt` when the expected
 * pixel is brighter, `diffColor` otherwise.
 */
export function diffColorFor(delta: number, options: ResolvedOptions): RGBColor {
  return delta < 0 ? options.diffColorAlt : options.diffColor;
}

/**
 * Write the output pixel for one classified pixel pair.
 *
 * `source` is the expected image's data; it provides the faded background
 * for matching pixels.
 */
export function paintPixel(
  output: Uint8Array,
  offset: number,
  classification: PixelClassification,
  source: Uint8Array,
  options: ResolvedOptions
): void {
  switch (classification.kind) {
    case 'diff':
      drawColor(output, offset, diffColorFor(classification.delta, options));
      return;
    case 'antiAliased':
      // a mask only shows counted differences
      if (options.diffMask) clearPixel(output, offset);
      else drawColor(output, offset, options.aaColor);
      return;
    case 'match':
      if (options.diffMask) clearPixel(output, offset);
      else drawGrayPixel(source, offset, options.alpha, output);
      return;
  }
}

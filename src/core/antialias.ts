/**
 * Anti-aliasing detection over a pixel's 3x3 neighborhood.
 *
 * Based on "Anti-aliased Pixel and Intensity Slope Detector" by V. Vysniauskas, 2009.
 */

import { colorDelta } from './color-delta.js';
import { pixelOffset, pixelsEqual } from './pixel-buffer.js';
import type { PixelBuffer } from './types.js';

interface Neighborhood {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

/** The in-bounds part of the 3x3 window around (x, y). */
function neighborhood(img: PixelBuffer, x: number, y: number): Neighborhood {
  return {
    x0: Math.max(x - 1, 0),
    y0: Math.max(y - 1, 0),
    x1: Math.min(x + 1, img.width - 1),
    y1: Math.min(y + 1, img.height - 1),
  };
}

/**
 * Whether pixel (x, y) in `img` has more than 2 byte-identical neighbors.
 */
export function hasManySiblings(img: PixelBuffer, x: number, y: number): boolean {
  const { x0, y0, x1, y1 } = neighborhood(img, x, y);
  const center = pixelOffset(img, x, y);
  let zeroes = 0;

  for (let nx = x0; nx <= x1; nx++) {
    for (let ny = y0; ny <= y1; ny++) {
      if (nx === x && ny === y) continue;
      if (pixelsEqual(img.data, center, img.data, pixelOffset(img, nx, ny))) {
        zeroes++;
        if (zeroes > 2) return true;
      }
    }
  }

  return false;
}

/**
 * Whether pixel (x, y) of `img` looks like an anti-aliased edge: it sits
 * between a darker and a brighter neighbor, and one of those extremes lies
 * in a flat area in both `img` and `other`.
 */
export function antialiased(img: PixelBuffer, x: number, y: number, other: PixelBuffer): boolean {
  const { x0, y0, x1, y1 } = neighborhood(img, x, y);
  const center = pixelOffset(img, x, y);

  let zeroes = 0;
  let min = 0;
  let max = 0;
  let minX = 0;
  let minY = 0;
  let maxX = 0;
  let maxY = 0;

  // column by column; on equal deltas the first neighbor visited stays the extreme
  for (let nx = x0; nx <= x1; nx++) {
    for (let ny = y0; ny <= y1; ny++) {
      if (nx === x && ny === y) continue;

      // brightness delta between the center pixel and the adjacent one
      const delta = colorDelta(img.data, center, img.data, pixelOffset(img, nx, ny), true);

      if (delta === 0) {
        zeroes++;
        // more than 2 equal siblings: a flat area, not anti-aliasing
        if (zeroes > 2) return false;
      } else if (delta < min) {
        min = delta;
        minX = nx;
        minY = ny;
      } else if (delta > max) {
        max = delta;
        maxX = nx;
        maxY = ny;
      }
    }
  }

  // needs both a darker and a brighter neighbor
  if (min === 0 || max === 0) return false;

  return (
    (hasManySiblings(img, minX, minY) && hasManySiblings(other, minX, minY)) ||
    (hasManySiblings(img, maxX, maxY) && hasManySiblings(other, maxX, maxY))
  );
}

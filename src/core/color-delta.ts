/**
 * YIQ color conversion and perceptual color distance.
 *
 * Based on "Measuring perceived color difference using YIQ NTSC transmission
 * color space in mobile applications" by Y. Kotsarenko and F. Ramos.
 */

import { pixelsEqual } from './pixel-buffer.js';
import { MAX_YIQ_DELTA } from './types.js';

const Y_WEIGHT = 0.5053;
const I_WEIGHT = 0.299;
const Q_WEIGHT = 0.1957;

export function rgb2y(r: number, g: number, b: number): number {
  return r * 0.29889531 + g * 0.58662247 + b * 0.11448223;
}

export function rgb2i(r: number, g: number, b: number): number {
  return r * 0.59597799 - g * 0.2741761 - b * 0.32180189;
}

export function rgb2q(r: number, g: number, b: number): number {
  return r * 0.21147017 - g * 0.52261711 + b * 0.31114694;
}

/**
 * Blend a channel value with white at opacity `a` (0-1).
 */
export function blend(c: number, a: number): number {
  return 255 + (c - 255) * a;
}

/**
 * Signed perceptual delta between the pixel at `offsetA` in `a` and the
 * pixel at `offsetB` in `b`.
 *
 * Full mode returns the weighted YIQ squared distance, negated when the
 * first pixel is brighter. `yOnly` returns the squared luma difference
 * carrying the sign of `Y1 - Y2`.
 */
export function colorDelta(
  a: Uint8Array,
  offsetA: number,
  b: Uint8Array,
  offsetB: number,
  yOnly = false
): number {
  if (pixelsEqual(a, offsetA, b, offsetB)) return 0;

  let r1 = a[offsetA];
  let g1 = a[offsetA + 1];
  let b1 = a[offsetA + 2];
  const a1 = a[offsetA + 3];

  let r2 = b[offsetB];
  let g2 = b[offsetB + 1];
  let b2 = b[offsetB + 2];
  const a2 = b[offsetB + 3];

  if (a1 < 255) {
    const opacity = a1 / 255;
    r1 = blend(r1, opacity);
    g1 = blend(g1, opacity);
    b1 = blend(b1, opacity);
  }

  if (a2 < 255) {
    const opacity = a2 / 255;
    r2 = blend(r2, opacity);
    g2 = blend(g2, opacity);
    b2 = blend(b2, opacity);
  }

  const y1 = rgb2y(r1, g1, b1);
  const y2 = rgb2y(r2, g2, b2);
  const y = y1 - y2;

  if (yOnly) return y * Math.abs(y);

  const i = rgb2i(r1, g1, b1) - rgb2i(r2, g2, b2);
  const q = rgb2q(r1, g1, b1) - rgb2q(r2, g2, b2);

  const delta = Y_WEIGHT * y * y + I_WEIGHT * i * i + Q_WEIGHT * q * q;

  // sign encodes whether the pixel lightens or darkens
  return y1 > y2 ? -delta : delta;
}

/**
 * Convert a 0-1 threshold into the absolute squared-distance cutoff.
 */
export function maxDeltaFor(threshold: number): number {
  return MAX_YIQ_DELTA * threshold * threshold;
}

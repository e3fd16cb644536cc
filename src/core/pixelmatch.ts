/**
 * Pixel-level comparison of two equally sized RGBA images.
 *
 * Every pixel is classified independently from the two read-only inputs;
 * only the caller that drives the scan owns the counter and the output
 * buffer, so row bands can be processed separately and their counts summed.
 */

import { antialiased } from './antialias.js';
import { colorDelta, maxDeltaFor } from './color-delta.js';
import { drawGrayPixel, paintPixel } from './diff-compositor.js';
import { resolveOptions } from './options.js';
import { assertBufferSize, assertSameDimensions, CHANNELS, pixelsEqual } from './pixel-buffer.js';
import type {
  DiffResult,
  PixelBuffer,
  PixelClassification,
  PixelmatchOptions,
  ResolvedOptions,
} from './types.js';

const MATCH: PixelClassification = Object.freeze({ kind: 'match', delta: 0 });

/**
 * Classify the pixel pair at (x, y).
 */
export function classifyPixel(
  expected: PixelBuffer,
  actual: PixelBuffer,
  x: number,
  y: number,
  options: ResolvedOptions,
  maxDelta: number
): PixelClassification {
  const pos = (y * expected.width + x) * CHANNELS;

  if (pixelsEqual(expected.data, pos, actual.data, pos)) return MATCH;

  const delta = colorDelta(expected.data, pos, actual.data, pos);
  if (Math.abs(delta) <= maxDelta) return { kind: 'match', delta };

  // check whether it's a real rendering difference or just anti-aliasing
  if (
    !options.includeAA &&
    (antialiased(expected, x, y, actual) || antialiased(actual, x, y, expected))
  ) {
    return { kind: 'antiAliased', delta };
  }

  return { kind: 'diff', delta };
}

/**
 * Compare rows [rowStart, rowEnd) and return the number of differing
 * pixels in that band. Inputs must already be validated.
 */
export function compareRows(
  expected: PixelBuffer,
  actual: PixelBuffer,
  diffOutput: PixelBuffer | undefined,
  options: ResolvedOptions,
  rowStart = 0,
  rowEnd = expected.height
): number {
  const { width } = expected;
  const maxDelta = maxDeltaFor(options.threshold);
  const start = Math.max(0, rowStart);
  const end = Math.min(expected.height, rowEnd);
  let diff = 0;

  for (let y = start; y < end; y++) {
    for (let x = 0; x < width; x++) {
      const classification = classifyPixel(expected, actual, x, y, options, maxDelta);
      if (classification.kind === 'diff') diff++;
      if (diffOutput) {
        paintPixel(
          diffOutput.data,
          (y * width + x) * CHANNELS,
          classification,
          expected.data,
          options
        );
      }
    }
  }

  return diff;
}

function validateInputs(
  expected: PixelBuffer,
  actual: PixelBuffer,
  diffOutput: PixelBuffer | undefined
): void {
  assertSameDimensions(expected, actual, 'expected', 'actual');
  assertBufferSize(expected, 'expected');
  assertBufferSize(actual, 'actual');
  if (diffOutput) {
    assertSameDimensions(expected, diffOutput, 'expected', 'output');
    assertBufferSize(diffOutput, 'output');
  }
}

function identical(a: Uint8Array, b: Uint8Array): boolean {
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * Compare `expected` against `actual` and return the number of differing
 * pixels. When `diffOutput` is given, every pixel of it is overwritten with
 * the diff visualization.
 *
 * Throws `DimensionMismatchError` or `InvalidOptionError` before any pixel
 * is processed.
 */
export function pixelmatch(
  expected: PixelBuffer,
  actual: PixelBuffer,
  diffOutput?: PixelBuffer,
  options: PixelmatchOptions = {}
): number {
  validateInputs(expected, actual, diffOutput);
  const resolved = resolveOptions(options);

  if (identical(expected.data, actual.data)) {
    if (diffOutput) {
      if (resolved.diffMask) {
        diffOutput.data.fill(0);
      } else {
        for (let pos = 0; pos < expected.data.length; pos += CHANNELS) {
          drawGrayPixel(expected.data, pos, resolved.alpha, diffOutput.data);
        }
      }
    }
    return 0;
  }

  return compareRows(expected, actual, diffOutput, resolved);
}

/**
 * Same as `pixelmatch`, returning a result object.
 */
export function compare(
  expected: PixelBuffer,
  actual: PixelBuffer,
  diffOutput?: PixelBuffer,
  options: PixelmatchOptions = {}
): DiffResult {
  return { diffPixels: pixelmatch(expected, actual, diffOutput, options) };
}

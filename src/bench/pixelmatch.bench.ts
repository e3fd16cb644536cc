/**
 * Throughput benchmarks for pixelmatch on synthetic 512x512 images.
 */

import { bench, describe } from 'vitest';
import { createPixelBuffer } from '../core/pixel-buffer.js';
import { pixelmatch } from '../core/pixelmatch.js';
import type { PixelBuffer } from '../core/types.js';

const SIZE = 512;

function gradient(shift: number): PixelBuffer {
  const img = createPixelBuffer(SIZE, SIZE);
  for (let y = 0; y < SIZE; y++) {
    for (let x = 0; x < SIZE; x++) {
      const idx = (y * SIZE + x) * 4;
      const value = ((x + y + shift) * 255) / (2 * SIZE);
      img.data[idx] = value;
      img.data[idx + 1] = value;
      img.data[idx + 2] = 255 - value;
      img.data[idx + 3] = 255;
    }
  }
  return img;
}

const expected = gradient(0);
const shifted = gradient(40);
const output = createPixelBuffer(SIZE, SIZE);

describe('pixelmatch 512x512', () => {
  bench('identical images', () => {
    pixelmatch(expected, expected, output);
  });

  bench('shifted gradient with diff output', () => {
    pixelmatch(expected, shifted, output, { threshold: 0.05 });
  });

  bench('shifted gradient, count only', () => {
    pixelmatch(expected, shifted, undefined, { threshold: 0.05 });
  });

  bench('shifted gradient, anti-aliasing included', () => {
    pixelmatch(expected, shifted, undefined, { threshold: 0.05, includeAA: true });
  });
});

/**
 * Flat RGBA buffer helpers: allocation, bounds-checked addressing and
 * per-pixel reads and writes.
 */

import { DimensionMismatchError } from './errors.js';
import type { PixelBuffer } from './types.js';

export const CHANNELS = 4;

/**
 * Allocate a zero-filled (fully transparent) buffer.
 */
export function createPixelBuffer(width: number, height: number): PixelBuffer {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
    throw new RangeError(`Invalid buffer size: ${width}x${height}`);
  }
  return { width, height, data: new Uint8Array(width * height * CHANNELS) };
}

export function inBounds(buffer: PixelBuffer, x: number, y: number): boolean {
  return x >= 0 && y >= 0 && x < buffer.width && y < buffer.height;
}

/**
 * Byte offset of pixel (x, y). Throws outside the image.
 */
export function pixelOffset(buffer: PixelBuffer, x: number, y: number): number {
  if (!inBounds(buffer, x, y)) {
    throw new RangeError(`Pixel (${x}, ${y}) is outside ${buffer.width}x${buffer.height}`);
  }
  return (y * buffer.width + x) * CHANNELS;
}

/** Whether all four channels are equal. */
export function pixelsEqual(
  a: Uint8Array,
  offsetA: number,
  b: Uint8Array,
  offsetB: number
): boolean {
  return (
    a[offsetA] === b[offsetB] &&
    a[offsetA + 1] === b[offsetB + 1] &&
    a[offsetA + 2] === b[offsetB + 2] &&
    a[offsetA + 3] === b[offsetB + 3]
  );
}

export function writePixel(
  data: Uint8Array,
  offset: number,
  r: number,
  g: number,
  b: number,
  a: number
): void {
  data[offset] = r;
  data[offset + 1] = g;
  data[offset + 2] = b;
  data[offset + 3] = a;
}

/**
 * Throw unless `data` holds exactly width * height RGBA pixels.
 */
export function assertBufferSize(buffer: PixelBuffer, label: string): void {
  const expected = buffer.width * buffer.height * CHANNELS;
  if (buffer.data.length !== expected) {
    throw new DimensionMismatchError(
      `${label} data size does not match width/height: ${buffer.data.length} bytes, expected ${expected} (${buffer.width}x${buffer.height})`
    );
  }
}

/**
 * Throw unless both buffers share width and height.
 */
export function assertSameDimensions(
  a: PixelBuffer,
  b: PixelBuffer,
  labelA: string,
  labelB: string
): void {
  if (a.width !== b.width || a.height !== b.height) {
    throw new DimensionMismatchError(
      `Image dimensions do not match: ${labelA}(${a.width}x${a.height}) vs ${labelB}(${b.width}x${b.height})`
    );
  }
}

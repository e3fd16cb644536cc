import { describe, it, expect } from 'vitest';
import { DimensionMismatchError } from './errors.js';
import {
  assertBufferSize,
  createPixelBuffer,
  inBounds,
  pixelOffset,
  pixelsEqual,
  writePixel,
} from './pixel-buffer.js';

describe('pixel buffers', () => {
  it('should allocate a transparent buffer', () => {
    const buffer = createPixelBuffer(3, 2);
    expect(buffer.width).toBe(3);
    expect(buffer.height).toBe(2);
    expect(buffer.data.length).toBe(24);
    expect(buffer.data.every((byte) => byte === 0)).toBe(true);
  });

  it('should reject a negative or fractional size', () => {
    expect(() => createPixelBuffer(-1, 2)).toThrow(RangeError);
    expect(() => createPixelBuffer(1.5, 2)).toThrow(RangeError);
  });

  it('should address pixels in row-major order', () => {
    const buffer = createPixelBuffer(3, 2);
    expect(pixelOffset(buffer, 0, 0)).toBe(0);
    expect(pixelOffset(buffer, 2, 0)).toBe(8);
    expect(pixelOffset(buffer, 1, 1)).toBe(16);
  });

  it('should refuse coordinates outside the image', () => {
    const buffer = createPixelBuffer(3, 2);
    expect(inBounds(buffer, 3, 0)).toBe(false);
    expect(inBounds(buffer, 0, -1)).toBe(false);
    expect(() => pixelOffset(buffer, 0, 2)).toThrow('Pixel (0, 2) is outside 3x2');
  });

  it('should compare and write whole pixels', () => {
    const buffer = createPixelBuffer(2, 1);
    writePixel(buffer.data, 0, 1, 2, 3, 4);
    expect(pixelsEqual(buffer.data, 0, buffer.data, 4)).toBe(false);
    writePixel(buffer.data, 4, 1, 2, 3, 4);
    expect(pixelsEqual(buffer.data, 0, buffer.data, 4)).toBe(true);
  });

  it('should reject data that does not match the declared size', () => {
    const buffer = { width: 2, height: 2, data: new Uint8Array(12) };
    expect(() => assertBufferSize(buffer, 'expected')).toThrow(DimensionMismatchError);
  });
});

/**
 * Tests for YIQ conversion and the perceptual color delta.
 */

import { describe, it, expect } from 'vitest';
import { blend, colorDelta, maxDeltaFor, rgb2i, rgb2q, rgb2y } from './color-delta.js';

describe('YIQ conversion', () => {
  it('should map white to full luma and no chroma', () => {
    expect(rgb2y(255, 255, 255)).toBeCloseTo(255, 4);
    expect(rgb2i(255, 255, 255)).toBeCloseTo(0, 6);
    expect(rgb2q(255, 255, 255)).toBeCloseTo(0, 6);
  });

  it('should map black to zero', () => {
    expect(rgb2y(0, 0, 0)).toBe(0);
    expect(rgb2i(0, 0, 0)).toBe(0);
    expect(rgb2q(0, 0, 0)).toBe(0);
  });

  it('should weight green highest in luma', () => {
    expect(rgb2y(0, 255, 0)).toBeGreaterThan(rgb2y(255, 0, 0));
    expect(rgb2y(255, 0, 0)).toBeGreaterThan(rgb2y(0, 0, 255));
  });

  it('should give pure red positive in-phase chroma', () => {
    expect(rgb2i(255, 0, 0)).toBeCloseTo(255 * 0.59597799, 6);
    expect(rgb2q(0, 255, 0)).toBeCloseTo(-255 * 0.52261711, 6);
  });
});

describe('blend', () => {
  it('should return white for a fully transparent channel', () => {
    expect(blend(0, 0)).toBe(255);
  });

  it('should keep an opaque channel unchanged', () => {
    expect(blend(100, 1)).toBe(100);
  });

  it('should mix halfway toward white', () => {
    expect(blend(0, 0.5)).toBe(127.5);
  });
});

describe('colorDelta', () => {
  const white = px(255, 255, 255, 255);
  const black = px(0, 0, 0, 255);

  it('should return exactly 0 for byte-identical pixels', () => {
    expect(colorDelta(white, 0, white, 0)).toBe(0);
    expect(colorDelta(px(10, 20, 30, 40), 0, px(10, 20, 30, 40), 0)).toBe(0);
  });

  it('should be negative when the first pixel is brighter', () => {
    expect(colorDelta(white, 0, black, 0)).toBeCloseTo(-32857.13, 1);
  });

  it('should be positive when the first pixel is darker', () => {
    expect(colorDelta(black, 0, white, 0)).toBeCloseTo(32857.13, 1);
  });

  it('should stay within the maximum YIQ delta', () => {
    expect(Math.abs(colorDelta(px(255, 0, 0, 255), 0, px(0, 0, 255, 255), 0))).toBeLessThan(35215);
  });

  it('should return the signed squared luma difference in brightness-only mode', () => {
    expect(colorDelta(white, 0, black, 0, true)).toBeCloseTo(65025, 1);
    expect(colorDelta(black, 0, white, 0, true)).toBeCloseTo(-65025, 1);
  });

  it('should compare transparent pixels as they render over white', () => {
    const transparent = px(0, 0, 0, 0);
    const delta = colorDelta(black, 0, transparent, 0);
    expect(delta).toBeCloseTo(32857.13, 1);
    expect(delta).toBeGreaterThan(maxDeltaFor(0.1));
  });

  it('should treat two fully transparent pixels as equal regardless of color', () => {
    expect(colorDelta(px(0, 0, 0, 0), 0, px(255, 0, 0, 0), 0)).toBe(0);
  });

  it('should read pixels at the given offsets', () => {
    const row = new Uint8Array([0, 0, 0, 255, 255, 255, 255, 255]);
    expect(colorDelta(row, 0, row, 4)).toBeCloseTo(32857.13, 1);
    expect(colorDelta(row, 4, row, 4)).toBe(0);
  });
});

describe('maxDeltaFor', () => {
  it('should scale the threshold quadratically', () => {
    expect(maxDeltaFor(0)).toBe(0);
    expect(maxDeltaFor(0.1)).toBeCloseTo(352.15, 6);
    expect(maxDeltaFor(1)).toBe(35215);
  });
});

// ── Test Helpers ──

function px(r: number, g: number, b: number, a: number): Uint8Array {
  return new Uint8Array([r, g, b, a]);
}

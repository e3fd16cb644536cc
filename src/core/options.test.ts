/**
 * Tests for option defaults and validation.
 */

import { describe, it, expect } from 'vitest';
import { InvalidOptionError } from './errors.js';
import { resolveOptions } from './options.js';
import { DEFAULT_OPTIONS } from './types.js';

describe('resolveOptions', () => {
  it('should fill every field with its default', () => {
    expect(resolveOptions()).toEqual({
      threshold: 0.1,
      includeAA: false,
      alpha: 0.1,
      aaColor: [255, 255, 0],
      diffColor: [255, 0, 0],
      diffColorAlt: [200, 0, 0],
      diffMask: false,
    });
  });

  it('should match DEFAULT_OPTIONS', () => {
    expect(resolveOptions({})).toEqual(DEFAULT_OPTIONS);
  });

  it('should keep provided values', () => {
    const resolved = resolveOptions({
      threshold: 0,
      includeAA: true,
      alpha: 1,
      aaColor: [0, 192, 0],
      diffColor: [255, 0, 255],
      diffColorAlt: [0, 255, 0],
      diffMask: true,
    });
    expect(resolved).toEqual({
      threshold: 0,
      includeAA: true,
      alpha: 1,
      aaColor: [0, 192, 0],
      diffColor: [255, 0, 255],
      diffColorAlt: [0, 255, 0],
      diffMask: true,
    });
  });

  it('should reject a threshold outside [0, 1]', () => {
    expect(() => resolveOptions({ threshold: -0.1 })).toThrow(InvalidOptionError);
    expect(() => resolveOptions({ threshold: 1.5 })).toThrow(/threshold must be a number between 0 and 1/);
    expect(() => resolveOptions({ threshold: Number.NaN })).toThrow(InvalidOptionError);
  });

  it('should reject an alpha outside [0, 1]', () => {
    expect(() => resolveOptions({ alpha: 2 })).toThrow(/alpha must be a number between 0 and 1, got 2/);
  });

  it('should name the offending option', () => {
    let caught: unknown;
    try {
      resolveOptions({ alpha: -1 });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(InvalidOptionError);
    expect(caught).toMatchObject({ option: 'alpha', code: 'INVALID_OPTION' });
  });

  it('should reject malformed colors', () => {
    expect(() => resolveOptions({ diffColor: [256, 0, 0] })).toThrow(/diffColor/);
    expect(() => resolveOptions({ aaColor: [1.5, 0, 0] })).toThrow(/aaColor/);
    expect(() => resolveOptions({ diffColorAlt: [-1, 0, 0] })).toThrow(/diffColorAlt/);
  });
});

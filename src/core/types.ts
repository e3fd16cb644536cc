/**
 * Core type definitions for the pixeldiff comparison engine.
 */

// ── Pixels ──

/** Color as [R, G, B], each channel 0-255. */
export type RGBColor = readonly [number, number, number];

/**
 * Row-major RGBA raster, 4 bytes per pixel.
 * pngjs `PNG` instances satisfy this shape directly.
 */
export interface PixelBuffer {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
}

// ── Options ──

export interface PixelmatchOptions {
  /** Matching threshold (0-1); smaller is more sensitive. Default 0.1 */
  threshold?: number;
  /** Count anti-aliased pixels as differences. Default false */
  includeAA?: boolean;
  /** Opacity of the original image in the diff output. Default 0.1 */
  alpha?: number;
  /** Color of anti-aliased pixels in the diff output. Default yellow */
  aaColor?: RGBColor;
  /** Color of differing pixels in the diff output. Default red */
  diffColor?: RGBColor;
  /** Color for differences where the expected image is the brighter one. Default dark red */
  diffColorAlt?: RGBColor;
  /** Draw the diff over a transparent background (a mask). Default false */
  diffMask?: boolean;
}

/** Options with every field filled in and validated. */
export interface ResolvedOptions {
  readonly threshold: number;
  readonly includeAA: boolean;
  readonly alpha: number;
  readonly aaColor: RGBColor;
  readonly diffColor: RGBColor;
  readonly diffColorAlt: RGBColor;
  readonly diffMask: boolean;
}

export const DEFAULT_OPTIONS: ResolvedOptions = Object.freeze({
  threshold: 0.1,
  includeAA: false,
  alpha: 0.1,
  aaColor: [255, 255, 0] as const,
  diffColor: [255, 0, 0] as const,
  diffColorAlt: [200, 0, 0] as const,
  diffMask: false,
});

/**
 * Largest value the YIQ delta can take; scales `threshold` into an
 * absolute squared-distance cutoff.
 */
export const MAX_YIQ_DELTA = 35215;

// ── Classification ──

export type PixelKind = 'match' | 'antiAliased' | 'diff';

export interface PixelClassification {
  kind: PixelKind;
  /** Signed YIQ delta; negative when the expected pixel is brighter. 0 for byte-identical pixels. */
  delta: number;
}

// ── Results ──

export interface DiffResult {
  /** Pixels counted as differing */
  diffPixels: number;
}

export interface ImageDiffResult extends DiffResult {
  width: number;
  height: number;
  totalPixels: number;
  /** Percentage (0-100) of pixels that differ */
  diffPercentage: number;
  /** Encoded PNG of the diff visualization */
  diffImage?: Buffer;
}

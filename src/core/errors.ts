/**
 * Error types raised by the comparison core and the PNG layer.
 */

export type PixelDiffErrorCode = 'DIMENSION_MISMATCH' | 'INVALID_OPTION' | 'IMAGE_DECODE';

export class PixelDiffError extends Error {
  readonly code: PixelDiffErrorCode;

  constructor(code: PixelDiffErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PixelDiffError';
    this.code = code;
  }
}

/** Input or output buffers disagree in size. */
export class DimensionMismatchError extends PixelDiffError {
  constructor(message: string) {
    super('DIMENSION_MISMATCH', message);
    this.name = 'DimensionMismatchError';
  }
}

export class InvalidOptionError extends PixelDiffError {
  readonly option: string;

  constructor(option: string, message: string) {
    super('INVALID_OPTION', message);
    this.name = 'InvalidOptionError';
    this.option = option;
  }
}

/** A PNG could not be decoded. */
export class ImageDecodeError extends PixelDiffError {
  constructor(message: string, cause?: unknown) {
    super('IMAGE_DECODE', message, { cause });
    this.name = 'ImageDecodeError';
  }
}

/**
 * Extract an error message from an unknown thrown value.
 *
 * @example
 * try {
 *   comparator.compare(a, b);
 * } catch (err) {
 *   console.error(`Failed: ${extractErrorMessage(err)}`);
 * }
 */
export function extractErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

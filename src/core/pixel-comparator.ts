/**
 * PNG-level comparison: decodes two PNG buffers with pngjs, runs
 * pixelmatch and encodes the diff visualization.
 */

import { PNG } from 'pngjs';
import { ImageDecodeError } from './errors.js';
import { assertSameDimensions } from './pixel-buffer.js';
import { pixelmatch } from './pixelmatch.js';
import type { ImageDiffResult, PixelmatchOptions } from './types.js';

export interface PixelCompareOptions extends PixelmatchOptions {
  /** Produce the encoded diff image, default true */
  output?: boolean;
}

/**
 * PixelComparator: compares encoded PNG images pixel by pixel.
 */
export class PixelComparator {
  /**
   * Decode a PNG buffer, naming the image in the error when it fails.
   */
  decode(image: Buffer, label: string): PNG {
    try {
      return PNG.sync.read(image);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ImageDecodeError(`Failed to decode ${label} image: ${reason}`, error);
    }
  }

  /**
   * Compare two PNG images.
   */
  compare(imageA: Buffer, imageB: Buffer, options: PixelCompareOptions = {}): ImageDiffResult {
    const { output = true, ...matchOptions } = options;

    const pngA = this.decode(imageA, 'expected');
    const pngB = this.decode(imageB, 'actual');

    assertSameDimensions(pngA, pngB, 'expected', 'actual');

    const { width, height } = pngA;
    const totalPixels = width * height;

    const diff = output ? new PNG({ width, height }) : undefined;
    const diffPixels = pixelmatch(pngA, pngB, diff, matchOptions);

    return {
      width,
      height,
      totalPixels,
      diffPixels,
      diffPercentage: totalPixels === 0 ? 0 : (diffPixels / totalPixels) * 100,
      diffImage: diff ? PNG.sync.write(diff) : undefined,
    };
  }
}

/**
 * Image Enhancement Module
 *
 * Cleans scanned pages before OCR: grayscale, light Gaussian blur, then a
 * binary threshold so faint pen strokes and scanner noise separate.
 */

import sharp from 'sharp';
import { logger } from '../utils/logger';
import { CorruptInputError } from '../shared/errors';
import type { ImageMediaType, PageImage } from '../types';

/** Formats the bundled image decoder has no loader for */
const UNDECODABLE: ReadonlySet<ImageMediaType> = new Set<ImageMediaType>(['image/bmp']);

export interface ImageEnhancerOptions {
  blurSigma?: number;
  threshold?: number;
}

export class ImageEnhancer {
  private readonly blurSigma: number;
  private readonly threshold: number;

  constructor(options: ImageEnhancerOptions = {}) {
    this.blurSigma = options.blurSigma ?? 1;
    this.threshold = options.threshold ?? 128;
  }

  supports(mimeType: ImageMediaType): boolean {
    return !UNDECODABLE.has(mimeType);
  }

  /**
   * Write an enhanced PNG copy of `page` to `outputPath`
   */
  async enhance(page: PageImage, outputPath: string): Promise<PageImage> {
    const startTime = Date.now();

    try {
      const info = await sharp(page.path)
        .grayscale()
        .blur(this.blurSigma)
        .threshold(this.threshold)
        .png()
        .toFile(outputPath);

      logger.debug({
        pageNumber: page.pageNumber,
        outputPath,
        dimensions: `${info.width}x${info.height}px`,
        ms: Date.now() - startTime,
      }, 'Page enhanced');
    } catch (error) {
      throw new CorruptInputError(`Page ${page.pageNumber} could not be decoded as an image`, {
        cause: error,
        details: { pageNumber: page.pageNumber, path: page.path },
      });
    }

    return {
      pageNumber: page.pageNumber,
      path: outputPath,
      mimeType: 'image/png',
    };
  }
}

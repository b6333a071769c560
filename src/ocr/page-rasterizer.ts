import fs from 'fs/promises';
import path from 'path';
import { pdfToPng } from 'pdf-to-png-converter';
import sharp from 'sharp';
import { logger } from '../utils/logger';
import { CorruptInputError, UnsupportedFormatError, errorMessage } from '../shared/errors';
import { SUPPORTED_MEDIA_TYPES } from '../types';
import type { ImageMediaType, MediaType, PageImage } from '../types';
import type { ImageEnhancer } from './image-enhancer';

export interface PageRasterizerOptions {
  tempDir: string;
  /** Render scale for PDF pages; 2.0 is roughly 150 DPI */
  viewportScale?: number;
  /** When set, every page is enhanced before it reaches OCR */
  enhancer?: ImageEnhancer;
}

const EXTENSION_MEDIA_TYPES: Record<string, MediaType> = {
  '.pdf': 'application/pdf',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.tif': 'image/tiff',
  '.tiff': 'image/tiff',
  '.bmp': 'image/bmp',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
};

/** Containers that may hold several frames, one scanned page each */
const MULTI_FRAME_TYPES: ReadonlySet<MediaType> = new Set<MediaType>(['image/tiff', 'image/gif', 'image/webp']);

export function isSupportedMediaType(value: string): value is MediaType {
  return SUPPORTED_MEDIA_TYPES.some(type => type === value);
}

/**
 * Infer a media type from a file extension, for front ends that do not declare one
 */
export function mediaTypeFromPath(filePath: string): MediaType | null {
  return EXTENSION_MEDIA_TYPES[path.extname(filePath).toLowerCase()] ?? null;
}

/**
 * Check the leading bytes of a file against its declared media type
 */
export function matchesSignature(header: Buffer, mediaType: MediaType): boolean {
  const ascii = (start: number, end: number) => header.subarray(start, end).toString('latin1');

  switch (mediaType) {
    case 'application/pdf':
      return ascii(0, 5) === '%PDF-';
    case 'image/png':
      return header.subarray(0, 8).equals(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]));
    case 'image/jpeg':
      return header[0] === 0xff && header[1] === 0xd8 && header[2] === 0xff;
    case 'image/tiff':
      return ascii(0, 4) === 'II*\u0000' || ascii(0, 4) === 'MM\u0000*';
    case 'image/bmp':
      return ascii(0, 2) === 'BM';
    case 'image/gif':
      return ascii(0, 4) === 'GIF8';
    case 'image/webp':
      return ascii(0, 4) === 'RIFF' && ascii(8, 12) === 'WEBP';
  }
}

/**
 * Turns an input file into ordered page images.
 *
 * PDFs are rendered page by page. Multi-frame TIFF, GIF and WebP files are
 * split into one PNG per frame; other images pass through as a single page.
 * Temporary files live in a per-run directory that `withPages` removes on
 * every exit path.
 */
export class PageRasterizer {
  private readonly tempDir: string;
  private readonly viewportScale: number;
  private readonly enhancer?: ImageEnhancer;

  constructor(options: PageRasterizerOptions) {
    this.tempDir = options.tempDir;
    this.viewportScale = options.viewportScale ?? 2.0;
    this.enhancer = options.enhancer;
  }

  /**
   * Rasterize `inputPath`, run `fn` on the pages, then release temp files
   */
  async withPages<T>(
    inputPath: string,
    mediaType: string,
    fn: (pages: PageImage[]) => Promise<T>
  ): Promise<T> {
    const declared = this.validateMediaType(mediaType);
    await this.verifyInput(inputPath, declared);

    await fs.mkdir(this.tempDir, { recursive: true });
    const workDir = await fs.mkdtemp(path.join(this.tempDir, 'form-'));

    try {
      const pages = await this.rasterize(inputPath, declared, workDir);
      const prepared = this.enhancer ? await this.enhancePages(pages, workDir) : pages;
      return await fn(prepared);
    } finally {
      await this.release(workDir);
    }
  }

  private validateMediaType(mediaType: string): MediaType {
    const normalized = mediaType.trim().toLowerCase();
    if (!isSupportedMediaType(normalized)) {
      throw new UnsupportedFormatError(`Unsupported media type "${mediaType}"`, {
        details: { mediaType, supported: SUPPORTED_MEDIA_TYPES },
      });
    }
    return normalized;
  }

  private async verifyInput(inputPath: string, mediaType: MediaType): Promise<void> {
    let header: Buffer;

    try {
      const handle = await fs.open(inputPath, 'r');
      try {
        const buffer = Buffer.alloc(16);
        const { bytesRead } = await handle.read(buffer, 0, buffer.length, 0);
        header = buffer.subarray(0, bytesRead);
      } finally {
        await handle.close();
      }
    } catch (error) {
      throw new CorruptInputError(`Input file is not readable: ${errorMessage(error)}`, {
        cause: error,
        details: { inputPath },
      });
    }

    if (header.length === 0) {
      throw new CorruptInputError('Input file is empty', { details: { inputPath } });
    }

    if (!matchesSignature(header, mediaType)) {
      throw new CorruptInputError(`File content does not match declared media type ${mediaType}`, {
        details: { inputPath, mediaType },
      });
    }
  }

  private async rasterize(inputPath: string, mediaType: MediaType, workDir: string): Promise<PageImage[]> {
    if (mediaType !== 'application/pdf') {
      return this.imagePages(inputPath, mediaType, workDir);
    }

    const startTime = Date.now();
    let rendered: Awaited<ReturnType<typeof pdfToPng>>;

    try {
      rendered = await pdfToPng(inputPath, {
        disableFontFace: true,
        useSystemFonts: true,
        viewportScale: this.viewportScale,
      });
    } catch (error) {
      throw new CorruptInputError(`PDF could not be rendered: ${errorMessage(error)}`, {
        cause: error,
        details: { inputPath },
      });
    }

    const ordered = [...rendered].sort((a, b) => a.pageNumber - b.pageNumber);
    if (ordered.length === 0) {
      throw new CorruptInputError('PDF contains no pages', { details: { inputPath } });
    }

    const pages: PageImage[] = [];
    for (const page of ordered) {
      if (!page.content || page.content.length === 0) {
        throw new CorruptInputError(`PDF page ${page.pageNumber} rendered empty`, {
          details: { inputPath, pageNumber: page.pageNumber },
        });
      }
      const pagePath = path.join(workDir, `page-${page.pageNumber}.png`);
      await fs.writeFile(pagePath, page.content);
      pages.push({ pageNumber: page.pageNumber, path: pagePath, mimeType: 'image/png' });
    }

    logger.info({
      inputPath,
      totalPages: pages.length,
      totalSizeKB: Math.round(ordered.reduce((sum, p) => sum + (p.content?.length ?? 0), 0) / 1024),
      ms: Date.now() - startTime,
    }, 'PDF rasterized');

    return pages;
  }

  private async imagePages(inputPath: string, mediaType: ImageMediaType, workDir: string): Promise<PageImage[]> {
    const single: PageImage[] = [{ pageNumber: 1, path: inputPath, mimeType: mediaType }];
    if (!MULTI_FRAME_TYPES.has(mediaType)) {
      logger.debug({ inputPath, mediaType }, 'Image input, single page');
      return single;
    }

    let frames: number;
    try {
      frames = (await sharp(inputPath).metadata()).pages ?? 1;
    } catch (error) {
      throw new CorruptInputError(`Image could not be decoded: ${errorMessage(error)}`, {
        cause: error,
        details: { inputPath, mediaType },
      });
    }
    if (frames <= 1) {
      logger.debug({ inputPath, mediaType }, 'Image input, single page');
      return single;
    }

    const pages: PageImage[] = [];
    for (let index = 0; index < frames; index++) {
      const pageNumber = index + 1;
      const pagePath = path.join(workDir, `page-${pageNumber}.png`);
      try {
        await sharp(inputPath, { page: index }).png().toFile(pagePath);
      } catch (error) {
        throw new CorruptInputError(`Frame ${pageNumber} could not be decoded: ${errorMessage(error)}`, {
          cause: error,
          details: { inputPath, pageNumber },
        });
      }
      pages.push({ pageNumber, path: pagePath, mimeType: 'image/png' });
    }

    logger.info({ inputPath, mediaType, totalPages: pages.length }, 'Multi-frame image split into pages');
    return pages;
  }

  private async enhancePages(pages: PageImage[], workDir: string): Promise<PageImage[]> {
    const enhancer = this.enhancer;
    if (!enhancer) {
      return pages;
    }

    const enhanced: PageImage[] = [];
    for (const page of pages) {
      if (!enhancer.supports(page.mimeType)) {
        logger.debug({ pageNumber: page.pageNumber, mimeType: page.mimeType }, 'Enhancement skipped for this format');
        enhanced.push(page);
        continue;
      }
      const outputPath = path.join(workDir, `page-${page.pageNumber}.enhanced.png`);
      enhanced.push(await enhancer.enhance(page, outputPath));
    }
    return enhanced;
  }

  private async release(workDir: string): Promise<void> {
    try {
      await fs.rm(workDir, { recursive: true, force: true });
      logger.debug({ workDir }, 'Cleaned up temporary page images');
    } catch (error) {
      logger.warn({ error, workDir }, 'Failed to clean up temporary page images');
    }
  }
}

import { logger } from '../utils/logger';
import { mapWithConcurrency, withRetry } from '../utils/retry';
import {
  ExtractionEngineUnavailableError,
  ExtractionTimeoutError,
  errorMessage,
} from '../shared/errors';
import type { ExtractedDocument, PageImage, PageText } from '../types';
import type { OcrEngine, OcrEngineOutput } from './engines/ocr-engine';

export interface TextExtractorOptions {
  /** Default per-page timeout; callers may override it per call */
  timeoutMs: number;
  /** Attempts per page when recognition times out */
  maxAttempts?: number;
  retryDelayMs?: number;
  pageConcurrency?: number;
  lowConfidenceThreshold?: number;
}

export interface ExtractOptions {
  timeoutMs?: number;
}

export const pageMarker = (pageNumber: number): string => `--- Page ${pageNumber} ---`;

export const PAGE_MARKER_PATTERN = /^---\s*Page\s+(\d+)\s*---$/i;

/**
 * Joins page texts in page order, each under its page marker
 */
export function combinePageTexts(pages: readonly PageText[]): string {
  return [...pages]
    .sort((a, b) => a.pageNumber - b.pageNumber)
    .map(page => `${pageMarker(page.pageNumber)}\n${page.text}`)
    .join('\n');
}

function normalizeOutput(output: OcrEngineOutput): { text: string; confidence?: number } {
  const text = output.text
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map(line => line.trimEnd())
    .join('\n')
    .trim();

  const confidence = output.confidence;
  if (confidence === undefined || !Number.isFinite(confidence)) {
    return { text };
  }
  return { text, confidence: Math.min(1, Math.max(0, confidence)) };
}

/**
 * Wraps an OCR engine with timeouts, timeout retries and ordered
 * multi-page extraction
 */
export class TextExtractor {
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly pageConcurrency: number;
  private readonly lowConfidenceThreshold: number;

  constructor(private readonly engine: OcrEngine, options: TextExtractorOptions) {
    this.timeoutMs = options.timeoutMs;
    this.maxAttempts = options.maxAttempts ?? 1;
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.pageConcurrency = options.pageConcurrency ?? 1;
    this.lowConfidenceThreshold = options.lowConfidenceThreshold ?? 0.6;
  }

  get engineName(): string {
    return this.engine.name;
  }

  async extractPage(page: PageImage, options: ExtractOptions = {}): Promise<PageText> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;

    return withRetry(
      () => this.recognizeOnce(page, timeoutMs),
      `ocr:${this.engine.name}:page-${page.pageNumber}`,
      {
        maxAttempts: this.maxAttempts,
        baseDelayMs: this.retryDelayMs,
        isRetryable: error => error instanceof ExtractionTimeoutError,
      }
    );
  }

  async extractDocument(pages: readonly PageImage[], options: ExtractOptions = {}): Promise<ExtractedDocument> {
    const startTime = Date.now();

    const results = await mapWithConcurrency(pages, this.pageConcurrency, page =>
      this.extractPage(page, options)
    );
    const ordered = [...results].sort((a, b) => a.pageNumber - b.pageNumber);

    const scored = ordered.flatMap(page => (page.confidence === undefined ? [] : [page.confidence]));
    const meanConfidence = scored.length > 0
      ? scored.reduce((sum, c) => sum + c, 0) / scored.length
      : undefined;

    const text = combinePageTexts(ordered);

    logger.info({
      engine: this.engine.name,
      totalPages: ordered.length,
      totalChars: text.length,
      meanConfidence,
      ms: Date.now() - startTime,
    }, 'Text extraction complete');

    return { pages: ordered, text, meanConfidence };
  }

  private async recognizeOnce(page: PageImage, timeoutMs: number): Promise<PageText> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(this.timeoutError(page, timeoutMs));
        controller.abort();
      }, timeoutMs);
    });

    try {
      const output = await Promise.race([
        this.engine.recognize(page, { signal: controller.signal }),
        timeout,
      ]);
      const { text, confidence } = normalizeOutput(output);

      if (confidence !== undefined && confidence < this.lowConfidenceThreshold) {
        logger.warn({
          pageNumber: page.pageNumber,
          confidence,
          threshold: this.lowConfidenceThreshold,
        }, 'Low OCR confidence');
      }

      logger.debug({ pageNumber: page.pageNumber, textLength: text.length, confidence }, 'Page extracted');
      return confidence === undefined
        ? { pageNumber: page.pageNumber, text }
        : { pageNumber: page.pageNumber, text, confidence };
    } catch (error) {
      if (error instanceof ExtractionTimeoutError || error instanceof ExtractionEngineUnavailableError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw this.timeoutError(page, timeoutMs);
      }

      // Recognition failures are a quality signal, not a pipeline failure
      logger.warn({
        engine: this.engine.name,
        pageNumber: page.pageNumber,
        error: errorMessage(error),
      }, 'OCR recognition failed, page recorded as empty');
      return { pageNumber: page.pageNumber, text: '', confidence: 0 };
    } finally {
      clearTimeout(timer);
    }
  }

  private timeoutError(page: PageImage, timeoutMs: number): ExtractionTimeoutError {
    return new ExtractionTimeoutError(`OCR of page ${page.pageNumber} exceeded ${timeoutMs}ms`, {
      details: { pageNumber: page.pageNumber, timeoutMs, engine: this.engine.name },
    });
  }
}

import { TextExtractor, combinePageTexts, pageMarker } from '../text-extractor';
import { ExtractionEngineUnavailableError, ExtractionTimeoutError } from '../../shared/errors';
import type { OcrEngine, OcrEngineOutput, RecognizeOptions } from '../engines/ocr-engine';
import type { PageImage } from '../../types';

type Handler = (image: PageImage, options: RecognizeOptions) => Promise<OcrEngineOutput>;

class FakeEngine implements OcrEngine {
  readonly name = 'fake';
  readonly calls: number[] = [];

  constructor(private readonly handler: Handler) {}

  recognize(image: PageImage, options: RecognizeOptions): Promise<OcrEngineOutput> {
    this.calls.push(image.pageNumber);
    return this.handler(image, options);
  }
}

const page = (pageNumber: number): PageImage => ({
  pageNumber,
  path: `/tmp/page-${pageNumber}.png`,
  mimeType: 'image/png',
});

const delay = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

/** Never settles on its own; rejects once the extractor aborts it */
const hangUntilAborted: Handler = (_image, { signal }) =>
  new Promise((_, reject) => {
    signal.addEventListener('abort', () => reject(new Error('The operation was aborted')));
  });

describe('TextExtractor', () => {
  describe('extractDocument', () => {
    it('should return pages in page order under page markers whatever order they finish in', async () => {
      const finishDelays: Record<number, number> = { 1: 30, 2: 5, 3: 15 };
      const engine = new FakeEngine(async image => {
        await delay(finishDelays[image.pageNumber]);
        return { text: `Text ${image.pageNumber}`, confidence: 1 - image.pageNumber / 10 };
      });
      const extractor = new TextExtractor(engine, { timeoutMs: 1000, pageConcurrency: 3 });

      const document = await extractor.extractDocument([page(3), page(1), page(2)]);

      expect(document.pages.map(p => p.pageNumber)).toEqual([1, 2, 3]);
      expect(document.text).toBe('--- Page 1 ---\nText 1\n--- Page 2 ---\nText 2\n--- Page 3 ---\nText 3');
      expect(document.meanConfidence).toBeCloseTo(0.8, 10);
    });

    it('should leave the mean confidence undefined when the engine reports none', async () => {
      const extractor = new TextExtractor(new FakeEngine(async () => ({ text: 'Name: Jane Doe' })), {
        timeoutMs: 1000,
      });

      const document = await extractor.extractDocument([page(1)]);

      expect(document.pages).toEqual([{ pageNumber: 1, text: 'Name: Jane Doe' }]);
      expect(document.meanConfidence).toBeUndefined();
    });

    it('should fail the document when the engine is unavailable', async () => {
      const engine = new FakeEngine(async image => {
        if (image.pageNumber === 2) {
          throw new ExtractionEngineUnavailableError('tesseract is not installed');
        }
        return { text: 'ok' };
      });
      const extractor = new TextExtractor(engine, { timeoutMs: 1000 });

      await expect(extractor.extractDocument([page(1), page(2), page(3)])).rejects.toThrow(
        ExtractionEngineUnavailableError
      );
      expect(engine.calls).toEqual([1, 2]);
    });
  });

  describe('extractPage', () => {
    it('should normalize line endings and trailing whitespace and clamp confidence', async () => {
      const extractor = new TextExtractor(
        new FakeEngine(async () => ({ text: '  line one  \r\nline two   \n\n', confidence: 1.7 })),
        { timeoutMs: 1000 }
      );

      await expect(extractor.extractPage(page(1))).resolves.toEqual({
        pageNumber: 1,
        text: 'line one\nline two',
        confidence: 1,
      });
    });

    it('should record a recognition failure as an empty page', async () => {
      const extractor = new TextExtractor(
        new FakeEngine(async () => {
          throw new Error('image too noisy');
        }),
        { timeoutMs: 1000 }
      );

      await expect(extractor.extractPage(page(2))).resolves.toEqual({ pageNumber: 2, text: '', confidence: 0 });
    });

    it('should abort the engine and fail with ExtractionTimeout', async () => {
      const signals: AbortSignal[] = [];
      const extractor = new TextExtractor(
        new FakeEngine((image, options) => {
          signals.push(options.signal);
          return hangUntilAborted(image, options);
        }),
        { timeoutMs: 20 }
      );

      const attempt = extractor.extractPage(page(1));

      await expect(attempt).rejects.toThrow(ExtractionTimeoutError);
      await expect(attempt).rejects.toMatchObject({
        retryable: true,
        details: { pageNumber: 1, timeoutMs: 20, engine: 'fake' },
      });
      expect(signals).toHaveLength(1);
      expect(signals[0].aborted).toBe(true);
    });

    it('should let the caller shorten the timeout', async () => {
      const extractor = new TextExtractor(new FakeEngine(hangUntilAborted), { timeoutMs: 60000 });

      await expect(extractor.extractPage(page(1), { timeoutMs: 15 })).rejects.toMatchObject({
        code: 'ExtractionTimeout',
        message: 'OCR of page 1 exceeded 15ms',
      });
    });

    it('should retry a timed out page', async () => {
      const engine: FakeEngine = new FakeEngine((image, options) =>
        engine.calls.length === 1 ? hangUntilAborted(image, options) : Promise.resolve({ text: 'second try' })
      );
      const extractor = new TextExtractor(engine, { timeoutMs: 20, maxAttempts: 2, retryDelayMs: 1 });

      await expect(extractor.extractPage(page(1))).resolves.toEqual({ pageNumber: 1, text: 'second try' });
      expect(engine.calls).toEqual([1, 1]);
    });

    it('should not retry an unavailable engine', async () => {
      const engine = new FakeEngine(async () => {
        throw new ExtractionEngineUnavailableError('GEMINI_API_KEY is required');
      });
      const extractor = new TextExtractor(engine, { timeoutMs: 1000, maxAttempts: 3, retryDelayMs: 1 });

      await expect(extractor.extractPage(page(1))).rejects.toThrow('GEMINI_API_KEY is required');
      expect(engine.calls).toEqual([1]);
    });
  });

  describe('combinePageTexts', () => {
    it('should sort pages and keep empty pages under their marker', () => {
      expect(combinePageTexts([
        { pageNumber: 2, text: '' },
        { pageNumber: 1, text: 'Name: Jane Doe' },
      ])).toBe('--- Page 1 ---\nName: Jane Doe\n--- Page 2 ---\n');
      expect(pageMarker(12)).toBe('--- Page 12 ---');
    });
  });
});

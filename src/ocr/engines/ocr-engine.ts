import type { PageImage } from '../../types';

export interface OcrEngineOutput {
  text: string;
  /** Mean recognition confidence in [0, 1], when the engine reports one */
  confidence?: number;
}

export interface RecognizeOptions {
  /** Aborted when the caller's timeout expires */
  signal: AbortSignal;
}

/**
 * Black-box text recognition service.
 *
 * Implementations throw `ExtractionEngineUnavailableError` when the engine
 * cannot be invoked at all; any other error is treated as a recognition
 * failure of that one page.
 */
export interface OcrEngine {
  readonly name: string;
  recognize(image: PageImage, options: RecognizeOptions): Promise<OcrEngineOutput>;
}

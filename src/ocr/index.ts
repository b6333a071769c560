/**
 * OCR module for scanned intake forms
 *
 * Rasterizes PDFs and images into page images, optionally cleans them up,
 * and transcribes each page through a pluggable engine (tesseract CLI or
 * Gemini vision).
 */

export { PageRasterizer, PageRasterizerOptions, isSupportedMediaType, mediaTypeFromPath, matchesSignature } from './page-rasterizer';
export { ImageEnhancer, ImageEnhancerOptions } from './image-enhancer';
export { TextExtractor, TextExtractorOptions, ExtractOptions, pageMarker, combinePageTexts, PAGE_MARKER_PATTERN } from './text-extractor';
export { OcrEngine, OcrEngineOutput, RecognizeOptions } from './engines/ocr-engine';
export { TesseractEngine, TesseractEngineConfig, parseTesseractTsv } from './engines/tesseract-engine';
export { GeminiEngine, GeminiEngineConfig } from './engines/gemini-engine';
export { TRANSCRIBE_PROMPT } from './prompts';

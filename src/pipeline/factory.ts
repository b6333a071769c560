import { logger } from '../utils/logger';
import { createServiceClient } from '../utils/supabase';
import { StorageUnavailableError } from '../shared/errors';
import { GeminiEngine } from '../ocr/engines/gemini-engine';
import { TesseractEngine } from '../ocr/engines/tesseract-engine';
import { ImageEnhancer } from '../ocr/image-enhancer';
import { PageRasterizer } from '../ocr/page-rasterizer';
import { TextExtractor } from '../ocr/text-extractor';
import { FormParser } from '../parser/form-parser';
import { SqliteFormStore } from '../storage/sqlite-form-store';
import { SupabaseFormStore, rpcClientFrom } from '../storage/supabase-form-store';
import { FormPipeline } from './form-pipeline';
import type { AppConfig } from '../config';
import type { OcrEngine } from '../ocr/engines/ocr-engine';
import type { FormStore } from '../storage/form-store';

export interface PipelineOverrides {
  /** Overrides `storage.databasePath` for the sqlite driver */
  databasePath?: string;
  engine?: OcrEngine;
  store?: FormStore;
}

export function createOcrEngine(ocr: AppConfig['ocr']): OcrEngine {
  switch (ocr.engine) {
    case 'gemini':
      return new GeminiEngine({ apiKey: ocr.gemini.apiKey, model: ocr.gemini.model });
    case 'tesseract':
      return new TesseractEngine(ocr.tesseract);
  }
}

export function createFormStore(storage: AppConfig['storage'], databasePath?: string): FormStore {
  switch (storage.driver) {
    case 'sqlite':
      return SqliteFormStore.open(databasePath ?? storage.databasePath, { nameMatching: storage.nameMatching });
    case 'supabase':
      if (!storage.supabase) {
        throw new StorageUnavailableError('SUPABASE_URL and SUPABASE_SERVICE_KEY are required for the supabase driver');
      }
      return new SupabaseFormStore(rpcClientFrom(createServiceClient(storage.supabase)), storage.nameMatching);
  }
}

/**
 * Wire a pipeline from configuration. Each call opens its own store handle;
 * the caller closes it through `pipeline.store.close()`.
 */
export function createFormPipeline(appConfig: AppConfig, overrides: PipelineOverrides = {}): FormPipeline {
  const { ocr, parsing, storage } = appConfig;

  const engine = overrides.engine ?? createOcrEngine(ocr);
  const rasterizer = new PageRasterizer({
    tempDir: ocr.tempDir,
    viewportScale: ocr.viewportScale,
    enhancer: ocr.enhance ? new ImageEnhancer() : undefined,
  });
  const extractor = new TextExtractor(engine, {
    timeoutMs: ocr.timeoutMs,
    maxAttempts: ocr.maxAttempts,
    pageConcurrency: ocr.pageConcurrency,
    lowConfidenceThreshold: ocr.lowConfidenceThreshold,
  });
  const parser = new FormParser({ dateOrder: parsing.dateOrder });
  const store = overrides.store ?? createFormStore(storage, overrides.databasePath);

  logger.info({
    engine: engine.name,
    store: store.name,
    enhance: ocr.enhance,
    pageConcurrency: ocr.pageConcurrency,
  }, 'Form pipeline ready');

  return new FormPipeline({ rasterizer, extractor, parser, store });
}

import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger';
import { withRetry } from '../utils/retry';
import { FormPipelineError, PipelineStage, describeError, toStageError } from '../shared/errors';
import { DocumentRun } from './state-machine';
import type { PageRasterizer } from '../ocr/page-rasterizer';
import type { TextExtractor } from '../ocr/text-extractor';
import type { FormParser } from '../parser/form-parser';
import type { FormStore } from '../storage/form-store';
import type { PageText, PipelineResult, PipelineState, StructuredRecord } from '../types';

export interface FormPipelineDeps {
  rasterizer: PageRasterizer;
  extractor: TextExtractor;
  parser: FormParser;
  store: FormStore;
}

export interface FormPipelineOptions {
  /** Attempts per submission while the store reports a retryable failure */
  persistAttempts?: number;
  persistRetryDelayMs?: number;
}

export interface ProcessOptions {
  /** Caller's identifier for the document; defaults to the file name */
  inputId?: string;
  extractionTimeoutMs?: number;
}

/** Stage that runs next from each state; errors are attributed to it */
const NEXT_STAGE: Record<PipelineState, PipelineStage> = {
  received: 'rasterize',
  rasterized: 'extract',
  extracted: 'parse',
  parsed: 'persist',
  persisted: 'persist',
  failed: 'persist',
};

interface RunOutcome {
  pages?: PageText[];
  record?: StructuredRecord;
}

/**
 * Runs one document through rasterize → extract → parse → persist.
 *
 * Document failures come back as a `failed` result, never as a rejection.
 * Nothing is written before parsing succeeds, and a persist failure returns
 * the parsed record so `persist` can retry without repeating OCR.
 */
export class FormPipeline {
  private readonly persistAttempts: number;
  private readonly persistRetryDelayMs: number;

  constructor(private readonly deps: FormPipelineDeps, options: FormPipelineOptions = {}) {
    this.persistAttempts = options.persistAttempts ?? 3;
    this.persistRetryDelayMs = options.persistRetryDelayMs ?? 500;
  }

  get store(): FormStore {
    return this.deps.store;
  }

  async process(inputPath: string, mediaType: string, options: ProcessOptions = {}): Promise<PipelineResult> {
    const inputId = options.inputId ?? path.basename(inputPath);
    const runId = uuidv4();
    const run = new DocumentRun();
    const outcome: RunOutcome = {};
    const startTime = Date.now();

    logger.info({ runId, inputId, inputPath, mediaType }, 'Processing form');

    try {
      const record = await this.deps.rasterizer.withPages(inputPath, mediaType, async pages => {
        run.advance('rasterized');

        const document = await this.deps.extractor.extractDocument(pages, {
          timeoutMs: options.extractionTimeoutMs,
        });
        outcome.pages = document.pages;
        run.advance('extracted');

        const parsed = this.deps.parser.parsePages(document.pages);
        run.advance('parsed');
        return parsed;
      });
      outcome.record = record;

      return await this.commit(run, inputId, runId, record, outcome.pages, startTime);
    } catch (error) {
      return this.fail(run, inputId, runId, error, outcome, startTime);
    }
  }

  /**
   * Retry persistence of a record whose earlier run failed at the persist stage
   */
  async persist(inputId: string, record: StructuredRecord): Promise<PipelineResult> {
    const runId = uuidv4();
    const run = new DocumentRun('parsed');
    const startTime = Date.now();

    logger.info({ runId, inputId }, 'Retrying persistence');

    try {
      return await this.commit(run, inputId, runId, record, undefined, startTime);
    } catch (error) {
      return this.fail(run, inputId, runId, error, { record }, startTime);
    }
  }

  private async commit(
    run: DocumentRun,
    inputId: string,
    runId: string,
    record: StructuredRecord,
    pages: PageText[] | undefined,
    startTime: number
  ): Promise<PipelineResult> {
    const receipt = await withRetry(
      () => this.deps.store.recordSubmission(record),
      `persist:${this.deps.store.name}:${inputId}`,
      {
        maxAttempts: this.persistAttempts,
        baseDelayMs: this.persistRetryDelayMs,
        isRetryable: error => error instanceof FormPipelineError && error.retryable,
      }
    );
    run.advance('persisted');

    logger.info({
      runId,
      inputId,
      patientId: receipt.patientId,
      submissionId: receipt.submissionId,
      patientCreated: receipt.patientCreated,
      ms: Date.now() - startTime,
    }, 'Form persisted');

    return {
      status: 'persisted',
      inputId,
      runId,
      state: run.state,
      history: run.history,
      patientId: receipt.patientId,
      submissionId: receipt.submissionId,
      patientCreated: receipt.patientCreated,
      record,
      ...(pages ? { pages } : {}),
    };
  }

  private fail(
    run: DocumentRun,
    inputId: string,
    runId: string,
    error: unknown,
    outcome: RunOutcome,
    startTime: number
  ): PipelineResult {
    const failure = toStageError(error, NEXT_STAGE[run.state]);
    run.advance('failed');

    const context = {
      runId,
      inputId,
      code: failure.code,
      stage: failure.stage,
      retryable: failure.retryable,
      error: failure,
      ms: Date.now() - startTime,
    };
    if (failure.fatal) {
      logger.error(context, 'Form failed with an integrity error');
    } else {
      logger.warn(context, 'Form failed');
    }

    return {
      status: 'failed',
      inputId,
      runId,
      state: run.state,
      history: run.history,
      ...(outcome.record ? { record: outcome.record } : {}),
      ...(outcome.pages ? { pages: outcome.pages } : {}),
      error: describeError(failure),
    };
  }
}

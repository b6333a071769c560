/**
 * Error taxonomy for the intake pipeline.
 *
 * Every failure carries the stage it belongs to, so a front end can tell the
 * operator where a document stopped without inspecting messages.
 */

export type PipelineStage = 'rasterize' | 'extract' | 'parse' | 'persist';

export type FormPipelineErrorCode =
  | 'UnsupportedFormat'
  | 'CorruptInput'
  | 'ExtractionEngineUnavailable'
  | 'ExtractionTimeout'
  | 'MissingRequiredField'
  | 'StorageUnavailable'
  | 'ForeignKeyViolation'
  | 'DuplicateAmbiguity';

export interface FormPipelineErrorOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export abstract class FormPipelineError extends Error {
  abstract readonly code: FormPipelineErrorCode;
  abstract readonly stage: PipelineStage;
  readonly retryable: boolean = false;
  /** Data-integrity breach: must be reported, never corrected automatically. */
  readonly fatal: boolean = false;
  readonly details: Record<string, unknown>;

  constructor(message: string, options: FormPipelineErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.details = options.details ?? {};
  }
}

export class UnsupportedFormatError extends FormPipelineError {
  readonly code = 'UnsupportedFormat';
  readonly stage = 'rasterize';
}

export class CorruptInputError extends FormPipelineError {
  readonly code = 'CorruptInput';
  readonly stage = 'rasterize';
}

export class ExtractionEngineUnavailableError extends FormPipelineError {
  readonly code = 'ExtractionEngineUnavailable';
  readonly stage = 'extract';
}

export class ExtractionTimeoutError extends FormPipelineError {
  readonly code = 'ExtractionTimeout';
  readonly stage = 'extract';
  override readonly retryable = true;
}

export class MissingRequiredFieldError extends FormPipelineError {
  readonly code = 'MissingRequiredField';
  readonly stage = 'parse';

  constructor(readonly field: string, options: FormPipelineErrorOptions = {}) {
    super(`Required field "${field}" was not found in the extracted text`, {
      ...options,
      details: { field, ...options.details },
    });
  }
}

export class StorageUnavailableError extends FormPipelineError {
  readonly code = 'StorageUnavailable';
  readonly stage = 'persist';
  override readonly retryable = true;
}

export class ForeignKeyViolationError extends FormPipelineError {
  readonly code = 'ForeignKeyViolation';
  readonly stage = 'persist';
  override readonly fatal = true;
}

export class DuplicateAmbiguityError extends FormPipelineError {
  readonly code = 'DuplicateAmbiguity';
  readonly stage = 'persist';
  override readonly fatal = true;

  constructor(readonly patientIds: number[], options: FormPipelineErrorOptions = {}) {
    super(`Natural key matches ${patientIds.length} existing patients (ids ${patientIds.join(', ')})`, {
      ...options,
      details: { patientIds, ...options.details },
    });
  }
}

export interface PipelineErrorInfo {
  code: FormPipelineErrorCode;
  stage: PipelineStage;
  message: string;
  retryable: boolean;
  fatal: boolean;
  details: Record<string, unknown>;
}

export function describeError(error: FormPipelineError): PipelineErrorInfo {
  return {
    code: error.code,
    stage: error.stage,
    message: error.message,
    retryable: error.retryable,
    fatal: error.fatal,
    details: error.details,
  };
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  // Errors thrown from another realm fail `instanceof Error`
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Attribute an error to the stage it escaped from. Taxonomy errors pass
 * through; anything else becomes the stage's default code with the original
 * error as `cause`.
 */
export function toStageError(error: unknown, stage: PipelineStage): FormPipelineError {
  if (error instanceof FormPipelineError) {
    return error;
  }

  const options: FormPipelineErrorOptions = {
    cause: error,
    details: { unexpected: true, reason: errorMessage(error) },
  };

  switch (stage) {
    case 'rasterize':
      return new CorruptInputError(`Rasterization failed: ${errorMessage(error)}`, options);
    case 'extract':
      return new ExtractionEngineUnavailableError(`Text extraction failed: ${errorMessage(error)}`, options);
    case 'parse':
      return new MissingRequiredFieldError('name', options);
    case 'persist':
      return new StorageUnavailableError(`Persistence failed: ${errorMessage(error)}`, options);
  }
}

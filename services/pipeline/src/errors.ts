export type PipelineErrorKind = 'validation' | 'external_service' | 'data_quality' | 'internal';

export type PipelineErrorCode =
  | 'INVALID_METADATA'
  | 'INVALID_GEOMETRY'
  | 'INVALID_DATE_RANGE'
  | 'UNKNOWN_JOB_TYPE'
  | 'AREA_NOT_FOUND'
  | 'JOB_NOT_FOUND'
  | 'JOB_NOT_FAILED'
  | 'STORAGE'
  | 'NOT_FOUND'
  | 'IMAGERY'
  | 'DATABASE'
  | 'RASTER_DECODE'
  | 'NO_VALID_PIXELS'
  | 'TIMEOUT'
  | 'EXPORT_INCOMPLETE'
  | 'ABANDONED'
  | 'UNEXPECTED';

export class PipelineError extends Error {
  public readonly kind: PipelineErrorKind;
  public readonly code: PipelineErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    kind: PipelineErrorKind,
    message: string,
    code: PipelineErrorCode,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PipelineError';
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

export class ValidationError extends PipelineError {
  constructor(message: string, code: PipelineErrorCode = 'INVALID_METADATA', details?: Record<string, unknown>) {
    super('validation', message, code, details);
    this.name = 'ValidationError';
  }
}

export class ExternalServiceError extends PipelineError {
  constructor(
    message: string,
    code: PipelineErrorCode,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super('external_service', message, code, details, options);
    this.name = 'ExternalServiceError';
  }
}

export class StorageError extends ExternalServiceError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
    code: PipelineErrorCode = 'STORAGE'
  ) {
    super(message, code, details, options);
    this.name = 'StorageError';
  }
}

export class BlobNotFoundError extends StorageError {
  constructor(bucket: string, key: string) {
    super(`object ${bucket}/${key} not found`, { bucket, key }, undefined, 'NOT_FOUND');
    this.name = 'BlobNotFoundError';
  }
}

export class DataQualityError extends PipelineError {
  constructor(message: string, code: PipelineErrorCode, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super('data_quality', message, code, details, options);
    this.name = 'DataQualityError';
  }
}

export class InternalSchedulerError extends PipelineError {
  constructor(message: string, code: PipelineErrorCode = 'UNEXPECTED', options?: { cause?: unknown }) {
    super('internal', message, code, undefined, options);
    this.name = 'InternalSchedulerError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  if (typeof err === 'string') {
    return err;
  }
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}

/**
 * Human-readable cause stored in `processing_jobs.error_message`.
 * Errors outside the taxonomy are reported as `internal`.
 */
export function describeError(err: unknown): string {
  if (err instanceof PipelineError) {
    return `${err.kind}: ${err.message}`;
  }
  return `internal: ${errorMessage(err)}`;
}

export function assertUnreachable(value: never): never {
  throw new Error(`Unhandled value: ${JSON.stringify(value)}`);
}

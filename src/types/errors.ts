/**
 * Pipeline error taxonomy
 */

import { ValidationError } from './validation';

export type PipelineErrorCode =
  | 'FETCH_FAILED'
  | 'EXTRACTION_FAILED'
  | 'INSUFFICIENT_DATA'
  | 'INVALID_CONFIGURATION'
  | 'INVALID_TRANSITION'
  | 'MALFORMED_OUTPUT';

/**
 * Base class for errors raised by the pipeline
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: PipelineErrorCode
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

export type FetchSource = 'NEWS' | 'PRICES';

/**
 * News or price retrieval failed (transport error, bad status, timeout)
 */
export class FetchError extends PipelineError {
  constructor(
    message: string,
    public readonly source: FetchSource,
    public readonly statusCode?: number,
    public readonly cause?: unknown
  ) {
    super(message, 'FETCH_FAILED');
    this.name = 'FetchError';
  }
}

export type ExtractionErrorKind =
  | 'EMPTY_TEXT'
  | 'MALFORMED_OUTPUT'
  | 'PROVIDER_ERROR'
  | 'ABORTED';

/**
 * Per-article extraction failure. Returned by the extraction adapter,
 * recorded by the orchestrator, never fatal to a run.
 */
export class ExtractionError extends PipelineError {
  constructor(
    message: string,
    public readonly articleId: string,
    public readonly kind: ExtractionErrorKind,
    public readonly attempts: number
  ) {
    super(message, 'EXTRACTION_FAILED');
    this.name = 'ExtractionError';
  }
}

/**
 * A stage produced no output that correlation depends on
 */
export class InsufficientDataError extends PipelineError {
  constructor(message: string) {
    super(message, 'INSUFFICIENT_DATA');
    this.name = 'InsufficientDataError';
  }
}

/**
 * Invalid window, threshold or request values. Raised before any stage runs.
 */
export class ConfigurationError extends PipelineError {
  constructor(
    message: string,
    public readonly details: ValidationError[] = []
  ) {
    super(message, 'INVALID_CONFIGURATION');
    this.name = 'ConfigurationError';
  }
}

export class InvalidTransitionError extends PipelineError {
  constructor(
    public readonly from: string,
    public readonly to: string
  ) {
    super(`Invalid run transition from ${from} to ${to}`, 'INVALID_TRANSITION');
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Model output could not be parsed into JSON
 */
export class MalformedOutputError extends PipelineError {
  constructor(
    message: string,
    public readonly rawOutput: string
  ) {
    super(message, 'MALFORMED_OUTPUT');
    this.name = 'MalformedOutputError';
  }
}

/**
 * Error taxonomy for the batch pipeline
 */

import type { BatchResult } from './types';

export type PipelineErrorCode =
  | 'unsupported_format'
  | 'extraction_failed'
  | 'model_load_error'
  | 'transcription_failed'
  | 'invariant_violation'
  | 'config_error'
  | 'batch_aborted';

/**
 * Base class for all pipeline errors
 */
export class PipelineError extends Error {
  code: PipelineErrorCode;
  /** Permanent errors are never retried for the same file */
  permanent: boolean;
  details?: Record<string, unknown>;

  constructor(
    message: string,
    code: PipelineErrorCode,
    permanent: boolean,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PipelineError';
    this.code = code;
    this.permanent = permanent;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    return `${this.message} (code: ${this.code})`;
  }
}

/**
 * Input is not a supported media container
 */
export class UnsupportedFormatError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'unsupported_format', true, details);
    this.name = 'UnsupportedFormatError';
  }
}

/**
 * Audio extraction failed; input treated as corrupt
 */
export class ExtractionFailedError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'extraction_failed', true, details, options);
    this.name = 'ExtractionFailedError';
  }
}

/**
 * The transcription model could not be loaded. Systemic: aborts the batch.
 */
export class ModelLoadError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'model_load_error', true, details, options);
    this.name = 'ModelLoadError';
  }
}

/**
 * A single transcription attempt failed
 */
export class TranscriptionFailedError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'transcription_failed', false, details, options);
    this.name = 'TranscriptionFailedError';
  }
}

/**
 * An internal invariant did not hold (chunk order, state machine, cache index)
 */
export class InvariantViolationError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'invariant_violation', true, details);
    this.name = 'InvariantViolationError';
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'config_error', true, details);
    this.name = 'ConfigError';
  }
}

/**
 * The batch stopped early because of a systemic failure
 */
export class BatchAbortedError extends PipelineError {
  result: BatchResult;

  constructor(message: string, result: BatchResult, options?: { cause?: unknown }) {
    super(message, 'batch_aborted', true, undefined, options);
    this.name = 'BatchAbortedError';
    this.result = result;
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

/**
 * Fields execa attaches to a failed subprocess error
 */
export interface ProcessFailure {
  message: string;
  exitCode?: number;
  stderr: string;
  stdout: string;
}

function stringField(e: object, key: string): string | undefined {
  const value: unknown = Reflect.get(e, key);
  return typeof value === 'string' ? value : undefined;
}

export function describeProcessFailure(e: unknown): ProcessFailure {
  if (typeof e !== 'object' || e === null) {
    return { message: String(e), stderr: '', stdout: '' };
  }
  const exitCode: unknown = Reflect.get(e, 'exitCode');
  return {
    message: stringField(e, 'shortMessage') ?? stringField(e, 'message') ?? String(e),
    exitCode: typeof exitCode === 'number' ? exitCode : undefined,
    stderr: stringField(e, 'stderr') ?? '',
    stdout: stringField(e, 'stdout') ?? '',
  };
}

/**
 * Application errors
 *
 * Every error raised on purpose extends AppError and carries its HTTP status,
 * a stable machine code and optional details that the error handler spreads
 * into the response body.
 */

export type ErrorDetails = Record<string, unknown>;

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details: ErrorDetails;

  constructor(message: string, statusCode = 500, code = 'INTERNAL_ERROR', details: ErrorDetails = {}) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

// ═══════════════════════════════════════════════════════════════
// REQUEST ERRORS (4xx)
// ═══════════════════════════════════════════════════════════════

export interface InvalidField {
  field: string;
  message: string;
}

export class ValidationError extends AppError {
  public readonly missing: string[];
  public readonly invalid: InvalidField[];

  constructor(message: string, missing: string[] = [], invalid: InvalidField[] = []) {
    super(message, 400, 'VALIDATION_ERROR', { missing, invalid });
    this.name = 'ValidationError';
    this.missing = missing;
    this.invalid = invalid;
  }
}

export class UnknownCategoryError extends AppError {
  public readonly field: string;
  public readonly value: string;

  constructor(field: string, value: string, allowed: readonly string[]) {
    super(`Unknown ${field} '${value}'`, 400, 'UNKNOWN_CATEGORY', {
      field,
      value,
      allowed: [...allowed],
    });
    this.name = 'UnknownCategoryError';
    this.field = field;
    this.value = value;
  }
}

// ═══════════════════════════════════════════════════════════════
// MODEL ERRORS (5xx)
// ═══════════════════════════════════════════════════════════════

export class ModelLoadError extends AppError {
  public readonly path: string;

  constructor(path: string, reason: string) {
    super(`Failed to load model from ${path}: ${reason}`, 500, 'MODEL_LOAD_ERROR', { path });
    this.name = 'ModelLoadError';
    this.path = path;
  }
}

export class ModelNotReadyError extends AppError {
  constructor(state: string) {
    super(`Models are not loaded (state: ${state})`, 503, 'MODEL_NOT_READY', { state });
    this.name = 'ModelNotReadyError';
  }
}

export class InferenceError extends AppError {
  constructor(model: string, reason: string) {
    super(`Prediction failed for model '${model}': ${reason}`, 500, 'INFERENCE_ERROR', { model });
    this.name = 'InferenceError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

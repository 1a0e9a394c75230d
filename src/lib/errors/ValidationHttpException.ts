import { HttpException, HttpStatus } from '@nestjs/common';
import type {
  SchemaErrorKind,
  SchemaValidationError,
} from './SchemaValidationError';

export interface ValidationIssueBody {
  error: 'SchemaValidationError';
  code: string;
  kind: SchemaErrorKind;
  message: string;
  suggestion?: string;
  path?: string;
}

/**
 * 422 wrapper for engine failures; the engine message is passed through verbatim
 * so the caller can surface it to its own caller.
 */
export class ValidationHttpException extends HttpException {
  constructor(err: SchemaValidationError) {
    const body: ValidationIssueBody = {
      error: 'SchemaValidationError',
      code: err.code,
      kind: err.kind,
      message: err.message,
      ...(err.suggestion !== undefined ? { suggestion: err.suggestion } : {}),
      ...(err.path !== undefined ? { path: err.path } : {}),
    };
    super(body, HttpStatus.UNPROCESSABLE_ENTITY, { cause: err });
    this.name = 'ValidationHttpException';
  }
}

/**
 * Migration-specific Error Types
 */

import { ConnectorError } from '@adshift/core';

export type MigrationErrorCode =
  | 'SCHEMA_NOT_FOUND'
  | 'SCHEMA_LOAD_ERROR'
  | 'MAPPING_CAST_ERROR'
  | 'ADAPTER_NOT_FOUND'
  | 'FETCH_FAILED'
  | 'VALIDATION_FAILED'
  | 'UPLOAD_REJECTED'
  | 'CONFIGURATION_ERROR'
  | 'UNEXPECTED_ERROR';

/** Name a failure is filed under in a migration report */
export type ErrorKind =
  | 'SchemaNotFound'
  | 'SchemaLoadError'
  | 'MappingCastError'
  | 'AdapterNotFound'
  | 'FetchFailed'
  | 'ValidationFailed'
  | 'UploadRejected'
  | 'ConfigurationError'
  | 'UnexpectedError';

const ERROR_KINDS: Record<MigrationErrorCode, ErrorKind> = {
  SCHEMA_NOT_FOUND: 'SchemaNotFound',
  SCHEMA_LOAD_ERROR: 'SchemaLoadError',
  MAPPING_CAST_ERROR: 'MappingCastError',
  ADAPTER_NOT_FOUND: 'AdapterNotFound',
  FETCH_FAILED: 'FetchFailed',
  VALIDATION_FAILED: 'ValidationFailed',
  UPLOAD_REJECTED: 'UploadRejected',
  CONFIGURATION_ERROR: 'ConfigurationError',
  UNEXPECTED_ERROR: 'UnexpectedError',
};

export function errorKindOf(code: MigrationErrorCode): ErrorKind {
  return ERROR_KINDS[code];
}

export interface MigrationErrorDetails {
  code: MigrationErrorCode;
  message: string;
  suggestion?: string;
  cause?: Error;
  context?: Record<string, unknown>;
}

export class MigrationError extends Error {
  readonly code: MigrationErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: MigrationErrorDetails) {
    super(details.message);
    this.name = 'MigrationError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }
  }

  get kind(): ErrorKind {
    return errorKindOf(this.code);
  }

  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];
    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }
    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      kind: this.kind,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * Wrap anything thrown as a MigrationError, keeping MigrationErrors as they are.
 * A connector's suggestion is carried over.
 */
export function toMigrationError(
  error: unknown,
  code: MigrationErrorCode = 'UNEXPECTED_ERROR',
  context?: Record<string, unknown>
): MigrationError {
  if (error instanceof MigrationError) {
    return error;
  }

  return new MigrationError({
    code,
    message: error instanceof Error ? error.message : String(error),
    suggestion: error instanceof ConnectorError ? error.suggestion : undefined,
    cause: error instanceof Error ? error : undefined,
    context,
  });
}

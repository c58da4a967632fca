/**
 * Errors raised by campaign sources, sinks and file readers
 */

export type ConnectorErrorCode =
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'PERMISSION_DENIED'
  | 'SCHEMA_MISMATCH'
  | 'READ_FAILED'
  | 'WRITE_FAILED'
  | 'UNSUPPORTED_OPERATION'
  | 'CONFIGURATION_ERROR';

export interface ConnectorErrorDetails {
  code: ConnectorErrorCode;
  /** Names the campaign, file or field involved */
  message: string;
  /** Connector that raised the error */
  connectorId?: string;
  /** What the user can do about it */
  suggestion?: string;
  cause?: Error;
  /** Extra data, e.g. `missingFields` from a rejected upload */
  context?: Record<string, unknown>;
}

export class ConnectorError extends Error {
  readonly code: ConnectorErrorCode;
  readonly connectorId?: string;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: ConnectorErrorDetails) {
    super(details.message);
    this.name = 'ConnectorError';
    this.code = details.code;
    this.connectorId = details.connectorId;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }
  }
}

/**
 * Turn anything a client threw into a ConnectorError with the given code.
 * ConnectorErrors pass through untouched.
 */
export function wrapError(
  error: unknown,
  connectorId: string | undefined,
  code: ConnectorErrorCode
): ConnectorError {
  if (error instanceof ConnectorError) {
    return error;
  }

  return new ConnectorError({
    code,
    message: error instanceof Error ? error.message : String(error),
    connectorId,
    cause: error instanceof Error ? error : undefined,
  });
}

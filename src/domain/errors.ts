/**
 * Typed error model for machine-actionable error handling.
 *
 * Every failure the service reports carries a TypedError: a namespaced code,
 * a message, a retryability flag and optional remediation hints. Thrown
 * errors extend AppError so callers can read the typed payload off any of them.
 */

/** Typed suggested fix that callers can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses and records. */
export interface TypedError {
  /** Namespaced error code (e.g., "DOCUMENT_API.POLL_TIMEOUT"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

// --- Common error factory functions ---

export function validationError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    details,
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
    retryable: false,
  });
}

export function internalError(message: string): TypedError {
  return createTypedError({
    code: 'SYSTEM.INTERNAL',
    message,
    retryable: false,
  });
}

/**
 * Mask a secret value, preserving only the last 4 characters for
 * identification. Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/**
 * Replace every occurrence of the given secrets in a message with their
 * masked form. Returns the message unchanged when no secret occurs.
 */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join avoids regex escaping of arbitrary key material
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}

// --- Thrown error classes ---

/** Base class for every error this service throws. */
export class AppError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'AppError';
  }

  get code(): string {
    return this.typedError.code;
  }
}

/** Non-2xx response or network failure talking to the document service. */
export class TransportError extends AppError {
  public readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    const retryable = statusCode === undefined || statusCode === 429 || statusCode >= 500;
    super(
      createTypedError({
        code: 'DOCUMENT_API.TRANSPORT',
        message,
        retryable,
        details: statusCode !== undefined ? { statusCode } : undefined,
        suggestedFixes:
          statusCode === 401 || statusCode === 403
            ? [{ type: 'CHECK_API_KEY', params: { statusCode }, description: 'Verify the document service API key.' }]
            : [],
      }),
    );
    this.name = 'TransportError';
    this.statusCode = statusCode;
  }
}

/** The document service does not know the requested resource. */
export class NotFoundError extends AppError {
  constructor(resourceType: string, resourceId: string) {
    super(
      createTypedError({
        code: 'DOCUMENT_API.NOT_FOUND',
        message: `${resourceType} not found: ${resourceId}`,
        retryable: false,
        details: { resourceType, resourceId },
      }),
    );
    this.name = 'NotFoundError';
  }
}

/** File ingestion reached a terminal error status. */
export class ProcessingError extends AppError {
  constructor(fileId: string, status: string) {
    super(
      createTypedError({
        code: 'DOCUMENT_API.PROCESSING_FAILED',
        message: `File ${fileId} processing failed with status "${status}"`,
        retryable: false,
        details: { fileId, status },
        suggestedFixes: [{ type: 'REUPLOAD_FILE', params: { fileId } }],
      }),
    );
    this.name = 'ProcessingError';
  }
}

/** A document analysis job failed or could not be started. */
export class AnalysisError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(
      createTypedError({
        code: 'DOCUMENT_API.ANALYSIS_FAILED',
        message,
        retryable: false,
        details,
      }),
    );
    this.name = 'AnalysisError';
  }
}

/** A polling loop (ingestion or analysis) exceeded its own deadline. */
export class PollingTimeoutError extends AppError {
  constructor(operation: string, maxWaitMs: number, polls: number) {
    super(
      createTypedError({
        code: 'DOCUMENT_API.POLL_TIMEOUT',
        message: `Timed out waiting for ${operation} after ${maxWaitMs}ms (${polls} status checks)`,
        retryable: true,
        details: { operation, maxWaitMs, polls },
        suggestedFixes: [{ type: 'INCREASE_TIMEOUT', params: { maxWaitMs: maxWaitMs * 2 } }],
      }),
    );
    this.name = 'PollingTimeoutError';
  }
}

/** Outbound work abandoned because its execution was cancelled. */
export class CancelledError extends AppError {
  constructor(reason = 'Execution was cancelled') {
    super(
      createTypedError({
        code: 'EXECUTION.CANCELLED',
        message: reason,
        retryable: false,
      }),
    );
    this.name = 'CancelledError';
  }
}

/** The whole execution exceeded its wall-clock budget. */
export class ExecutionTimeoutError extends AppError {
  constructor(timeoutMs: number) {
    super(
      createTypedError({
        code: 'EXECUTION.TIMEOUT',
        message: `Execution exceeded the ${timeoutMs / 1000}s time limit`,
        retryable: true,
        details: { timeoutMs },
        suggestedFixes: [{ type: 'INCREASE_TIMEOUT', params: { timeoutMs: timeoutMs * 2 } }],
      }),
    );
    this.name = 'ExecutionTimeoutError';
  }
}

/** Generated code does not parse, or does not define the entry function. */
export class CompileError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(
      createTypedError({
        code: 'SANDBOX.COMPILE',
        message,
        retryable: false,
        details,
        suggestedFixes: [{ type: 'REGENERATE_WORKFLOW', params: {}, description: 'Regenerate the workflow code.' }],
      }),
    );
    this.name = 'CompileError';
  }
}

/** The workflow is not in the ready state. */
export class NotReadyError extends AppError {
  constructor(workflowId: string, status: string) {
    super(
      createTypedError({
        code: 'WORKFLOW.NOT_READY',
        message: `Workflow ${workflowId} is not ready for execution (status: ${status})`,
        retryable: false,
        details: { workflowId, status },
      }),
    );
    this.name = 'NotReadyError';
  }
}

/** No workflow is stored under the given id. */
export class WorkflowNotFoundError extends AppError {
  constructor(workflowId: string) {
    super(notFoundError('Workflow', workflowId));
    this.name = 'WorkflowNotFoundError';
  }
}

/** Invalid or missing startup configuration. */
export class ConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(
      createTypedError({
        code: 'CONFIG.INVALID',
        message,
        retryable: false,
        details,
      }),
    );
    this.name = 'ConfigError';
  }
}

/** Describe any thrown value as a TypedError. */
export function toTypedError(err: unknown, fallbackCode = 'SYSTEM.INTERNAL'): TypedError {
  if (err instanceof AppError) return err.typedError;
  return createTypedError({
    code: fallbackCode,
    message: err instanceof Error ? err.message : String(err),
    retryable: false,
  });
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}

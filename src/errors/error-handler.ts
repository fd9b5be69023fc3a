/**
 * Centralized Error Handling Module
 *
 * This module provides the archiver's error classes and helpers that map
 * errors to HTTP statuses, failure descriptions and sanitized log lines.
 *
 * Two families of errors exist:
 * - Per-identifier errors (ChatNotFoundError, StorageError) are downgraded to
 *   a failed outcome by the batch orchestrator and never abort a run.
 * - Run-level errors (SessionFatalError, ConfigurationError) reject the whole
 *   run and surface to the entry point.
 *
 * @module errors/error-handler
 */

// ============================================================================
// Error Response Interface
// ============================================================================

/**
 * Standardized error response format
 *
 * Contains both the caller-facing message and internal details for logging.
 */
export interface ErrorResponse {
  /** Indicates this is an error response */
  success: false;
  /** Message safe to return to the caller */
  userMessage: string;
  /** Internal error code for logging and debugging */
  errorCode: ErrorCode;
  /** Original error for internal logging (not returned to callers) */
  originalError?: Error;
}

// ============================================================================
// Error Codes
// ============================================================================

/**
 * Error codes for categorizing errors internally
 */
export enum ErrorCode {
  CHAT_NOT_FOUND = 'CHAT_NOT_FOUND',
  STORAGE_ERROR = 'STORAGE_ERROR',
  SESSION_FATAL = 'SESSION_FATAL',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  INVALID_DATE_WINDOW = 'INVALID_DATE_WINDOW',
  INVALID_REQUEST = 'INVALID_REQUEST',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

// ============================================================================
// Custom Error Classes
// ============================================================================

/**
 * Base class for all archiver-specific errors
 *
 * Uses Object.setPrototypeOf so that instanceof keeps working once compiled
 * down to ES5-style classes.
 */
export abstract class ArchiverError extends Error {
  /** Error code for categorization */
  public readonly errorCode: ErrorCode;
  /** Original error that caused this error, if any */
  public readonly cause?: Error;

  constructor(message: string, errorCode: ErrorCode, cause?: Error) {
    super(message);
    // Restore prototype chain - required for proper instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error thrown when an identifier does not resolve to a readable chat
 */
export class ChatNotFoundError extends ArchiverError {
  /** The identifier that failed to resolve */
  public readonly identifier: string;

  constructor(identifier: string, cause?: Error) {
    super(`Chat '${identifier}' not found or inaccessible.`, ErrorCode.CHAT_NOT_FOUND, cause);
    this.name = 'ChatNotFoundError';
    this.identifier = identifier;
  }
}

/**
 * Error thrown when an archive cannot be persisted
 */
export class StorageError extends ArchiverError {
  /** Object key that was being written */
  public readonly key?: string;

  constructor(message: string, key?: string, cause?: Error) {
    super(message, ErrorCode.STORAGE_ERROR, cause);
    this.name = 'StorageError';
    this.key = key;
  }
}

/**
 * Error thrown when the Telegram session is lost or was never authorized
 *
 * Not recoverable per identifier: aborts the remainder of the run.
 */
export class SessionFatalError extends ArchiverError {
  constructor(message: string, cause?: Error) {
    super(message, ErrorCode.SESSION_FATAL, cause);
    this.name = 'SessionFatalError';
  }
}

/**
 * Error thrown when configuration is invalid or missing
 */
export class ConfigurationError extends ArchiverError {
  /** The configuration key that is invalid or missing */
  public readonly configKey?: string;

  constructor(message: string, configKey?: string, errorCode: ErrorCode = ErrorCode.CONFIGURATION_ERROR) {
    super(message, errorCode);
    this.name = 'ConfigurationError';
    this.configKey = configKey;
  }
}

/**
 * Error thrown when a date window is malformed or inverted
 */
export class InvalidDateWindowError extends ConfigurationError {
  constructor(message: string = 'Invalid date format. Use YYYY-MM-DD.', configKey?: string) {
    super(message, configKey, ErrorCode.INVALID_DATE_WINDOW);
    this.name = 'InvalidDateWindowError';
  }
}

/**
 * Error thrown when an HTTP request cannot be turned into a run
 */
export class InvalidRequestError extends ArchiverError {
  constructor(message: string) {
    super(message, ErrorCode.INVALID_REQUEST);
    this.name = 'InvalidRequestError';
  }
}

// ============================================================================
// Caller-Facing Messages
// ============================================================================

/**
 * Messages returned for run-level errors whose own message may carry
 * internal details
 */
const USER_FRIENDLY_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.CHAT_NOT_FOUND]: 'Chat not found or inaccessible.',
  [ErrorCode.STORAGE_ERROR]: 'Failed to store the archive. Please try again.',
  [ErrorCode.SESSION_FATAL]: 'The Telegram session is not available. Please re-authenticate the service.',
  [ErrorCode.CONFIGURATION_ERROR]: 'The service is not properly configured. Please contact the administrator.',
  [ErrorCode.INVALID_DATE_WINDOW]: 'Invalid date format. Use YYYY-MM-DD.',
  [ErrorCode.INVALID_REQUEST]: 'Invalid request.',
  [ErrorCode.UNKNOWN_ERROR]: 'Something went wrong. Please try again.',
};

/**
 * HTTP status for each error code when it escapes a run
 */
const HTTP_STATUS_BY_CODE: Record<ErrorCode, number> = {
  [ErrorCode.CHAT_NOT_FOUND]: 404,
  [ErrorCode.STORAGE_ERROR]: 500,
  [ErrorCode.SESSION_FATAL]: 503,
  [ErrorCode.CONFIGURATION_ERROR]: 500,
  [ErrorCode.INVALID_DATE_WINDOW]: 400,
  [ErrorCode.INVALID_REQUEST]: 400,
  [ErrorCode.UNKNOWN_ERROR]: 500,
};

// ============================================================================
// Sensitive Data Patterns
// ============================================================================

/**
 * Patterns that must never reach a log line
 */
const SENSITIVE_PATTERNS = [
  /1[A-Za-z0-9+\/_-]{200,}={0,2}/g,   // GramJS StringSession payloads (base64)
  /AKIA[0-9A-Z]{16}/g,               // AWS access keys
  /[a-f0-9]{32}/gi,                  // Telegram API hashes
  /\+\d{10,15}/g,                    // Phone numbers
  /\/[\w/.-]+\.(?:ts|js):\d+:\d+/g,  // File paths with line numbers
];

// ============================================================================
// Error Handling Functions
// ============================================================================

/**
 * Sanitize a string by removing sensitive data
 *
 * @param text - The text to sanitize
 * @returns Sanitized text with sensitive data replaced
 */
export function sanitizeMessage(text: string): string {
  let sanitized = text;

  for (const pattern of SENSITIVE_PATTERNS) {
    pattern.lastIndex = 0;
    sanitized = sanitized.replace(pattern, '[REDACTED]');
  }

  return sanitized;
}

/**
 * Check if an error is a known archiver error type
 */
export function isArchiverError(error: unknown): error is ArchiverError {
  return error instanceof ArchiverError;
}

/**
 * Determine the error code for an error
 *
 * @param error - The error to categorize
 * @returns The error's own code for archiver errors, UNKNOWN_ERROR otherwise
 */
export function getErrorCode(error: unknown): ErrorCode {
  if (isArchiverError(error)) {
    return error.errorCode;
  }
  return ErrorCode.UNKNOWN_ERROR;
}

/**
 * Get the HTTP status code an entry point should answer with for an error
 */
export function getHttpStatusForError(error: unknown): number {
  return HTTP_STATUS_BY_CODE[getErrorCode(error)];
}

/**
 * Error-shaped value, such as an Error created in another realm
 */
function hasMessage(error: unknown): error is { message: string } {
  return typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string';
}

/**
 * Normalize a thrown value into an Error instance
 *
 * Errors from another realm (Node's fs errors under Jest's VM sandbox) fail
 * `instanceof Error`; their message is kept rather than their String() form.
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  if (hasMessage(error)) {
    return new Error(error.message, { cause: error });
  }
  return new Error(String(error));
}

/**
 * Describe a per-identifier failure for the summary
 *
 * Archiver errors already carry a caller-ready message. Anything else is
 * an unexpected retrieval problem and is prefixed accordingly.
 *
 * @example
 * describeFailure(new ChatNotFoundError('ghost_user'))
 * // "Chat 'ghost_user' not found or inaccessible."
 *
 * describeFailure(new Error('socket hang up'))
 * // "Error downloading messages: socket hang up"
 */
export function describeFailure(error: unknown): string {
  if (isArchiverError(error)) {
    return error.message;
  }
  return `Error downloading messages: ${toError(error).message}`;
}

/**
 * Handle a run-level error and return a standardized error response
 *
 * This function:
 * 1. Categorizes the error by type
 * 2. Logs a sanitized line internally
 * 3. Returns the message to show the caller
 *
 * Configuration and request errors describe a caller mistake, so their own
 * message is returned. Other errors get the generic text for their code.
 *
 * @param error - The error to handle
 */
export function handleError(error: Error): ErrorResponse {
  const errorCode = getErrorCode(error);
  const exposeMessage =
    errorCode === ErrorCode.INVALID_DATE_WINDOW || errorCode === ErrorCode.INVALID_REQUEST;
  const userMessage = exposeMessage ? error.message : USER_FRIENDLY_MESSAGES[errorCode];

  const sanitizedMessage = sanitizeMessage(error.message || 'Unknown error');
  console.error(`[${errorCode}] ${error.name}: ${sanitizedMessage}`, {
    errorCode,
    errorName: error.name,
    hasStack: !!error.stack,
  });

  return {
    success: false,
    userMessage,
    errorCode,
    originalError: error,
  };
}

/**
 * Centralized error type definitions for fattura-allegati
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  // Fatal
  INPUT_NOT_FOUND = 'INPUT_NOT_FOUND',
  INVALID_ARGUMENTS = 'INVALID_ARGUMENTS',

  // Per-attachment
  PAYLOAD_MISSING = 'PAYLOAD_MISSING',
  PAYLOAD_DECODE_FAILED = 'PAYLOAD_DECODE_FAILED',

  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The path given on the command line does not exist. The only fatal error.
 */
export class InputNotFoundError extends AppError {
  constructor(inputPath: string) {
    super(`No such file or directory: '${inputPath}'`, ErrorCode.INPUT_NOT_FOUND, true, { inputPath });
  }
}

export class InvalidArgumentsError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.INVALID_ARGUMENTS, true, context);
  }
}

export class AttachmentPayloadMissingError extends AppError {
  constructor(context?: Record<string, unknown>) {
    super('no <Attachment> element with base64 content', ErrorCode.PAYLOAD_MISSING, true, context);
  }
}

export class Base64DecodeError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.PAYLOAD_DECODE_FAILED, true, context);
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown, defaultMessage: string = 'An unexpected error occurred'): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.INTERNAL_ERROR, false);
  }

  return new AppError(defaultMessage, ErrorCode.INTERNAL_ERROR, false);
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

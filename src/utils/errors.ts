// Standardized error handling utilities
// Shared by the reasoning provider, the dispatcher and the HTTP routes

export enum ErrorCode {
  INTERNAL_ERROR = 'internal_error',
  VALIDATION_ERROR = 'validation_error',
  REASONING_UNAVAILABLE = 'reasoning_unavailable',
  MALFORMED_RESPONSE = 'malformed_response',
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }

  static reasoningUnavailable(message: string = 'Reasoning service unavailable', details?: unknown): AppError {
    return new AppError(ErrorCode.REASONING_UNAVAILABLE, message, 502, details);
  }

  static malformedResponse(message: string = 'Malformed reasoning service response', details?: unknown): AppError {
    return new AppError(ErrorCode.MALFORMED_RESPONSE, message, 502, details);
  }
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  statusCode: number;
}

export function formatErrorResponse(error: AppError): ErrorResponse {
  return {
    error: error.code,
    message: error.message,
    statusCode: error.statusCode,
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

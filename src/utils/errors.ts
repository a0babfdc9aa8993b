// Standardized error handling utilities
// One error type for the whole turn; the code says which layer failed

export enum ErrorCode {
  BAD_REQUEST = 'bad_request',
  UNAUTHORIZED = 'unauthorized',
  INTERNAL_ERROR = 'internal_error',
  TRANSPORT_ERROR = 'transport_error',
  PROTOCOL_ERROR = 'protocol_error',
  TOOL_ERROR = 'tool_error',
  TOOL_TIMEOUT = 'tool_timeout',
  CONFIGURATION_ERROR = 'configuration_error',
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: unknown,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AppError';
  }

  static badRequest(message: string = 'Bad request', details?: unknown): AppError {
    return new AppError(ErrorCode.BAD_REQUEST, message, 400, details);
  }

  static unauthorized(message: string = 'Unauthorized', details?: unknown): AppError {
    return new AppError(ErrorCode.UNAUTHORIZED, message, 401, details);
  }

  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }

  /** Connection failure or non-2xx answer from the backend. */
  static transport(message: string, details?: unknown, cause?: unknown): AppError {
    return new AppError(ErrorCode.TRANSPORT_ERROR, message, 502, details, { cause });
  }

  /** Backend payload that cannot be understood; `payload` is kept for diagnosis. */
  static protocol(message: string, payload: string, cause?: unknown): AppError {
    return new AppError(ErrorCode.PROTOCOL_ERROR, message, 502, { payload }, { cause });
  }

  static tool(message: string, details?: unknown, cause?: unknown): AppError {
    return new AppError(ErrorCode.TOOL_ERROR, message, 500, details, { cause });
  }

  static toolTimeout(toolName: string, timeoutMs: number): AppError {
    const seconds = Math.round(timeoutMs / 1000);
    const label = timeoutMs % 1000 === 0 ? `${seconds} seconds` : `${timeoutMs} ms`;
    return new AppError(
      ErrorCode.TOOL_TIMEOUT,
      `Tool '${toolName}' timed out after ${label}`,
      504,
      { tool: toolName, timeoutMs },
    );
  }

  static configuration(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.CONFIGURATION_ERROR, message, 500, details);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface ErrorResponse {
  error: {
    message: string;
    type: ErrorCode;
    details?: unknown;
  };
}

// OpenAI-style error envelope so chat clients can display the message
export function formatErrorResponse(error: AppError, includeDetails: boolean = false): ErrorResponse {
  const response: ErrorResponse = {
    error: {
      message: error.message,
      type: error.code,
    },
  };

  if (includeDetails && error.details) {
    response.error.details = error.details;
  }

  return response;
}

// src/common/dto/standard-response.dto.ts

/**
 * Response envelope
 *
 * Every endpoint answers with this shape so clients handle results and
 * failures the same way.
 */
export interface StandardResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ErrorResponse;
}

export interface ErrorResponse {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export function successResponse<T>(data: T): StandardResponse<T> {
  return {
    success: true,
    data,
  };
}

export function errorResponse(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): StandardResponse<never> {
  return {
    success: false,
    error: {
      code,
      message,
      ...(details && { details }),
    },
  };
}

export enum ErrorCode {
  // rejected input
  VALIDATION_ERROR = 'VALIDATION_ERROR',

  // e.g. a destination that cannot be geocoded
  NOT_FOUND = 'NOT_FOUND',

  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

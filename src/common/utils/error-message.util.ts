// src/common/utils/error-message.util.ts

/**
 * Pull a readable message out of anything that was thrown
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

/**
 * Pull a Node/axios style error code (ECONNRESET, ETIMEDOUT, ...) if there is one
 */
export function extractErrorCode(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : '';
  }
  return '';
}

/**
 * Stack trace for logging, when the thrown value carries one
 */
export function extractErrorStack(error: unknown): string | undefined {
  return error instanceof Error ? error.stack : undefined;
}

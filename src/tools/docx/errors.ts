/**
 * DOCX Error Handling
 *
 * Centralised error class and async error-wrapping utility.
 *
 * @module docx/errors
 */

export class DocxError extends Error {
  constructor(
    message: string,
    public readonly code: DocxErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DocxError';
    Error.captureStackTrace?.(this, DocxError);
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, message: this.message, code: this.code, context: this.context };
  }
}

export enum DocxErrorCode {
  NOT_FOUND = 'NOT_FOUND',
  STALE_OCCURRENCE = 'STALE_OCCURRENCE',
  OUT_OF_RANGE = 'OUT_OF_RANGE',
  IO_ERROR = 'IO_ERROR',
  FORMAT_ERROR = 'FORMAT_ERROR',
  INVALID_REQUEST = 'INVALID_REQUEST',
  CANCELLED = 'CANCELLED',
}

export function isDocxError(error: unknown, code?: DocxErrorCode): error is DocxError {
  return error instanceof DocxError && (code === undefined || error.code === code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Run an async operation; DocxErrors pass through, anything else is wrapped with `errorCode`. */
export async function withErrorContext<T>(
  operation: () => Promise<T>,
  errorCode: DocxErrorCode,
  context?: Record<string, unknown>
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof DocxError) throw error;
    throw new DocxError(errorMessage(error), errorCode, {
      ...context,
      originalError: error instanceof Error ? error.stack : String(error),
    });
  }
}

// This module provides a typed application error shared by the bot core, the HTTP surface, and the Telegram client.

export type AppErrorCode =
  | 'build_error'
  | 'invalid_token'
  | 'token_too_long'
  | 'transport_error'
  | 'telegram_api_error'
  | 'invalid_config'
  | 'unauthorized'
  | 'not_found'
  | 'internal_error';

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: AppErrorCode;
  public readonly details?: unknown;

  public constructor(statusCode: number, code: AppErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

// This helper normalizes unknown failures into an AppError without leaking internals.
export function normalizeError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(500, 'internal_error', error.message);
  }

  return new AppError(500, 'internal_error', 'An unexpected error occurred.');
}

// This helper reports whether one failure came from the chat transport rather than the core.
export function isTransportError(error: unknown): boolean {
  return error instanceof AppError && (error.code === 'transport_error' || error.code === 'telegram_api_error');
}

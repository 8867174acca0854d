/**
 * Failure kinds the bot distinguishes. Completion failures (`EXTERNAL_CALL_FAILED`,
 * `TIMEOUT`) are recovered with the apology; the rest abort startup.
 */
export type ErrorCode =
  | 'BOOTSTRAP_FAILED'
  | 'DISCORD_LOGIN_FAILED'
  | 'STORAGE_FAILED'
  | 'EXTERNAL_CALL_FAILED'
  | 'TIMEOUT';

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly cause?: unknown,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** Keep an `AppError` as is; wrap anything else under `fallbackCode`. */
export function toErrorWithCode(error: unknown, fallbackCode: ErrorCode): AppError {
  if (error instanceof AppError) return error;
  if (error instanceof Error) return new AppError(fallbackCode, error.message, error);
  return new AppError(fallbackCode, String(error));
}

export type SheetErrorCode = 'E_MISSING_CONTENT' | 'E_INVALID_TUNING';

/** Thrown only for problems a sheet cannot start without. */
export class SheetConfigurationError extends Error {
  readonly code: SheetErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: SheetErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'SheetConfigurationError';
    this.code = code;
    this.details = details;
  }
}

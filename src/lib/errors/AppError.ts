export class AppError extends Error {
  public readonly code: string;

  constructor(message: string, code = 'APP_ERROR', cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'AppError';
    this.code = code;
  }

  /** JSON-safe representation (e.g., for structured logs). */
  public toJSON(): { name: string; code: string; message: string } {
    return { name: this.name, code: this.code, message: this.message };
  }
}

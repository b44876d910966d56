export enum ErrorCode {
  CONFIG_INVALID = 'CONFIG_INVALID',
  INPUT_INVALID = 'INPUT_INVALID',
  INPUT_TOO_LARGE = 'INPUT_TOO_LARGE',
  PROVIDER_ERROR = 'PROVIDER_ERROR',
  INTERNAL_UNKNOWN = 'INTERNAL_UNKNOWN',
}

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly status: number;

  constructor(message: string, code: ErrorCode, status: number) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.status = status;
  }

  static fromError(error: unknown, prefix: string): AppError {
    if (error instanceof AppError) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new AppError(`${prefix}: ${message}`, ErrorCode.INTERNAL_UNKNOWN, 500);
  }
}

export class ConfigurationError extends AppError {
  public readonly configKey: string | undefined;

  constructor(message: string, configKey?: string) {
    super(message, ErrorCode.CONFIG_INVALID, 500);
    this.name = 'ConfigurationError';
    this.configKey = configKey;
  }
}

export class InputError extends AppError {
  constructor(message: string) {
    super(message, ErrorCode.INPUT_INVALID, 400);
    this.name = 'InputError';
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(message: string) {
    super(message, ErrorCode.INPUT_TOO_LARGE, 413);
    this.name = 'PayloadTooLargeError';
  }
}

/** Raised when the model provider cannot produce a usable answer. */
export class ProviderError extends AppError {
  public readonly upstreamStatus: number | undefined;

  constructor(message: string, upstreamStatus?: number) {
    super(message, ErrorCode.PROVIDER_ERROR, 502);
    this.name = 'ProviderError';
    this.upstreamStatus = upstreamStatus;
  }
}

export function asErrorText(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

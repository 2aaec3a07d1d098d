export const ErrorCode = {
  FetchFailed: 'FETCH_FAILED',
  Timeout: 'TIMEOUT',
  ModelService: 'MODEL_SERVICE',
  Validation: 'VALIDATION',
  Configuration: 'CONFIGURATION',
  Internal: 'INTERNAL',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export class PageDistillError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class FetchError extends PageDistillError {
  readonly url?: string;
  readonly statusCode?: number;

  constructor(
    message: string,
    details: { url?: string; statusCode?: number; cause?: unknown } = {},
    code: ErrorCode = ErrorCode.FetchFailed
  ) {
    const statusInfo = details.statusCode ? ` (status: ${details.statusCode})` : '';
    const urlInfo = details.url ? ` for URL: ${details.url}` : '';
    super(code, `Fetch failed: ${message}${statusInfo}${urlInfo}`, { cause: details.cause });
    this.url = details.url;
    this.statusCode = details.statusCode;
  }
}

export class TimeoutError extends FetchError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, url?: string) {
    super(`${message} (timeout: ${timeoutMs}ms)`, { url }, ErrorCode.Timeout);
    this.timeoutMs = timeoutMs;
  }
}

export class ModelServiceError extends PageDistillError {
  readonly provider?: string;
  /** Zero-based index of the chunk whose request failed, when known. */
  readonly chunkIndex?: number;
  /** Message without the error-kind prefix. */
  readonly detail: string;

  constructor(
    message: string,
    details: { provider?: string; chunkIndex?: number; cause?: unknown } = {}
  ) {
    const providerInfo = details.provider ? ` (provider: ${details.provider})` : '';
    super(ErrorCode.ModelService, `Model service error: ${message}${providerInfo}`, {
      cause: details.cause,
    });
    this.provider = details.provider;
    this.chunkIndex = details.chunkIndex;
    this.detail = message;
  }
}

export class ValidationError extends PageDistillError {
  constructor(message: string) {
    super(ErrorCode.Validation, `Validation error: ${message}`);
  }
}

export class ConfigurationError extends PageDistillError {
  constructor(message: string) {
    super(ErrorCode.Configuration, `Configuration error: ${message}`);
  }
}

export function toPageDistillError(error: unknown, context?: string): PageDistillError {
  if (error instanceof PageDistillError) {
    return error;
  }

  const prefix = context ? `${context}: ` : '';

  if (error instanceof Error) {
    return new PageDistillError(ErrorCode.Internal, `${prefix}${error.message}`, { cause: error });
  }

  return new PageDistillError(ErrorCode.Internal, `${prefix}Unknown error occurred`, {
    cause: error,
  });
}

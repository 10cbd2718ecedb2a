import { OpenRouterError } from './error.js';

export class CredentialNotFoundError extends OpenRouterError {
  constructor(message: string = 'No API key found in any credential store') {
    super({ message, code: 'credential_not_found' });
  }
}

export class CredentialStoreError extends OpenRouterError {
  constructor(message: string, options?: { cause?: Error }) {
    super({ message, code: 'credential_store_failed', cause: options?.cause });
  }
}

export class CallerError extends OpenRouterError {
  public readonly param?: string;

  constructor(message: string, options?: { param?: string; cause?: Error }) {
    super({ message, code: 'invalid_input', cause: options?.cause });
    this.param = options?.param;
  }
}

export class RequestFailedError extends OpenRouterError {
  constructor(
    message: string,
    options?: { statusCode?: number; code?: string; requestId?: string; cause?: Error }
  ) {
    super({ message, ...options });
  }
}

export class AuthenticationError extends RequestFailedError {
  constructor(message: string, options?: { code?: string; requestId?: string }) {
    super(message, { statusCode: 401, ...options });
  }
}

export class PermissionDeniedError extends RequestFailedError {
  constructor(message: string, options?: { code?: string; requestId?: string }) {
    super(message, { statusCode: 403, ...options });
  }
}

export class NotFoundError extends RequestFailedError {
  constructor(message: string, options?: { code?: string; requestId?: string }) {
    super(message, { statusCode: 404, ...options });
  }
}

export class RateLimitError extends RequestFailedError {
  public readonly retryAfter?: number;

  constructor(message: string, options?: { retryAfter?: number; code?: string; requestId?: string }) {
    super(message, { statusCode: 429, code: options?.code, requestId: options?.requestId });
    this.retryAfter = options?.retryAfter;
  }
}

export class APIError extends RequestFailedError {
  constructor(message: string, statusCode: number, options?: { code?: string; requestId?: string }) {
    super(message, { statusCode, ...options });
  }
}

export class APIConnectionError extends RequestFailedError {
  constructor(message: string, options?: { cause?: Error }) {
    super(message, { cause: options?.cause });
  }
}

export class TimeoutError extends RequestFailedError {
  constructor(message: string = 'Request timed out') {
    super(message, { code: 'timeout' });
  }
}

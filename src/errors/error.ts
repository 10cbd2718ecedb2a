export interface OpenRouterErrorOptions {
  message: string;
  statusCode?: number;
  code?: string;
  requestId?: string;
  cause?: Error;
}

/**
 * Root of every error this package throws. Absorbed conditions (empty results,
 * malformed stream frames) are modelled as values, never as subclasses of this.
 */
export abstract class OpenRouterError extends Error {
  public readonly statusCode?: number;
  public readonly code?: string;
  public readonly requestId?: string;
  public override readonly cause?: Error;

  constructor(options: OpenRouterErrorOptions) {
    super(options.message);
    this.name = this.constructor.name;
    this.statusCode = options.statusCode;
    this.code = options.code;
    this.requestId = options.requestId;
    this.cause = options.cause;

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      statusCode: this.statusCode,
      code: this.code,
      requestId: this.requestId,
    };
  }
}

export interface ApiErrorBody {
  error?: {
    message?: string;
    code?: string | number;
    metadata?: Record<string, unknown>;
  };
}

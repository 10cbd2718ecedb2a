import type { ApiErrorBody } from './error.js';
import {
  AuthenticationError,
  PermissionDeniedError,
  NotFoundError,
  RateLimitError,
  APIError,
  type RequestFailedError,
} from './categories.js';

export function mapHttpError(status: number, body: string, headers: Headers): RequestFailedError {
  const requestId = headers.get('x-request-id') ?? undefined;
  const retryAfter = parseRetryAfter(headers.get('retry-after'));

  let errorData: ApiErrorBody | undefined;
  try {
    errorData = parseErrorBody(body);
  } catch {
    errorData = undefined;
  }

  const detail = errorData?.error?.message ?? (body.trim() || undefined);
  const message = detail ? `HTTP ${status}: ${detail}` : `HTTP ${status} error`;
  const rawCode = errorData?.error?.code;
  const code = rawCode === undefined ? undefined : String(rawCode);

  switch (status) {
    case 401: return new AuthenticationError(message, { code, requestId });
    case 403: return new PermissionDeniedError(message, { code, requestId });
    case 404: return new NotFoundError(message, { code, requestId });
    case 429: return new RateLimitError(message, { retryAfter, code, requestId });
    default: return new APIError(message, status, { code, requestId });
  }
}

function parseErrorBody(body: string): ApiErrorBody | undefined {
  const parsed: unknown = JSON.parse(body);
  if (typeof parsed !== 'object' || parsed === null || !('error' in parsed)) {
    return undefined;
  }
  const error: unknown = parsed.error;
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  const message = 'message' in error && typeof error.message === 'string' ? error.message : undefined;
  const code = 'code' in error && (typeof error.code === 'string' || typeof error.code === 'number')
    ? error.code
    : undefined;
  return { error: { message, code } };
}

function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;
  const seconds = parseInt(value, 10);
  return isNaN(seconds) ? undefined : seconds;
}

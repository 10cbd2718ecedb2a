export { OpenRouterError, type OpenRouterErrorOptions, type ApiErrorBody } from './error.js';
export {
  CredentialNotFoundError,
  CredentialStoreError,
  CallerError,
  RequestFailedError,
  AuthenticationError,
  PermissionDeniedError,
  NotFoundError,
  RateLimitError,
  APIError,
  APIConnectionError,
  TimeoutError,
} from './categories.js';
export { mapHttpError } from './mapping.js';

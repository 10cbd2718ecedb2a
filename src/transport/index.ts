export type { HttpTransport, HttpRequest, TransportTimeouts } from './http-transport.js';
export { FetchHttpTransport } from './http-transport.js';
export type { ClientIdentity, BuiltRequest } from './request-builder.js';
export {
  RequestBuilder,
  toWireContent,
  visionPrompt,
  DEFAULT_TEMPERATURE,
  DEFAULT_MAX_TOKENS,
  CHAT_COMPLETIONS_PATH,
} from './request-builder.js';
export type { StreamEvent, MalformedReason } from './stream-decoder.js';
export { decodeStream, decodeLine, SseLineDecoder } from './stream-decoder.js';

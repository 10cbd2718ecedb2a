export type {
  ChatRole,
  ContentPart,
  ImagePart,
  StructuredContent,
  Prompt,
  CompletionRequest,
  WireContentPart,
  ChatMessage,
  ChatCompletionRequestBody,
  ChatCompletionResponse,
  ChatCompletionChunk,
  ProviderRecord,
} from './types.js';
export type { ExtractedContent } from './content.js';
export { extractContent, isProviderRecord } from './content.js';

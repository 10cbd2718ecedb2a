export {
  TEST_MODEL,
  createChatCompletionResponse,
  createDeltaChunk,
  createMessageChunk,
  createFinishChunk,
} from './chat.fixtures.js';
export {
  sseFrame,
  createSSEStream,
  createDeltaStream,
  createByteStream,
  collect,
} from './streams.fixtures.js';

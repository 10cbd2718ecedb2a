import type { ChatCompletionChunk, ChatCompletionResponse } from '../services/chat/types.js';

export const TEST_MODEL = 'openai/gpt-4o-mini';

export function createChatCompletionResponse(
  content: string | null = 'Hello! How can I help you today?',
  overrides?: Partial<ChatCompletionResponse>
): ChatCompletionResponse {
  return {
    id: 'gen-test-123',
    model: TEST_MODEL,
    choices: [
      {
        index: 0,
        message: { role: 'assistant', content },
        finish_reason: 'stop',
      },
    ],
    usage: {
      prompt_tokens: 9,
      completion_tokens: 12,
      total_tokens: 21,
    },
    ...overrides,
  };
}

export function createDeltaChunk(content: string, overrides?: Partial<ChatCompletionChunk>): ChatCompletionChunk {
  return {
    id: 'gen-test-123',
    model: TEST_MODEL,
    choices: [{ index: 0, delta: { content }, finish_reason: null }],
    ...overrides,
  };
}

export function createMessageChunk(content: string): ChatCompletionChunk {
  return {
    id: 'gen-test-123',
    model: TEST_MODEL,
    choices: [{ index: 0, message: { role: 'assistant', content }, finish_reason: 'stop' }],
  };
}

export function createFinishChunk(): ChatCompletionChunk {
  return {
    id: 'gen-test-123',
    model: TEST_MODEL,
    choices: [{ index: 0, delta: {}, finish_reason: 'stop' }],
  };
}

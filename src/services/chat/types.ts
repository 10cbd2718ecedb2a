export type ChatRole = 'system' | 'user' | 'assistant';

/** One part of a multi-part prompt; the order is the order the model sees. */
export type ContentPart =
  | { readonly kind: 'text'; readonly value: string }
  | { readonly kind: 'image'; readonly mimeType: string; readonly base64Data: string };

export type ImagePart = Extract<ContentPart, { kind: 'image' }>;

export type StructuredContent = readonly ContentPart[];

export type Prompt = string | StructuredContent;

export interface CompletionRequest {
  readonly model: string;
  readonly prompt: Prompt;
  readonly temperature: number;
  readonly maxTokens: number;
  readonly stream: boolean;
}

// Wire types

export type WireContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

export interface ChatMessage {
  role: ChatRole;
  content: string | WireContentPart[];
}

export interface ChatCompletionRequestBody {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  max_tokens: number;
  stream: boolean;
}

export interface ChatCompletionResponse {
  id?: string;
  model?: string;
  choices?: Array<{
    index?: number;
    message?: { role?: string; content?: string | null };
    finish_reason?: string | null;
  }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

export type ChatCompletionChunk = {
  id?: string;
  model?: string;
  choices?: Array<{
    index?: number;
    delta?: { role?: string; content?: string | null };
    message?: { role?: string; content?: string | null };
    finish_reason?: string | null;
  }>;
};

/** A JSON record exactly as the provider sent it. */
export type ProviderRecord = Record<string, unknown>;

import { CallerError } from '../errors/categories.js';
import type {
  ChatCompletionRequestBody,
  CompletionRequest,
  ImagePart,
  StructuredContent,
  Prompt,
  WireContentPart,
} from '../services/chat/types.js';

export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 1000;
export const CHAT_COMPLETIONS_PATH = '/chat/completions';

/** Static identification headers the routing service asks every client to send. */
export interface ClientIdentity {
  referer: string;
  title: string;
}

export interface BuiltRequest {
  path: string;
  headers: Record<string, string>;
  body: ChatCompletionRequestBody;
}

/**
 * Assembles the payload and headers of a chat completion call.
 *
 * Values are forwarded as given: temperature is not clamped and the credential
 * is not inspected, so out-of-range values surface as upstream errors.
 */
export class RequestBuilder {
  private model = '';
  private prompt: Prompt = '';
  private temperature = DEFAULT_TEMPERATURE;
  private maxTokens = DEFAULT_MAX_TOKENS;
  private stream = false;
  private credential = '';

  constructor(private readonly identity: ClientIdentity) {}

  setModel(model: string): this {
    this.model = model;
    return this;
  }

  setPrompt(prompt: Prompt): this {
    this.prompt = prompt;
    return this;
  }

  setTemperature(temperature: number): this {
    this.temperature = temperature;
    return this;
  }

  setMaxTokens(maxTokens: number): this {
    this.maxTokens = maxTokens;
    return this;
  }

  setStream(stream: boolean): this {
    this.stream = stream;
    return this;
  }

  setCredential(credential: string): this {
    this.credential = credential;
    return this;
  }

  setRequest(request: CompletionRequest): this {
    return this.setModel(request.model)
      .setPrompt(request.prompt)
      .setTemperature(request.temperature)
      .setMaxTokens(request.maxTokens)
      .setStream(request.stream);
  }

  /** Checks the inputs that would make the call pointless; does no I/O. */
  validate(): void {
    if (!this.model.trim()) {
      throw new CallerError('A model is required: pass one or set a default model', { param: 'model' });
    }

    if (typeof this.prompt === 'string') {
      if (!this.prompt.trim()) {
        throw new CallerError('Prompt cannot be empty', { param: 'prompt' });
      }
      return;
    }

    if (this.prompt.length === 0) {
      throw new CallerError('Structured prompt must contain at least one part', { param: 'prompt' });
    }
    for (const [i, part] of this.prompt.entries()) {
      if (part.kind === 'image' && (!part.mimeType.startsWith('image/') || !part.base64Data)) {
        throw new CallerError(`prompt[${i}] is not a valid image part`, { param: `prompt[${i}]` });
      }
    }
  }

  build(): BuiltRequest {
    this.validate();

    const headers: Record<string, string> = {
      'Authorization': `Bearer ${this.credential}`,
      'Content-Type': 'application/json',
      'HTTP-Referer': this.identity.referer,
      'X-Title': this.identity.title,
    };
    if (this.stream) {
      headers['Accept'] = 'text/event-stream';
    }

    return {
      path: CHAT_COMPLETIONS_PATH,
      headers,
      body: {
        model: this.model,
        messages: [{ role: 'user', content: toWireContent(this.prompt) }],
        temperature: this.temperature,
        max_tokens: this.maxTokens,
        stream: this.stream,
      },
    };
  }

  static create(identity: ClientIdentity): RequestBuilder {
    return new RequestBuilder(identity);
  }
}

/** The `[instruction, image]` prompt used for image descriptions. */
export function visionPrompt(instruction: string, image: ImagePart): StructuredContent {
  return [{ kind: 'text', value: instruction }, image];
}

export function toWireContent(prompt: Prompt): string | WireContentPart[] {
  if (typeof prompt === 'string') {
    return prompt;
  }
  return prompt.map((part): WireContentPart =>
    part.kind === 'text'
      ? { type: 'text', text: part.value }
      : { type: 'image_url', image_url: { url: `data:${part.mimeType};base64,${part.base64Data}` } }
  );
}

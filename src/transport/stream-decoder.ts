import { OpenRouterError } from '../errors/error.js';
import { APIConnectionError } from '../errors/categories.js';
import { extractContent, isProviderRecord } from '../services/chat/content.js';
import type { ProviderRecord } from '../services/chat/types.js';

export type MalformedReason = 'invalid-json' | 'no-content' | 'empty-content';

/**
 * One decoded SSE frame. `malformed` frames are reported rather than thrown so
 * a single bad record never ends an otherwise healthy stream.
 */
export type StreamEvent =
  | { readonly type: 'delta'; readonly text: string; readonly shape: 'delta' | 'message'; readonly record: ProviderRecord }
  | { readonly type: 'malformed'; readonly raw: string; readonly reason: MalformedReason; readonly record?: ProviderRecord }
  | { readonly type: 'done' };

const DATA_PREFIX = 'data:';
const DONE_SENTINEL = '[DONE]';
const DONE: StreamEvent = { type: 'done' };

/** Decodes a single SSE line; `null` for lines that carry no data frame. */
export function decodeLine(line: string): StreamEvent | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith(DATA_PREFIX)) {
    return null;
  }

  const payload = trimmed.slice(DATA_PREFIX.length).trim();
  if (payload === DONE_SENTINEL) {
    return DONE;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch {
    return { type: 'malformed', raw: payload, reason: 'invalid-json' };
  }

  if (!isProviderRecord(parsed)) {
    return { type: 'malformed', raw: payload, reason: 'no-content' };
  }

  const content = extractContent(parsed);
  if (content.kind === 'none') {
    return { type: 'malformed', raw: payload, reason: 'no-content', record: parsed };
  }
  if (content.text === '') {
    return { type: 'malformed', raw: payload, reason: 'empty-content', record: parsed };
  }
  return { type: 'delta', text: content.text, shape: content.kind, record: parsed };
}

/**
 * Incremental line splitter. Bytes may arrive cut at any point, so the
 * trailing partial line stays buffered until the next chunk or `flush()`.
 */
export class SseLineDecoder {
  private buffer = '';
  private terminated = false;

  feed(chunk: string): StreamEvent[] {
    if (this.terminated) {
      return [];
    }
    this.buffer += chunk;
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';
    return this.decodeLines(lines);
  }

  /** Decodes whatever is left once the body has ended. */
  flush(): StreamEvent[] {
    if (this.terminated || this.buffer === '') {
      return [];
    }
    const rest = this.buffer;
    this.buffer = '';
    return this.decodeLines([rest]);
  }

  isTerminated(): boolean {
    return this.terminated;
  }

  private decodeLines(lines: string[]): StreamEvent[] {
    const events: StreamEvent[] = [];
    for (const line of lines) {
      const event = decodeLine(line);
      if (!event) continue;
      events.push(event);
      if (event.type === 'done') {
        this.terminated = true;
        this.buffer = '';
        break;
      }
    }
    return events;
  }
}

/**
 * Lazily decodes a streaming chat completion body.
 *
 * The sequence ends after `done`, or when the body closes without one.
 * Read failures are rethrown as {@link OpenRouterError}s.
 */
export async function* decodeStream(body: ReadableStream<Uint8Array>): AsyncGenerator<StreamEvent, void, undefined> {
  const reader = body.getReader();
  const textDecoder = new TextDecoder();
  const lineDecoder = new SseLineDecoder();
  let finished = false;

  try {
    while (!lineDecoder.isTerminated()) {
      let result: ReadableStreamReadResult<Uint8Array>;
      try {
        result = await reader.read();
      } catch (error) {
        finished = true;
        if (error instanceof OpenRouterError) throw error;
        throw new APIConnectionError(
          `Stream read failed: ${error instanceof Error ? error.message : String(error)}`,
          { cause: error instanceof Error ? error : undefined }
        );
      }

      if (result.done) {
        finished = true;
        yield* lineDecoder.feed(textDecoder.decode());
        yield* lineDecoder.flush();
        return;
      }

      yield* lineDecoder.feed(textDecoder.decode(result.value, { stream: true }));
    }
  } finally {
    if (!finished) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

import { createDeltaChunk } from './chat.fixtures.js';

/** Formats one SSE data frame; strings are sent as-is, anything else as JSON. */
export function sseFrame(payload: unknown): string {
  const data = typeof payload === 'string' ? payload : JSON.stringify(payload);
  return `data: ${data}\n\n`;
}

export function createSSEStream(payloads: unknown[]): string {
  return payloads.map(sseFrame).join('');
}

/** SSE text for a stream of deltas terminated by `[DONE]`. */
export function createDeltaStream(deltas: string[]): string {
  return createSSEStream([...deltas.map((d) => createDeltaChunk(d)), '[DONE]']);
}

/**
 * A byte stream that yields `chunks` in order. With `keepOpen` it never
 * closes, which is how a stalled connection looks to the reader.
 */
export function createByteStream(chunks: string[], options: { keepOpen?: boolean } = {}): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  let index = 0;
  return new ReadableStream<Uint8Array>({
    pull(controller) {
      const chunk = chunks[index];
      if (chunk !== undefined) {
        index++;
        controller.enqueue(encoder.encode(chunk));
        return;
      }
      if (!options.keepOpen) {
        controller.close();
        return;
      }
      return new Promise<void>(() => undefined);
    },
  });
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

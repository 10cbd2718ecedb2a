import { mapHttpError } from '../errors/mapping.js';
import { OpenRouterError } from '../errors/error.js';
import { APIConnectionError, APIError, RequestFailedError, TimeoutError } from '../errors/categories.js';

export interface HttpRequest {
  path: string;
  body: unknown;
  headers: Record<string, string>;
  /** Overrides the transport's timeout for this call. */
  timeout?: number;
  signal?: AbortSignal;
}

export interface HttpTransport {
  /** POSTs `body` as JSON and resolves with the parsed JSON response. */
  request(request: HttpRequest): Promise<unknown>;
  /**
   * POSTs `body` and resolves with the response body once headers arrive.
   * Each read of the returned stream fails with {@link TimeoutError} when no
   * bytes arrive within the idle timeout; a caller abort ends it cleanly.
   */
  stream(request: HttpRequest): Promise<ReadableStream<Uint8Array>>;
}

export interface TransportTimeouts {
  /** Whole-request budget for blocking calls, in milliseconds. */
  request: number;
  /** Longest wait for the next chunk of a streaming body, in milliseconds. */
  streamIdle: number;
}

type ReadOutcome =
  | { kind: 'chunk'; value: Uint8Array }
  | { kind: 'end' }
  | { kind: 'timeout' }
  | { kind: 'cancelled' };

export class FetchHttpTransport implements HttpTransport {
  constructor(
    private readonly baseUrl: string,
    private readonly timeouts: TransportTimeouts,
    private readonly fetchImpl: typeof fetch = (input, init) => globalThis.fetch(input, init)
  ) {}

  async request(request: HttpRequest): Promise<unknown> {
    const timeout = request.timeout ?? this.timeouts.request;
    const controller = new AbortController();
    const unlink = linkSignal(request.signal, controller);
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeout);

    try {
      const response = await this.fetchImpl(this.buildUrl(request.path), {
        method: 'POST',
        headers: request.headers,
        body: JSON.stringify(request.body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const body = await response.text();
        throw mapHttpError(response.status, body, response.headers);
      }

      try {
        return await response.json();
      } catch (error) {
        throw new APIError('Response body is not valid JSON', response.status, {
          code: error instanceof Error ? error.name : undefined,
        });
      }
    } catch (error) {
      if (error instanceof OpenRouterError) throw error;
      if (timedOut) throw new TimeoutError(`Request timed out after ${timeout}ms`);
      if (request.signal?.aborted) throw new RequestFailedError('Request was cancelled', { code: 'cancelled' });
      throw new APIConnectionError(`Connection failed: ${describe(error)}`, { cause: asError(error) });
    } finally {
      clearTimeout(timeoutId);
      unlink();
    }
  }

  async stream(request: HttpRequest): Promise<ReadableStream<Uint8Array>> {
    const idleTimeout = request.timeout ?? this.timeouts.streamIdle;
    const controller = new AbortController();
    const unlink = linkSignal(request.signal, controller);
    let timedOut = false;
    const connectTimer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, idleTimeout);

    let response: Response;
    try {
      response = await this.fetchImpl(this.buildUrl(request.path), {
        method: 'POST',
        headers: request.headers,
        body: JSON.stringify(request.body),
        signal: controller.signal,
      });
    } catch (error) {
      unlink();
      if (timedOut) throw new TimeoutError(`No response within ${idleTimeout}ms`);
      if (request.signal?.aborted) throw new RequestFailedError('Request was cancelled', { code: 'cancelled' });
      throw new APIConnectionError(`Connection failed: ${describe(error)}`, { cause: asError(error) });
    } finally {
      clearTimeout(connectTimer);
    }

    if (!response.ok) {
      unlink();
      const body = await response.text();
      throw mapHttpError(response.status, body, response.headers);
    }

    if (!response.body) {
      unlink();
      throw new APIError('Streaming response has no body', response.status);
    }

    return guardBody(response.body, idleTimeout, request.signal, () => {
      unlink();
      controller.abort();
    });
  }

  private buildUrl(path: string): string {
    return `${this.baseUrl.replace(/\/+$/, '')}${path}`;
  }
}

/**
 * Wraps a response body so each read is bounded by `idleTimeout` and a caller
 * abort closes the stream instead of erroring it.
 */
function guardBody(
  body: ReadableStream<Uint8Array>,
  idleTimeout: number,
  signal: AbortSignal | undefined,
  close: () => void
): ReadableStream<Uint8Array> {
  const reader = body.getReader();

  const shutdown = async (): Promise<void> => {
    close();
    await reader.cancel().catch((error: unknown) => {
      if (!(error instanceof Error && error.name === 'AbortError')) throw error;
    });
  };

  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      let outcome: ReadOutcome;
      try {
        outcome = await readWithDeadline(reader, idleTimeout, signal);
      } catch (error) {
        close();
        controller.error(new APIConnectionError(`Stream interrupted: ${describe(error)}`, { cause: asError(error) }));
        return;
      }

      switch (outcome.kind) {
        case 'chunk':
          controller.enqueue(outcome.value);
          return;
        case 'end':
          close();
          controller.close();
          return;
        case 'cancelled':
          await shutdown();
          controller.close();
          return;
        case 'timeout':
          await shutdown();
          controller.error(new TimeoutError(`No data received for ${idleTimeout}ms`));
          return;
      }
    },
    async cancel() {
      await shutdown();
    },
  });
}

function readWithDeadline(
  reader: ReadableStreamDefaultReader<Uint8Array>,
  ms: number,
  signal: AbortSignal | undefined
): Promise<ReadOutcome> {
  return new Promise<ReadOutcome>((resolve, reject) => {
    let settled = false;
    const finish = (settle: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      settle();
    };
    const onAbort = (): void => finish(() => resolve({ kind: 'cancelled' }));
    const timer = setTimeout(() => finish(() => resolve({ kind: 'timeout' })), ms);

    if (signal?.aborted) {
      onAbort();
      return;
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    reader.read().then(
      (result) => finish(() => resolve(result.done ? { kind: 'end' } : { kind: 'chunk', value: result.value })),
      (error: unknown) => finish(() => reject(error))
    );
  });
}

function linkSignal(signal: AbortSignal | undefined, controller: AbortController): () => void {
  if (!signal) return () => undefined;
  if (signal.aborted) {
    controller.abort();
    return () => undefined;
  }
  const onAbort = (): void => controller.abort();
  signal.addEventListener('abort', onAbort, { once: true });
  return () => signal.removeEventListener('abort', onAbort);
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function asError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

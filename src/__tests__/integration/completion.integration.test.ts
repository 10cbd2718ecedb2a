import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  BASE_URL,
  recorded,
  mockChatCompletion,
  mockErrorResponse,
  mockNetworkError,
  mockStreamingResponse,
} from './setup.js';
import { createClient } from '../../client/index.js';
import { ModelSettings } from '../../settings/model-settings.js';
import {
  APIConnectionError,
  AuthenticationError,
  CredentialNotFoundError,
  RequestFailedError,
} from '../../errors/categories.js';
import { CaptureSink, InMemoryCredentialProvider, RecordingLogger } from '../../__mocks__/index.js';
import {
  createChatCompletionResponse,
  createDeltaChunk,
  createDeltaStream,
  createMessageChunk,
  createSSEStream,
  sseFrame,
} from '../../__fixtures__/index.js';

describe('completion against an in-process server', () => {
  let sink: CaptureSink;
  let logger: RecordingLogger;
  let credentials: InMemoryCredentialProvider;
  let modelSettings: ModelSettings;

  beforeEach(() => {
    sink = new CaptureSink();
    logger = new RecordingLogger();
    credentials = new InMemoryCredentialProvider('test-secret');
    modelSettings = new ModelSettings('openai/gpt-4o-mini');
  });

  function client() {
    return createClient({ baseUrl: BASE_URL }, { credentials, modelSettings, sink, logger });
  }

  it('uses the default model current at call time', async () => {
    mockChatCompletion();
    await modelSettings.set('anthropic/claude-3-haiku');

    await client().complete({ prompt: 'Hello' });

    expect(recorded).toHaveLength(1);
    expect(recorded[0]?.body).toEqual({
      model: 'anthropic/claude-3-haiku',
      messages: [{ role: 'user', content: 'Hello' }],
      temperature: 0.7,
      max_tokens: 1000,
      stream: false,
    });
    expect(recorded[0]?.headers.get('x-title')).toBe('openrouter-prompt');
  });

  it('joins streamed deltas with a single trailing newline', async () => {
    mockStreamingResponse([createDeltaStream(['Hel', 'lo, ', 'world'])]);

    const result = await client().complete({ prompt: 'greet', stream: true, returnRequested: true });

    expect(result).toEqual({ textContent: 'Hello, world' });
    expect(sink.text).toBe('Hello, world\n');
    expect(recorded[0]?.headers.get('accept')).toBe('text/event-stream');
  });

  it('skips malformed frames without failing', async () => {
    mockStreamingResponse([createSSEStream(['not-json', { choices: [] }, createDeltaChunk('ok'), '[DONE]'])]);

    const result = await client().complete({ prompt: 'x', stream: true, returnRequested: true });

    expect(result).toEqual({ textContent: 'ok' });
    expect(logger.at('error')).toEqual([]);
  });

  it('accepts message-shaped stream records', async () => {
    mockStreamingResponse([createSSEStream([createMessageChunk('whole answer'), '[DONE]'])]);

    const result = await client().complete({ prompt: 'x', stream: true, returnRequested: true });

    expect(result).toEqual({ textContent: 'whole answer' });
  });

  it('ends cleanly when the server closes without [DONE]', async () => {
    mockStreamingResponse([sseFrame(createDeltaChunk('cut ')), sseFrame(createDeltaChunk('short'))]);

    const result = await client().complete({ prompt: 'x', stream: true, returnRequested: true });

    expect(result).toEqual({ textContent: 'cut short' });
    expect(logger.at('debug')).toContain('Stream ended without a [DONE] marker');
  });

  it('reassembles frames split across network chunks', async () => {
    const body = createDeltaStream(['split ', 'frames']);
    mockStreamingResponse([body.slice(0, 20), body.slice(20, 45), body.slice(45)]);

    const result = await client().complete({ prompt: 'x', stream: true, returnRequested: true });

    expect(result).toEqual({ textContent: 'split frames' });
  });

  it('makes no request without a credential', async () => {
    credentials = new InMemoryCredentialProvider(undefined);
    mockChatCompletion();

    await expect(client().complete({ prompt: 'x' })).rejects.toBeInstanceOf(CredentialNotFoundError);
    expect(recorded).toHaveLength(0);
  });

  it('surfaces an error status as RequestFailed', async () => {
    mockErrorResponse(401, { error: { message: 'Invalid API key', code: 401 } });

    const error = await client().complete({ prompt: 'x' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error).toBeInstanceOf(RequestFailedError);
    expect(error).toHaveProperty('message', 'HTTP 401: Invalid API key');
    expect(recorded).toHaveLength(1);
  });

  it('surfaces a refused connection as RequestFailed', async () => {
    mockNetworkError();

    await expect(client().complete({ prompt: 'x', stream: true })).rejects.toBeInstanceOf(APIConnectionError);
  });

  it('returns the blocking content and echoes it', async () => {
    mockChatCompletion(createChatCompletionResponse('# Notes\n\n- one'));

    const result = await client().complete({ prompt: 'x' });

    expect(result).toEqual({ textContent: '# Notes\n\n- one' });
    expect(sink.text).toBe('# Notes\n\n- one\n');
  });

  describe('output file', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'openrouter-it-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('creates missing directories and writes the exact text', async () => {
      mockStreamingResponse([createDeltaStream(['line one\n', 'line two'])]);
      const outFile = join(dir, 'a', 'b', 'out.md');

      const result = await client().complete({ prompt: 'x', stream: true, outFile });

      expect(result).toBeUndefined();
      expect(sink.writes).toEqual([]);
      expect(await readFile(outFile, 'utf8')).toBe('line one\nline two');
      expect(logger.at('info')).toEqual(['Response saved']);
    });

    it('writes no file for an empty response', async () => {
      mockChatCompletion(createChatCompletionResponse(null));
      const outFile = join(dir, 'empty.md');

      const result = await client().complete({ prompt: 'x', outFile });

      expect(result).toBeUndefined();
      await expect(stat(outFile)).rejects.toThrow();
      expect(logger.at('debug')).toContain('No content in response');
    });
  });
});

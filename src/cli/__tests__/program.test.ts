import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { run, type CliContext, type CliDependencies } from '../program.js';
import { createClient } from '../../client/factory.js';
import { ModelSettings } from '../../settings/model-settings.js';
import type { ClipboardResult } from '../../vision/clipboard.js';
import {
  CaptureSink,
  InMemoryCredentialProvider,
  createMockHttpTransport,
  type MockHttpTransport,
} from '../../__mocks__/index.js';
import { createByteStream, createChatCompletionResponse, createDeltaStream } from '../../__fixtures__/index.js';

const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00]);

describe('openrouter-prompt CLI', () => {
  let stdout: CaptureSink;
  let stderr: string[];
  let transport: MockHttpTransport;
  let credentials: InMemoryCredentialProvider;
  let modelSettings: ModelSettings;
  let copy: Mock<[string], Promise<ClipboardResult>>;
  let dir: string;

  beforeEach(() => {
    stdout = new CaptureSink();
    stderr = [];
    transport = createMockHttpTransport();
    transport.request.mockResolvedValue(createChatCompletionResponse('A cat on a mat.'));
    credentials = new InMemoryCredentialProvider('test-secret', { name: 'test store' });
    modelSettings = new ModelSettings('openai/gpt-4o-mini');
    copy = vi.fn<[string], Promise<ClipboardResult>>(async () => ({ ok: true, tool: 'pbcopy' }));
  });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'openrouter-cli-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function deps(): CliDependencies {
    return {
      createClient: async ({ logger, sink }: CliContext) =>
        createClient({}, { transport, credentials, modelSettings, logger, sink }),
      credentials: () => credentials,
      copyToClipboard: copy,
      stdout,
      stderr: (line) => stderr.push(line),
      env: {},
    };
  }

  function cli(...args: string[]): Promise<number> {
    return run(['node', 'openrouter-prompt', ...args], deps());
  }

  it('asks with the joined prompt words', async () => {
    expect(await cli('ask', 'what', 'is', 'this?')).toBe(0);

    expect(stdout.text).toBe('A cat on a mat.\n');
    expect(transport.request.mock.calls[0]?.[0].body).toEqual({
      model: 'openai/gpt-4o-mini',
      messages: [{ role: 'user', content: 'what is this?' }],
      temperature: 0.7,
      max_tokens: 1000,
      stream: false,
    });
  });

  it('passes model and sampling options', async () => {
    await cli('ask', '-m', 'x/y', '-t', '0.2', '--max-tokens', '64', 'hi');

    expect(transport.request.mock.calls[0]?.[0].body).toMatchObject({ model: 'x/y', temperature: 0.2, max_tokens: 64 });
  });

  it('streams when asked', async () => {
    transport.stream.mockResolvedValue(createByteStream([createDeltaStream(['a', 'b'])]));

    expect(await cli('ask', '--stream', 'hi')).toBe(0);
    expect(stdout.writes).toEqual(['a', 'b', '\n']);
  });

  it('prints raw records after the answer', async () => {
    await cli('ask', '--raw', 'hi');

    const [answer, raw] = stdout.writes;
    expect(answer).toBe('A cat on a mat.\n');
    expect(JSON.parse(raw ?? '')).toEqual([createChatCompletionResponse('A cat on a mat.')]);
  });

  it('rejects a temperature that is not a number', async () => {
    expect(await cli('ask', '-t', 'warm', 'hi')).toBe(1);
    expect(stderr.join('\n')).toContain('Not a number.');
    expect(transport.request).not.toHaveBeenCalled();
  });

  it('reports failures by error name with exit code 1', async () => {
    credentials = new InMemoryCredentialProvider(undefined, { name: 'test store' });

    expect(await cli('ask', 'hi')).toBe(1);
    expect(stderr).toEqual([
      'CredentialNotFoundError: No API key found in test store; run "openrouter-prompt set-key <key>" or set OPENROUTER_API_KEY',
    ]);
  });

  it('writes debug logs to stderr only with --log-level debug', async () => {
    await cli('--log-level', 'debug', 'ask', 'hi');

    expect(stderr).toContain('[DEBUG] Sending completion request {"model":"openai/gpt-4o-mini","stream":false}');
    expect(stdout.text).toBe('A cat on a mat.\n');
  });

  it('copies alt text to the clipboard', async () => {
    const path = join(dir, 'photo.png');
    await writeFile(path, PNG_BYTES);

    expect(await cli('alt-text', path, '--copy')).toBe(0);

    expect(stdout.text).toBe('A cat on a mat.\n');
    expect(copy).toHaveBeenCalledWith('A cat on a mat.');
    expect(stderr).toEqual(['[INFO] Copied alt text to clipboard {"tool":"pbcopy"}']);
    expect(transport.request.mock.calls[0]?.[0].body).toMatchObject({ model: 'openai/gpt-4o-mini' });
  });

  it('warns when the clipboard is unavailable', async () => {
    const path = join(dir, 'photo.png');
    await writeFile(path, PNG_BYTES);
    copy.mockResolvedValue({ ok: false, reason: 'pbcopy: exit code 1' });

    expect(await cli('alt-text', path, '--copy')).toBe(0);
    expect(stderr).toEqual(['[WARN] Could not copy to clipboard {"reason":"pbcopy: exit code 1"}']);
  });

  it('fails alt-text for a missing image', async () => {
    expect(await cli('alt-text', '/definitely/missing/image.png')).toBe(1);
    expect(stderr[0]).toMatch(/^CallerError: Cannot read image \/definitely\/missing\/image\.png: /);
  });

  it('saves the API key', async () => {
    expect(await cli('set-key', ' test-secret-2 ')).toBe(0);

    expect(credentials.writes).toEqual(['test-secret-2']);
    expect(stdout.text).toBe('API key saved to test store\n');
  });

  it('reports a key no store accepted', async () => {
    credentials = new InMemoryCredentialProvider(undefined, { name: 'locked', failWrites: true });

    expect(await cli('set-key', 'test-secret')).toBe(1);
    expect(stderr).toEqual(['CredentialStoreError: locked is read-only']);
  });

  it('gets and sets the default model', async () => {
    expect(await cli('set-model', 'mistralai/mistral-large')).toBe(0);
    expect(await cli('get-model')).toBe(0);

    expect(stdout.writes).toEqual(['Default model set to mistralai/mistral-large\n', 'mistralai/mistral-large\n']);
  });

  it('prints the version', async () => {
    expect(await cli('--version')).toBe(0);
    expect(stdout.text).toBe('0.1.0\n');
  });
});

import { vi, type Mock } from 'vitest';
import type { HttpRequest, HttpTransport } from '../transport/http-transport.js';

export interface MockHttpTransport extends HttpTransport {
  request: Mock<[HttpRequest], Promise<unknown>>;
  stream: Mock<[HttpRequest], Promise<ReadableStream<Uint8Array>>>;
}

export function createMockHttpTransport(): MockHttpTransport {
  return {
    request: vi.fn<[HttpRequest], Promise<unknown>>(),
    stream: vi.fn<[HttpRequest], Promise<ReadableStream<Uint8Array>>>(),
  };
}

export type { MockCommandRunner } from './command-runner.mock.js';
export { createMockCommandRunner } from './command-runner.mock.js';
export { InMemoryCredentialProvider } from './credential-provider.mock.js';
export type { LogEntry } from './output.mock.js';
export { CaptureSink, RecordingLogger } from './output.mock.js';
export type { MockHttpTransport } from './http-transport.mock.js';
export { createMockHttpTransport } from './http-transport.mock.js';

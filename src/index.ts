export * from './errors/index.js';
export * from './observability/index.js';
export * from './client/index.js';
export * from './credentials/index.js';
export * from './settings/index.js';
export * from './output/index.js';
export * from './vision/index.js';
export * from './transport/index.js';
export * from './services/chat/index.js';
export { VERSION } from './version.js';

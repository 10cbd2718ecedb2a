export type { ImageMimeType } from './image.js';
export { readImage, detectImageMime, sniffImageType, imageTypeFromExtension } from './image.js';
export { ALT_TEXT_INSTRUCTION } from './alt-text.js';
export type { ClipboardResult } from './clipboard.js';
export { copyToClipboard } from './clipboard.js';

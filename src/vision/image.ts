import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { CallerError } from '../errors/categories.js';
import type { ImagePart } from '../services/chat/types.js';

export type ImageMimeType = 'image/png' | 'image/jpeg' | 'image/gif' | 'image/webp';

const EXTENSION_TYPES: Record<string, ImageMimeType> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.jpe': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
};

function startsWith(bytes: Uint8Array, signature: readonly number[], offset = 0): boolean {
  return signature.every((byte, i) => bytes[offset + i] === byte);
}

/** Identifies an image from its leading bytes. */
export function sniffImageType(bytes: Uint8Array): ImageMimeType | undefined {
  if (startsWith(bytes, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) return 'image/png';
  if (startsWith(bytes, [0xff, 0xd8, 0xff])) return 'image/jpeg';
  if (startsWith(bytes, [0x47, 0x49, 0x46, 0x38])) return 'image/gif';
  // RIFF....WEBP
  if (startsWith(bytes, [0x52, 0x49, 0x46, 0x46]) && startsWith(bytes, [0x57, 0x45, 0x42, 0x50], 8)) {
    return 'image/webp';
  }
  return undefined;
}

export function imageTypeFromExtension(path: string): ImageMimeType | undefined {
  return EXTENSION_TYPES[extname(path).toLowerCase()];
}

export function detectImageMime(path: string, bytes: Uint8Array): ImageMimeType | undefined {
  return sniffImageType(bytes) ?? imageTypeFromExtension(path);
}

/** Loads an image file as a prompt part. */
export async function readImage(path: string): Promise<ImagePart> {
  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (error) {
    throw new CallerError(`Cannot read image ${path}: ${error instanceof Error ? error.message : String(error)}`, {
      param: 'image',
      cause: error instanceof Error ? error : undefined,
    });
  }

  if (bytes.length === 0) {
    throw new CallerError(`Image ${path} is empty`, { param: 'image' });
  }

  const mimeType = detectImageMime(path, bytes);
  if (!mimeType) {
    throw new CallerError(`Unsupported image type: ${path} (expected PNG, JPEG, GIF or WebP)`, { param: 'image' });
  }

  return { kind: 'image', mimeType, base64Data: bytes.toString('base64') };
}

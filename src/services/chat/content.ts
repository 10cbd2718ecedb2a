import type { ProviderRecord } from './types.js';

/**
 * Where the text of a record was found. Providers that stream deltas use
 * `choices[0].delta.content`; some emit whole messages instead.
 */
export type ExtractedContent =
  | { readonly kind: 'delta'; readonly text: string }
  | { readonly kind: 'message'; readonly text: string }
  | { readonly kind: 'none' };

const NONE: ExtractedContent = { kind: 'none' };

/**
 * Pulls the content string out of a chat completion record, trying the delta
 * shape first and the message shape second.
 */
export function extractContent(record: unknown): ExtractedContent {
  const choice = firstChoice(record);
  if (!choice) {
    return NONE;
  }

  const delta = stringField(choice, 'delta');
  if (delta !== undefined) {
    return { kind: 'delta', text: delta };
  }

  const message = stringField(choice, 'message');
  if (message !== undefined) {
    return { kind: 'message', text: message };
  }

  return NONE;
}

export function isProviderRecord(value: unknown): value is ProviderRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstChoice(record: unknown): ProviderRecord | undefined {
  if (!isProviderRecord(record)) {
    return undefined;
  }
  const choices = record['choices'];
  if (!Array.isArray(choices) || choices.length === 0) {
    return undefined;
  }
  const first: unknown = choices[0];
  return isProviderRecord(first) ? first : undefined;
}

function stringField(choice: ProviderRecord, key: 'delta' | 'message'): string | undefined {
  const holder = choice[key];
  if (!isProviderRecord(holder)) {
    return undefined;
  }
  const content = holder['content'];
  return typeof content === 'string' ? content : undefined;
}

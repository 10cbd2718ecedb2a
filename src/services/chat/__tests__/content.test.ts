import { describe, it, expect } from 'vitest';
import { extractContent } from '../content.js';

describe('extractContent', () => {
  it('reads the delta shape', () => {
    expect(extractContent({ choices: [{ delta: { content: 'Hel' } }] })).toEqual({ kind: 'delta', text: 'Hel' });
  });

  it('falls back to the message shape', () => {
    expect(extractContent({ choices: [{ message: { role: 'assistant', content: 'Whole' } }] })).toEqual({
      kind: 'message',
      text: 'Whole',
    });
  });

  it('prefers delta when both shapes are present', () => {
    const record = { choices: [{ delta: { content: 'a' }, message: { content: 'b' } }] };
    expect(extractContent(record)).toEqual({ kind: 'delta', text: 'a' });
  });

  it('uses the message shape when the delta carries no content', () => {
    const record = { choices: [{ delta: { role: 'assistant' }, message: { content: 'b' } }] };
    expect(extractContent(record)).toEqual({ kind: 'message', text: 'b' });
  });

  it('reports empty strings as content', () => {
    expect(extractContent({ choices: [{ delta: { content: '' } }] })).toEqual({ kind: 'delta', text: '' });
  });

  it.each([
    ['an empty choices array', { choices: [] }],
    ['a missing choices field', { id: 'gen-1' }],
    ['a null content', { choices: [{ delta: { content: null } }] }],
    ['a non-object record', 'text'],
    ['null', null],
    ['an array', [1, 2]],
  ])('returns none for %s', (_label, record) => {
    expect(extractContent(record)).toEqual({ kind: 'none' });
  });
});

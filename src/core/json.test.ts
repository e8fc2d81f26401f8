import { describe, it, expect } from 'vitest';

import { errorMessage, extractJSON, tryParseJSON } from './json.js';

describe('extractJSON', () => {
  it('takes the body of a fenced block', () => {
    expect(extractJSON('Here it is:\n```json\n[{"a": 1}]\n```\nDone.', '[')).toBe('[{"a": 1}]');
  });

  it('accepts an upper-case fence label', () => {
    expect(extractJSON('```JSON\n{"a": 1}\n```', '{')).toBe('{"a": 1}');
  });

  it('cuts the outermost bracketed span when there is no fence', () => {
    expect(extractJSON('Sure: {"a": {"b": 2}} hope that helps', '{')).toBe('{"a": {"b": 2}}');
  });

  it('returns trimmed text when nothing matches', () => {
    expect(extractJSON('  no json here  ', '[')).toBe('no json here');
  });
});

describe('tryParseJSON', () => {
  it('parses valid JSON', () => {
    expect(tryParseJSON('{"a":1}')).toEqual({ ok: true, value: { a: 1 } });
  });

  it('reports invalid JSON', () => {
    const result = tryParseJSON('nope');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.startsWith('Invalid JSON: ')).toBe(true);
  });
});

describe('errorMessage', () => {
  it('reads Error messages and stringifies the rest', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});

import { describe, expect, it } from 'vitest';
import { formatContextHint, formatPersonalAnchors, safeJson, truncate } from '../context.js';

describe('truncate', () => {
  it('trims surrounding whitespace', () => {
    expect(truncate('  hello  ', 10)).toBe('hello');
  });

  it('cuts long text and marks the cut', () => {
    expect(truncate('abcdef', 3)).toBe('abc…');
  });

  it('returns an empty string for missing text', () => {
    expect(truncate(undefined, 5)).toBe('');
    expect(truncate(null, 5)).toBe('');
  });
});

describe('safeJson', () => {
  it('serializes plain values', () => {
    expect(safeJson({ a: 1 })).toBe('{"a":1}');
  });

  it('serializes missing values as an empty object', () => {
    expect(safeJson(undefined)).toBe('{}');
  });

  it('falls back to an empty object for unserializable values', () => {
    const loop: Record<string, unknown> = {};
    loop.self = loop;
    expect(safeJson(loop)).toBe('{}');
  });

  it('cuts the output at the limit', () => {
    expect(safeJson({ text: 'abcdefghij' }, 5)).toBe('{"tex…');
  });
});

describe('formatPersonalAnchors', () => {
  it('returns an empty list without anchors', () => {
    expect(formatPersonalAnchors(undefined)).toBe('[]');
    expect(formatPersonalAnchors([])).toBe('[]');
  });

  it('keeps id, title and a shortened excerpt', () => {
    expect(formatPersonalAnchors([{ id: 'a1', title: 'Harbor', excerpt: '  abcdef ' }], 3))
      .toBe('[{"id":"a1","title":"Harbor","excerpt":"abc…"}]');
  });

  it('fills missing fields with null and keeps the first k anchors', () => {
    const anchors = [{ excerpt: 'one' }, { excerpt: 'two' }, { excerpt: 'three' }, { excerpt: 'four' }];
    const parsed: unknown = JSON.parse(formatPersonalAnchors(anchors));
    expect(parsed).toEqual([
      { id: null, title: null, excerpt: 'one' },
      { id: null, title: null, excerpt: 'two' },
      { id: null, title: null, excerpt: 'three' },
    ]);
  });
});

describe('formatContextHint', () => {
  it('is empty without a context pack', () => {
    expect(formatContextHint(undefined)).toBe('');
  });

  it('summarizes the overview counts', () => {
    expect(formatContextHint({ overview: { writings_count: 3, streak_days: 2 } }))
      .toBe('(Overview: writings=3, bursts=0, streak=2d)');
  });
});

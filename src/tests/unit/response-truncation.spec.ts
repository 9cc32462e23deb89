import { describe, expect, it } from 'vitest';

import { serializeResult, truncateResult, truncationFooter } from '../../guard/truncation.js';

const wideMapping = (): Record<string, string> => Object.fromEntries(
  Array.from({ length: 50 }, (_, index) => {
    const key = `key_${String(index).padStart(2, '0')}`;
    return [key, 'x'.repeat(index === 49 ? 987 : 988)];
  })
);

describe('serializeResult', () => {
  it('treats a string holding a JSON array as a sequence but keeps the original text', () => {
    const out = serializeResult(' [1, 2] ');
    expect(out.shape).toBe('sequence');
    expect(out.text).toBe(' [1, 2] ');
  });

  it('falls back to text for strings that only look like JSON', () => {
    expect(serializeResult('{not json').shape).toBe('text');
  });

  it('renders undefined as an empty string', () => {
    expect(serializeResult(undefined)).toEqual({ text: '', shape: 'text' });
  });

  it('serializes numbers as text', () => {
    expect(serializeResult(42)).toEqual({ text: '42', shape: 'text' });
  });
});

describe('truncateResult', () => {
  it('passes results at or below the threshold through untouched', () => {
    const out = truncateResult({ a: 1 });
    expect(out).toEqual({ text: '{"a":1}', truncated: false, shape: 'mapping', originalChars: 7 });
  });

  it('passes a result of exactly the threshold length through', () => {
    const text = 'z'.repeat(10_000);
    const out = truncateResult(text);
    expect(out.truncated).toBe(false);
    expect(out.text).toBe(text);
  });

  it('keeps the first twenty entries of a wide mapping with shortened values', () => {
    const out = truncateResult(wideMapping());
    const footer = truncationFooter(50_000);

    expect(out.originalChars).toBe(50_000);
    expect(out.truncated).toBe(true);
    expect(out.shape).toBe('mapping');
    expect(out.text.endsWith(footer)).toBe(true);
    expect(out.text.length).toBe(2382 + footer.length);
    expect(out.text.startsWith(`{\n  "key_00": "${'x'.repeat(100)}...",\n`)).toBe(true);
    expect(out.text).toContain('"key_19"');
    expect(out.text).not.toContain('"key_20"');
  });

  it('mentions the original size in the footer', () => {
    expect(truncationFooter(50_000)).toBe(
      '\n\n... (Response truncated - showing first portion of data. Total size: 50000 chars. The data above is usable as-is.)'
    );
  });

  it('keeps the first items of a long sequence and counts the rest', () => {
    const items = Array.from({ length: 8 }, () => 'y'.repeat(2000));
    const out = truncateResult(items);
    const line = `  "${'y'.repeat(100)}..."`;
    const body = `[\n${Array.from({ length: 5 }, () => line).join(',\n')},\n  "... and 3 more items"\n]`;

    expect(out.shape).toBe('sequence');
    expect(out.originalChars).toBe(16_025);
    expect(out.text).toBe(`${body}${truncationFooter(16_025)}`);
  });

  it('shortens string fields of objects inside a sequence', () => {
    const items = Array.from({ length: 6 }, (_, index) => ({ id: index, note: 'n'.repeat(3000) }));
    const out = truncateResult(items);
    expect(out.text).toContain(`"note": "${'n'.repeat(100)}..."`);
    expect(out.text).toContain('"... and 1 more items"');
  });

  it('cuts plain text to the cap', () => {
    const out = truncateResult('a'.repeat(12_000));
    expect(out.shape).toBe('text');
    expect(out.text).toBe(`${'a'.repeat(3000)}${truncationFooter(12_000)}`);
  });

  it('honours a custom policy', () => {
    const out = truncateResult('b'.repeat(50), { thresholdChars: 10, maxEntries: 1, maxItems: 1, capChars: 5, maxValueChars: 3 });
    expect(out.text).toBe(`bbbbb${truncationFooter(50)}`);
  });
});

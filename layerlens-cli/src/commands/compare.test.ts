import { describe, it, expect } from 'vitest';
import { parseCompareFormat } from './compare';

describe('parseCompareFormat', () => {
  it('defaults to text', () => {
    expect(parseCompareFormat(undefined)).toBe('text');
    expect(parseCompareFormat('markdown')).toBe('markdown');
  });

  it('rejects unknown formats', () => {
    expect(() => parseCompareFormat('json')).toThrow('Unknown format "json" (expected text or markdown)');
  });
});

import { describe, it, expect } from 'vitest';
import { normalizeName } from '../utils/normalize-name';

describe('normalizeName', () => {
  it('lower-cases ASCII names', () => {
    expect(normalizeName('Head Office')).toBe('head office');
  });

  it('folds full-width characters to their ASCII form', () => {
    expect(normalizeName('ＳＡＬＥＳ')).toBe('sales');
  });

  it('folds half-width katakana to full-width', () => {
    expect(normalizeName('ｿｳﾑ')).toBe('ソウム');
  });

  it('treats null and undefined as empty', () => {
    expect(normalizeName(null)).toBe('');
    expect(normalizeName(undefined)).toBe('');
  });

  it('keeps surrounding whitespace', () => {
    expect(normalizeName(' Sales ')).toBe(' sales ');
  });
});

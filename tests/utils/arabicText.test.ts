import { describe, it, expect } from 'vitest';
import {
  formatCitation,
  normalizeArabic,
  normalizeForSearch,
  parseNumberWithReverse,
  toArabicIndicDigits,
  toWesternDigits,
} from '../../src/server/utils/arabicText.js';

describe('normalizeArabic', () => {
  it('removes diacritics and folds alef variants', () => {
    expect(normalizeArabic('أَحْمَد')).toBe('احمد');
    expect(normalizeArabic('إلى آخره')).toBe('الى اخره');
  });

  it('removes tatweel', () => {
    expect(normalizeArabic('مـــادة')).toBe('مادة');
  });

  it('keeps teh marbuta and alef maksura by default', () => {
    expect(normalizeArabic('المادة على')).toBe('المادة على');
  });

  it('collapses whitespace', () => {
    expect(normalizeArabic('  ما   هي\n\tالعقوبة ')).toBe('ما هي العقوبة');
  });

  it('returns an empty string for empty input', () => {
    expect(normalizeArabic('')).toBe('');
  });
});

describe('normalizeForSearch', () => {
  it('also folds teh marbuta and alef maksura', () => {
    expect(normalizeForSearch('المادة على')).toBe('الماده علي');
  });
});

describe('digits', () => {
  it('converts Arabic-Indic and extended digits to ASCII', () => {
    expect(toWesternDigits('مادة ١٢٣')).toBe('مادة 123');
    expect(toWesternDigits('۴۵')).toBe('45');
  });

  it('converts ASCII digits to Arabic-Indic', () => {
    expect(toArabicIndicDigits(318)).toBe('٣١٨');
  });

  it('parses a number with its digit-reversed reading', () => {
    expect(parseNumberWithReverse('١٢')).toEqual({ value: 12, reversed: 21 });
    expect(parseNumberWithReverse('5')).toEqual({ value: 5 });
    expect(parseNumberWithReverse('abc')).toBeNull();
  });
});

describe('formatCitation', () => {
  it('formats law name and article number', () => {
    expect(formatCitation('قانون العقوبات', 318)).toBe('قانون العقوبات - مادة ٣١٨');
  });

  it('adds the page when known', () => {
    expect(formatCitation('قانون العقوبات', 318, 4)).toBe('قانون العقوبات - مادة ٣١٨ (صفحة ٤)');
  });
});

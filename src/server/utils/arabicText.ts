/**
 * Arabic text utilities
 *
 * Normalization and numeral conversion for Arabic statute text and questions.
 */

const DIACRITICS = /[\u064B-\u065F\u0670]/g;
const TATWEEL = /\u0640/g;
const ALEF_VARIANTS = /[أإآٱ]/g;
const TEH_MARBUTA = /ة/g;
const ALEF_MAKSURA = /ى/g;
const WHITESPACE = /\s+/g;

const ARABIC_INDIC_ZERO = 0x0660;
const EXTENDED_ARABIC_INDIC_ZERO = 0x06f0;

export interface NormalizeOptions {
  removeDiacritics?: boolean;
  removeTatweel?: boolean;
  normalizeAlef?: boolean;
  /** ة → ه. Off by default: the distinction matters in legal wording. */
  normalizeTeh?: boolean;
  /** ى → ي. Off by default for the same reason. */
  normalizeYeh?: boolean;
  normalizeWhitespace?: boolean;
}

const DEFAULT_NORMALIZE_OPTIONS: Required<NormalizeOptions> = {
  removeDiacritics: true,
  removeTatweel: true,
  normalizeAlef: true,
  normalizeTeh: false,
  normalizeYeh: false,
  normalizeWhitespace: true,
};

/**
 * Normalize Arabic text. With the defaults this is the query normalization:
 * diacritics and tatweel removed, alef variants folded to bare alef,
 * whitespace collapsed, teh marbuta and alef maksura kept.
 */
export function normalizeArabic(text: string, options: NormalizeOptions = {}): string {
  if (!text) {
    return '';
  }
  const opts = { ...DEFAULT_NORMALIZE_OPTIONS, ...options };

  let result = text;
  if (opts.removeDiacritics) {
    result = result.replace(DIACRITICS, '');
  }
  if (opts.removeTatweel) {
    result = result.replace(TATWEEL, '');
  }
  if (opts.normalizeAlef) {
    result = result.replace(ALEF_VARIANTS, 'ا');
  }
  if (opts.normalizeTeh) {
    result = result.replace(TEH_MARBUTA, 'ه');
  }
  if (opts.normalizeYeh) {
    result = result.replace(ALEF_MAKSURA, 'ي');
  }
  if (opts.normalizeWhitespace) {
    result = result.replace(WHITESPACE, ' ').trim();
  }
  return result;
}

/**
 * Aggressive normalization used for term matching (sparse encoding)
 */
export function normalizeForSearch(text: string): string {
  return normalizeArabic(text, { normalizeTeh: true, normalizeYeh: true });
}

/**
 * Convert Arabic-Indic (and extended Arabic-Indic) digits to ASCII digits
 */
export function toWesternDigits(text: string): string {
  return text.replace(/[٠-٩۰-۹]/g, (digit) => {
    const code = digit.charCodeAt(0);
    const zero = code >= EXTENDED_ARABIC_INDIC_ZERO ? EXTENDED_ARABIC_INDIC_ZERO : ARABIC_INDIC_ZERO;
    return String(code - zero);
  });
}

/**
 * Convert ASCII digits to Arabic-Indic digits
 */
export function toArabicIndicDigits(value: number | string): string {
  return String(value).replace(/[0-9]/g, (digit) => String.fromCharCode(ARABIC_INDIC_ZERO + Number(digit)));
}

/**
 * Parse a run of digits in either script.
 * Returns the literal value and, for multi-digit runs, the digit-reversed value
 * (right-to-left PDF extraction can flip numbers, e.g. ١٢ comes out as ٢١).
 */
export function parseNumberWithReverse(digits: string): { value: number; reversed?: number } | null {
  const western = toWesternDigits(digits);
  const match = /[0-9]+/.exec(western);
  if (!match) {
    return null;
  }
  const literal = match[0];
  const value = parseInt(literal, 10);
  if (literal.length > 1) {
    const reversed = parseInt(literal.split('').reverse().join(''), 10);
    return { value, reversed };
  }
  return { value };
}

/**
 * Format a citation such as `قانون العقوبات - مادة ٣١٨`
 */
export function formatCitation(lawName: string, articleNumber: number, pageNumber?: number): string {
  let citation = `${lawName} - مادة ${toArabicIndicDigits(articleNumber)}`;
  if (pageNumber) {
    citation += ` (صفحة ${toArabicIndicDigits(pageNumber)})`;
  }
  return citation;
}

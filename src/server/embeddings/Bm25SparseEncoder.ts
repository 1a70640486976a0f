/**
 * BM25 sparse encoder
 *
 * Produces keyword vectors for the sparse half of hybrid search. Each token is
 * hashed to a 32-bit term id (FNV-1a) and weighted with the BM25 term-frequency
 * component. Inverse document frequency is applied by the vector store at query
 * time, so documents and queries are encoded the same way.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import type { SparseEncoder, SparseVector } from '../contracts/capabilities.js';
import { normalizeForSearch, toWesternDigits } from '../utils/arabicText.js';
import { logger } from '../utils/logger.js';

export const BM25_K1 = 1.2;
export const BM25_B = 0.75;
export const BM25_AVG_DOC_LENGTH = 256;

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

// Definite article, optionally preceded by a one-letter conjunction or preposition
const DEFINITE_ARTICLE = /^(?:[وفبك]?ال|لل)/;
const TOKEN_SEPARATOR = /[^\p{L}\p{N}]+/u;

export interface Bm25Options {
  k1?: number;
  b?: number;
  avgDocLength?: number;
  /** Overrides the list in data/arabic-stopwords.json */
  stopwords?: Iterable<string>;
  modelName?: string;
}

/**
 * 32-bit FNV-1a over the UTF-8 bytes of a string
 */
export function fnv1a32(value: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (const byte of Buffer.from(value, 'utf8')) {
    hash ^= byte;
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash >>> 0;
}

/**
 * Strip the definite article when enough of the word remains
 */
export function stripDefiniteArticle(token: string): string {
  const match = DEFINITE_ARTICLE.exec(token);
  if (!match) {
    return token;
  }
  const rest = token.slice(match[0].length);
  return rest.length >= 2 ? rest : token;
}

export function loadStopwords(filePath = join(process.cwd(), 'data', 'arabic-stopwords.json')): Set<string> {
  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
    const words =
      typeof parsed === 'object' && parsed !== null && 'words' in parsed && Array.isArray(parsed.words)
        ? parsed.words.filter((word: unknown): word is string => typeof word === 'string')
        : [];
    return new Set(words.map((word) => normalizeForSearch(word)));
  } catch (error) {
    logger.warn({ error, filePath }, 'Could not load stopword list, sparse encoding keeps every token');
    return new Set();
  }
}

export class Bm25SparseEncoder implements SparseEncoder {
  private readonly k1: number;
  private readonly b: number;
  private readonly avgDocLength: number;
  private readonly stopwords: Set<string>;
  private readonly modelName: string;

  constructor(options: Bm25Options = {}) {
    this.k1 = options.k1 ?? BM25_K1;
    this.b = options.b ?? BM25_B;
    this.avgDocLength = options.avgDocLength ?? BM25_AVG_DOC_LENGTH;
    this.stopwords = options.stopwords
      ? new Set([...options.stopwords].map((word) => normalizeForSearch(word)))
      : loadStopwords();
    this.modelName = options.modelName ?? 'bm25-hashed';
  }

  getModelName(): string {
    return this.modelName;
  }

  /**
   * Normalized, stop-word-free tokens in text order
   */
  tokenize(text: string): string[] {
    const normalized = toWesternDigits(normalizeForSearch(text)).toLowerCase();
    const tokens: string[] = [];
    for (const raw of normalized.split(TOKEN_SEPARATOR)) {
      if (!raw || this.stopwords.has(raw)) {
        continue;
      }
      const token = stripDefiniteArticle(raw);
      // Single letters carry no meaning; single digits can be article numbers
      if (token.length < 2 && !/^\d$/.test(token)) {
        continue;
      }
      tokens.push(token);
    }
    return tokens;
  }

  async encode(text: string): Promise<SparseVector> {
    return this.encodeSync(text);
  }

  async encodeBatch(texts: string[]): Promise<SparseVector[]> {
    return texts.map((text) => this.encodeSync(text));
  }

  private encodeSync(text: string): SparseVector {
    const tokens = this.tokenize(text);
    if (tokens.length === 0) {
      return { indices: [], values: [] };
    }

    const termFrequencies = new Map<number, number>();
    for (const token of tokens) {
      const id = fnv1a32(token);
      termFrequencies.set(id, (termFrequencies.get(id) ?? 0) + 1);
    }

    const lengthNorm = 1 - this.b + (this.b * tokens.length) / this.avgDocLength;
    const indices = [...termFrequencies.keys()].sort((a, b) => a - b);
    const values = indices.map((id) => {
      const tf = termFrequencies.get(id) ?? 0;
      return (tf * (this.k1 + 1)) / (tf + this.k1 * lengthNorm);
    });

    return { indices, values };
  }
}

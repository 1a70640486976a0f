import { describe, it, expect } from 'vitest';
import {
  Bm25SparseEncoder,
  fnv1a32,
  loadStopwords,
  stripDefiniteArticle,
} from '../../src/server/embeddings/Bm25SparseEncoder.js';

describe('fnv1a32', () => {
  it('matches the reference FNV-1a values', () => {
    expect(fnv1a32('')).toBe(0x811c9dc5);
    expect(fnv1a32('a')).toBe(0xe40c292c);
    expect(fnv1a32('foobar')).toBe(0xbf9cf968);
  });

  it('hashes Arabic text by its UTF-8 bytes', () => {
    expect(fnv1a32('مادة')).toBe(fnv1a32('مادة'));
    expect(fnv1a32('مادة')).not.toBe(fnv1a32('ماده'));
  });
});

describe('stripDefiniteArticle', () => {
  it('strips the article and attached prepositions', () => {
    expect(stripDefiniteArticle('القانون')).toBe('قانون');
    expect(stripDefiniteArticle('والقانون')).toBe('قانون');
    expect(stripDefiniteArticle('بالعقد')).toBe('عقد');
    expect(stripDefiniteArticle('للمحكمه')).toBe('محكمه');
  });

  it('leaves words without an article or too short a stem alone', () => {
    expect(stripDefiniteArticle('كتاب')).toBe('كتاب');
    expect(stripDefiniteArticle('الم')).toBe('الم');
  });
});

describe('Bm25SparseEncoder', () => {
  const encoder = new Bm25SparseEncoder({ stopwords: ['في', 'ما', 'هي'] });

  it('normalizes, drops stopwords and strips the definite article', () => {
    expect(encoder.tokenize('ما هي عقوبة السرقة في المادة ٣١٨؟')).toEqual(['عقوبه', 'سرقه', 'ماده', '318']);
  });

  it('keeps single digits but drops single letters', () => {
    const bare = new Bm25SparseEncoder({ stopwords: [] });
    expect(bare.tokenize('مادة 5 و x')).toEqual(['ماده', '5']);
  });

  it('weights repeated terms with BM25 saturation', async () => {
    const bare = new Bm25SparseEncoder({ stopwords: [], avgDocLength: 3 });
    const vector = await bare.encode('سرقة سرقة عقوبة');

    const theft = fnv1a32('سرقه');
    const penalty = fnv1a32('عقوبه');
    expect(vector.indices).toEqual([theft, penalty].sort((a, b) => a - b));
    // Document length equals the average, so the length norm is 1
    expect(vector.values[vector.indices.indexOf(theft)]).toBeCloseTo(1.375, 10);
    expect(vector.values[vector.indices.indexOf(penalty)]).toBeCloseTo(1, 10);
  });

  it('encodes a document and its query with the same term ids', async () => {
    const [doc, query] = await encoder.encodeBatch(['يعاقب على السرقة بالحبس', 'عقوبة السرقة']);
    const shared = doc.indices.filter((index) => query.indices.includes(index));
    expect(shared).toEqual([fnv1a32('سرقه')]);
  });

  it('returns an empty vector when nothing survives tokenization', async () => {
    expect(await encoder.encode('ما هي؟')).toEqual({ indices: [], values: [] });
    expect(await encoder.encode('')).toEqual({ indices: [], values: [] });
  });

  it('reports its model name', () => {
    expect(encoder.getModelName()).toBe('bm25-hashed');
    expect(new Bm25SparseEncoder({ stopwords: [], modelName: 'custom' }).getModelName()).toBe('custom');
  });
});

describe('loadStopwords', () => {
  it('reads the bundled list and normalizes it', () => {
    const stopwords = loadStopwords();
    expect(stopwords.has('في')).toBe(true);
    expect(stopwords.has('الي')).toBe(true);
  });

  it('falls back to an empty set when the file is missing', () => {
    expect(loadStopwords('/nonexistent/stopwords.json').size).toBe(0);
  });
});

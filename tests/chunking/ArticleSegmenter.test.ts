import { describe, it, expect } from 'vitest';
import { ArticleSegmenter, PREAMBLE_MARKER } from '../../src/server/chunking/ArticleSegmenter.js';
import type { ArticleMatch } from '../../src/server/pipelines/ingestion/types.js';

function candidate(articleNumber: number, startOffset: number): ArticleMatch {
  return { articleNumber, markerText: `مادة ${articleNumber}`, startOffset, endOffset: startOffset + 6 };
}

describe('ArticleSegmenter', () => {
  const segmenter = new ArticleSegmenter();

  it('splits text at sequential article headers', () => {
    const articles = segmenter.segment([
      {
        pageNumber: 1,
        text: 'قانون تجريبي\nمادة ١\nنص المادة الأولى.\nمادة ٢\nنص المادة الثانية.\nمادة ٣\nنص المادة الثالثة.',
      },
    ]);

    expect(articles.map((a) => a.articleNumber)).toEqual([1, 2, 3]);
    expect(articles[0].content).toBe('مادة ١\nنص المادة الأولى.');
    expect(articles[0].markerText).toBe('مادة ١');
    expect(articles[2].content).toBe('مادة ٣\nنص المادة الثالثة.');
  });

  it('ignores inline references to other articles', () => {
    const articles = segmenter.segment([
      {
        pageNumber: 1,
        text: 'مادة ١\nيعاقب وفقاً للمادة ١٠ من هذا القانون.\nمادة ٢\nنص ثان.',
      },
    ]);

    expect(articles.map((a) => a.articleNumber)).toEqual([1, 2]);
    expect(articles[0].content).toBe('مادة ١\nيعاقب وفقاً للمادة ١٠ من هذا القانون.');
  });

  it('keeps the sequence when an inline reference sits inside a later article', () => {
    const articles = segmenter.segment([
      {
        pageNumber: 1,
        text: 'مادة ١\nنص أول.\nمادة ٢\nيعاقب وفقاً للمادة ١٠ من هذا القانون.\nمادة ٣\nنص ثالث.',
      },
    ]);

    expect(articles.map((a) => a.articleNumber)).toEqual([1, 2, 3]);
    expect(articles[1].content).toBe('مادة ٢\nيعاقب وفقاً للمادة ١٠ من هذا القانون.');
    expect(articles[2].content).toBe('مادة ٣\nنص ثالث.');
  });

  it('recovers article numbers reversed by right-to-left extraction', () => {
    const articles = segmenter.segment([
      { pageNumber: 1, text: 'مادة ١١\nنص.\nمادة ٢١\nنص.\nمادة ١٣\nنص.' },
    ]);

    expect(articles.map((a) => a.articleNumber)).toEqual([11, 12, 13]);
    expect(articles[1].markerText).toBe('مادة ٢١');
  });

  it('recognises bracketed and dashed header variants', () => {
    const numbers = segmenter
      .findCandidates('المادة (١)\nنص.\nمادة – ٢\nنص.\nالمادة [3]\nنص.')
      .map((c) => c.articleNumber);

    expect(numbers).toEqual([1, 2, 3]);
  });

  it('assigns each article the page its header starts on', () => {
    const articles = segmenter.segment([
      { pageNumber: 1, text: 'مادة ١\nنص أول' },
      { pageNumber: 2, text: 'مادة ٢\nنص ثان' },
    ]);

    expect(articles.map((a) => a.pageNumber)).toEqual([1, 2]);
  });

  it('keeps a long preamble as article 0', () => {
    const short = new ArticleSegmenter({ minPreambleLength: 10 });
    const articles = short.segment([{ pageNumber: 1, text: 'تمهيد طويل للقانون\nمادة ١\nنص.\nمادة ٢\nنص.' }]);

    expect(articles.map((a) => a.articleNumber)).toEqual([0, 1, 2]);
    expect(articles[0]).toMatchObject({ markerText: PREAMBLE_MARKER, content: 'تمهيد طويل للقانون', pageNumber: 1 });
  });

  it('drops a preamble that is not longer than the minimum', () => {
    const articles = segmenter.segment([{ pageNumber: 1, text: 'عنوان\nمادة ١\nنص.' }]);
    expect(articles.map((a) => a.articleNumber)).toEqual([1]);
  });

  it('folds the preamble into an explicit article 0', () => {
    const short = new ArticleSegmenter({ minPreambleLength: 10 });
    const articles = short.segment([{ pageNumber: 1, text: 'تمهيد طويل للقانون\nمادة ٠\nنص صفر\nمادة ١\nنص واحد' }]);

    expect(articles.map((a) => a.articleNumber)).toEqual([0, 1]);
    expect(articles[0].content).toBe('تمهيد طويل للقانون\nمادة ٠\nنص صفر');
  });

  it('returns the whole text as article 0 when no header is found', () => {
    const articles = segmenter.segment([{ pageNumber: 3, text: 'نص بلا مواد' }]);
    expect(articles).toEqual([
      { articleNumber: 0, markerText: PREAMBLE_MARKER, content: 'نص بلا مواد', pageNumber: 1, chapter: undefined },
    ]);
  });

  it('returns nothing for empty text', () => {
    expect(segmenter.segment([])).toEqual([]);
  });

  it('labels articles with the chapter heading they contain', () => {
    const articles = segmenter.segment([{ pageNumber: 1, text: 'مادة ١\nالباب الأول\nأحكام عامة\nمادة ٢\nنص.' }]);
    expect(articles[0].chapter).toBe('الباب الأول');
    expect(articles[1].chapter).toBeUndefined();
  });

  describe('selectSequentialHeaders', () => {
    it('accepts gaps of up to three', () => {
      const selected = segmenter.selectSequentialHeaders([candidate(1, 0), candidate(4, 10), candidate(9, 20)]);
      expect(selected.map((c) => c.articleNumber)).toEqual([1, 4]);
    });

    it('accepts at most one candidate per offset', () => {
      const selected = segmenter.selectSequentialHeaders([candidate(1, 0), candidate(2, 10), candidate(3, 10)]);
      expect(selected.map((c) => c.articleNumber)).toEqual([1, 2]);
    });

    it('seeds a run at the smallest number for excerpts that do not start at 1', () => {
      const selected = segmenter.selectSequentialHeaders([candidate(50, 0), candidate(51, 10), candidate(52, 20)]);
      expect(selected.map((c) => c.articleNumber)).toEqual([50, 51, 52]);
    });

    it('returns an empty list for no candidates', () => {
      expect(segmenter.selectSequentialHeaders([])).toEqual([]);
    });
  });
});

/**
 * ArticleSegmenter - splits statute text into articles
 *
 * Article headers (`مادة ٥`, `المادة (١٢)`, `مادة – ٦`, ...) are told apart from
 * inline references (`وفقاً للمادة ١٠`) by keeping only the longest run of
 * candidates whose numbers follow the article sequence.
 */

import type { ArticleMatch, PageContent, RawArticle } from '../pipelines/ingestion/types.js';
import { parseNumberWithReverse } from '../utils/arabicText.js';

export const PREAMBLE_MARKER = 'مقدمة';

const KEYWORD = '(?:مادة|المادة|ﻣﺎدة|اﻟﻤﺎدة)';
const NUMBER = '(?:\\[\\s*|\\(\\s*)?([٠-٩0-9]+)(?:\\s*\\]|\\s*\\))?';

/** Header with trailing punctuation or a line break after the number */
const HEADER_PATTERN = new RegExp(`${KEYWORD}[\\s\\n]*[-–—]?[\\s\\n]*${NUMBER}[\\s\\n]*[-–—:\\n]?`, 'g');

/** Same header without the trailing requirement */
const FALLBACK_PATTERN = new RegExp(`${KEYWORD}[\\s\\n]*[-–—]?[\\s\\n]*${NUMBER}`, 'g');

const ORDINALS = 'الأول|الثاني|الثالث|الرابع|الخامس|السادس|السابع|الثامن|التاسع|العاشر';
const CHAPTER_PATTERNS = [
  new RegExp(`الباب\\s*(?:${ORDINALS}|[٠-٩0-9]+)`),
  new RegExp(`الفصل\\s*(?:${ORDINALS}|[٠-٩0-9]+)`),
];
const CHAPTER_SEARCH_WINDOW = 500;

/** Numbers may skip ahead by this much (repealed or "bis" articles) */
const MAX_SEQUENCE_GAP = 3;

export interface ArticleSegmenterConfig {
  /** Text before the first header becomes a preamble only when longer than this */
  minPreambleLength?: number;
}

interface PageOffset {
  offset: number;
  pageNumber: number;
}

export class ArticleSegmenter {
  private readonly minPreambleLength: number;

  constructor(config: ArticleSegmenterConfig = {}) {
    this.minPreambleLength = config.minPreambleLength ?? 100;
  }

  segment(pages: PageContent[]): RawArticle[] {
    const { text, offsets } = this.combinePages(pages);
    const headers = this.selectSequentialHeaders(this.findCandidates(text));
    return this.splitAtHeaders(text, headers, offsets);
  }

  /**
   * All header candidates in offset order. Both header patterns are scanned and
   * the one producing more candidates wins. A multi-digit number also yields its
   * digit-reversed value at the same offset, after the literal one.
   */
  findCandidates(text: string): ArticleMatch[] {
    const strict = this.matchPattern(text, HEADER_PATTERN);
    const fallback = this.matchPattern(text, FALLBACK_PATTERN);
    return fallback.length > strict.length ? fallback : strict;
  }

  /**
   * Keep the longest run of candidates that follows the article sequence.
   * Runs are seeded at 1 and at the smallest observed number; on a tie the run
   * seeded at 1 is kept. At most one candidate is accepted per offset.
   */
  selectSequentialHeaders(candidates: ArticleMatch[]): ArticleMatch[] {
    if (candidates.length === 0) {
      return [];
    }

    const minNumber = Math.min(...candidates.map((c) => c.articleNumber));
    const seeds = [1];
    if (minNumber !== 1 && minNumber > 0) {
      seeds.push(minNumber);
    }

    let best: ArticleMatch[] = [];
    for (const seed of seeds) {
      const run = this.buildRun(candidates, seed);
      if (run.length > best.length) {
        best = run;
      }
    }
    return best;
  }

  private buildRun(candidates: ArticleMatch[], seed: number): ArticleMatch[] {
    const run: ArticleMatch[] = [];
    let expected = seed;
    let lastOffset = -1;

    for (const candidate of candidates) {
      if (candidate.startOffset === lastOffset) {
        continue;
      }
      const n = candidate.articleNumber;
      const inRange = n >= expected && n <= expected + MAX_SEQUENCE_GAP;
      // A first header one below the seed (article 0, or a repeated number) still opens the run
      const opensBelowSeed = n === expected - 1 && run.length === 0;
      if (inRange || opensBelowSeed) {
        run.push(candidate);
        expected = n + 1;
        lastOffset = candidate.startOffset;
      }
    }
    return run;
  }

  private matchPattern(text: string, pattern: RegExp): ArticleMatch[] {
    const matches: ArticleMatch[] = [];
    for (const match of text.matchAll(pattern)) {
      const digits = match[1];
      const startOffset = match.index;
      if (digits === undefined || startOffset === undefined) {
        continue;
      }
      const parsed = parseNumberWithReverse(digits);
      if (!parsed) {
        continue;
      }
      const markerText = match[0].trim();
      const endOffset = startOffset + match[0].length;
      matches.push({ articleNumber: parsed.value, markerText, startOffset, endOffset });
      if (parsed.reversed !== undefined && parsed.reversed !== parsed.value) {
        matches.push({ articleNumber: parsed.reversed, markerText, startOffset, endOffset });
      }
    }
    // matchAll yields in offset order and the sort is stable, so literal stays before reversed
    return matches.sort((a, b) => a.startOffset - b.startOffset);
  }

  private splitAtHeaders(text: string, headers: ArticleMatch[], offsets: PageOffset[]): RawArticle[] {
    const articles: RawArticle[] = [];

    if (headers.length === 0) {
      const content = text.trim();
      if (content) {
        articles.push({
          articleNumber: 0,
          markerText: PREAMBLE_MARKER,
          content,
          pageNumber: 1,
          chapter: this.findChapter(content),
        });
      }
      return articles;
    }

    const preamble = text.slice(0, headers[0].startOffset).trim();
    const firstIsArticleZero = headers[0].articleNumber === 0;
    if (preamble.length > this.minPreambleLength && !firstIsArticleZero) {
      articles.push({
        articleNumber: 0,
        markerText: PREAMBLE_MARKER,
        content: preamble,
        pageNumber: this.pageAt(0, offsets),
        chapter: this.findChapter(preamble),
      });
    }

    headers.forEach((header, index) => {
      const next = headers[index + 1];
      const end = next ? next.startOffset : text.length;
      // An explicit article 0 absorbs the preamble so article numbers stay unique
      const start = index === 0 && firstIsArticleZero && preamble.length > this.minPreambleLength ? 0 : header.startOffset;
      const content = text.slice(start, end).trim();
      articles.push({
        articleNumber: header.articleNumber,
        markerText: header.markerText,
        content,
        pageNumber: this.pageAt(header.startOffset, offsets),
        chapter: this.findChapter(content),
      });
    });

    return articles;
  }

  private combinePages(pages: PageContent[]): { text: string; offsets: PageOffset[] } {
    const offsets: PageOffset[] = [];
    let position = 0;
    for (const page of pages) {
      offsets.push({ offset: position, pageNumber: page.pageNumber });
      position += page.text.length + 1; // joined with '\n'
    }
    return { text: pages.map((p) => p.text).join('\n'), offsets };
  }

  private pageAt(position: number, offsets: PageOffset[]): number {
    for (let i = offsets.length - 1; i >= 0; i--) {
      if (offsets[i].offset <= position) {
        return offsets[i].pageNumber;
      }
    }
    return 1;
  }

  private findChapter(text: string): string | undefined {
    const window = text.slice(0, CHAPTER_SEARCH_WINDOW);
    for (const pattern of CHAPTER_PATTERNS) {
      const match = pattern.exec(window);
      if (match) {
        return match[0];
      }
    }
    return undefined;
  }
}

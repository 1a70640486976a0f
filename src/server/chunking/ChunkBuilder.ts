/**
 * ChunkBuilder - turns articles into storable chunks
 *
 * An article within the token budget becomes one chunk. A longer article is
 * packed greedily by paragraph into parts; parts after the first are prefixed
 * with a marker naming the article and the part.
 */

import type { ArticleMetadata, DocumentChunk, RawArticle } from '../pipelines/ingestion/types.js';
import { generateChunkId } from '../utils/chunkIds.js';
import { toArabicIndicDigits } from '../utils/arabicText.js';

export interface ChunkBuilderConfig {
  maxChunkTokens?: number;
  /** Characters per token used to estimate token counts for Arabic text */
  charsPerToken?: number;
}

const PARAGRAPH_SEPARATOR = '\n\n';

export function partMarker(articleNumber: number, part: number, totalParts: number): string {
  return `[مادة ${articleNumber} - جزء ${toArabicIndicDigits(part)} من ${toArabicIndicDigits(totalParts)}]\n\n`;
}

export class ChunkBuilder {
  private readonly maxChunkTokens: number;
  private readonly charsPerToken: number;

  constructor(config: ChunkBuilderConfig = {}) {
    this.maxChunkTokens = config.maxChunkTokens ?? 1000;
    this.charsPerToken = config.charsPerToken ?? 1.5;
  }

  estimateTokens(text: string): number {
    return text.length / this.charsPerToken;
  }

  build(articles: RawArticle[], metadata: ArticleMetadata): DocumentChunk[] {
    return this.mergeByArticleNumber(articles).flatMap((article) => this.buildArticle(article, metadata));
  }

  /**
   * Split content into parts no larger than the budget, except that a single
   * paragraph over budget is kept whole.
   */
  splitContent(content: string): string[] {
    if (this.estimateTokens(content) <= this.maxChunkTokens) {
      return [content];
    }

    const parts: string[] = [];
    let current = '';
    for (const paragraph of content.split(PARAGRAPH_SEPARATOR)) {
      const candidate = current ? current + PARAGRAPH_SEPARATOR + paragraph : paragraph;
      if (this.estimateTokens(candidate) > this.maxChunkTokens && current) {
        parts.push(current);
        current = paragraph;
      } else {
        current = candidate;
      }
    }
    if (current) {
      parts.push(current);
    }
    return parts;
  }

  private buildArticle(article: RawArticle, metadata: ArticleMetadata): DocumentChunk[] {
    const parts = this.splitContent(article.content);
    const totalParts = parts.length;

    return parts.map((text, index) => {
      const part = index + 1;
      return {
        chunkId: generateChunkId(metadata.country, metadata.lawType, article.articleNumber, part),
        content: part > 1 ? partMarker(article.articleNumber, part, totalParts) + text : text,
        articleNumber: article.articleNumber,
        markerText: article.markerText ?? `مادة ${toArabicIndicDigits(article.articleNumber)}`,
        pageNumber: article.pageNumber,
        country: metadata.country,
        lawType: metadata.lawType,
        lawName: metadata.lawName,
        lawNameEn: metadata.lawNameEn,
        lawNumber: metadata.lawNumber,
        lawYear: metadata.lawYear,
        sourceFile: metadata.sourceFile,
        chapter: article.chapter,
        chunkPart: part,
        totalParts,
      };
    });
  }

  /**
   * Articles sharing a number (a repeated header in the source) are joined so
   * that chunk IDs stay unique. The first occurrence keeps its page, marker and chapter.
   */
  private mergeByArticleNumber(articles: RawArticle[]): RawArticle[] {
    const merged = new Map<number, RawArticle>();
    for (const article of articles) {
      const existing = merged.get(article.articleNumber);
      if (existing) {
        merged.set(article.articleNumber, {
          ...existing,
          content: existing.content + PARAGRAPH_SEPARATOR + article.content,
        });
      } else {
        merged.set(article.articleNumber, article);
      }
    }
    return [...merged.values()];
  }
}

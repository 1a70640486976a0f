import { describe, it, expect } from 'vitest';
import { ChunkBuilder, partMarker } from '../../src/server/chunking/ChunkBuilder.js';
import { generateChunkId } from '../../src/server/utils/chunkIds.js';
import type { ArticleMetadata, RawArticle } from '../../src/server/pipelines/ingestion/types.js';

const metadata: ArticleMetadata = {
  country: 'egypt',
  lawType: 'criminal',
  lawName: 'قانون العقوبات',
  lawYear: 1937,
  sourceFile: 'penal.pdf',
};

function article(articleNumber: number, content: string, pageNumber = 1): RawArticle {
  return { articleNumber, content, pageNumber, markerText: `مادة ${articleNumber}` };
}

describe('ChunkBuilder', () => {
  // One character per token and a ten-token budget keep the arithmetic visible
  const builder = new ChunkBuilder({ maxChunkTokens: 10, charsPerToken: 1 });

  it('keeps an article within budget as a single chunk', () => {
    const chunks = builder.build([article(1, 'short text')], metadata);

    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toMatchObject({
      content: 'short text',
      articleNumber: 1,
      chunkPart: 1,
      totalParts: 1,
      country: 'egypt',
      lawType: 'criminal',
      lawName: 'قانون العقوبات',
      lawYear: 1937,
      sourceFile: 'penal.pdf',
    });
    expect(chunks[0].chunkId).toBe(generateChunkId('egypt', 'criminal', 1, 1));
  });

  it('packs paragraphs greedily and marks every part after the first', () => {
    const chunks = builder.build([article(5, 'aaaaaa\n\nbbbbbb\n\ncccccc')], metadata);

    expect(chunks.map((c) => c.chunkPart)).toEqual([1, 2, 3]);
    expect(chunks.every((c) => c.totalParts === 3)).toBe(true);
    expect(chunks[0].content).toBe('aaaaaa');
    expect(chunks[1].content).toBe('[مادة 5 - جزء ٢ من ٣]\n\nbbbbbb');
    expect(chunks[2].content).toBe(partMarker(5, 3, 3) + 'cccccc');
  });

  it('groups short paragraphs while they fit', () => {
    expect(builder.splitContent('aaa\n\nbbb\n\ncccccccccc')).toEqual(['aaa\n\nbbb', 'cccccccccc']);
  });

  it('keeps a single oversized paragraph whole', () => {
    const long = 'x'.repeat(30);
    expect(builder.splitContent(long)).toEqual([long]);
  });

  it('gives every chunk a distinct deterministic id', () => {
    const chunks = builder.build(
      [article(1, 'aaaaaa\n\nbbbbbb'), article(2, 'one'), article(3, 'two')],
      metadata
    );
    const ids = chunks.map((c) => c.chunkId);

    expect(new Set(ids).size).toBe(ids.length);
    expect(builder.build([article(2, 'different text')], metadata)[0].chunkId).toBe(ids[2]);
  });

  it('merges articles that share a number', () => {
    const chunks = builder.build([article(7, 'one', 2), article(7, 'two', 3)], {
      ...metadata,
      lawType: 'civil',
    });

    expect(chunks).toHaveLength(1);
    expect(chunks[0].content).toBe('one\n\ntwo');
    expect(chunks[0].pageNumber).toBe(2);
  });

  it('derives a marker when the article has none', () => {
    const [chunk] = builder.build([{ articleNumber: 12, content: 'text', pageNumber: 1 }], metadata);
    expect(chunk.markerText).toBe('مادة ١٢');
  });

  it('estimates tokens from the character ratio', () => {
    expect(new ChunkBuilder({ charsPerToken: 1.5 }).estimateTokens('abcdef')).toBe(4);
  });
});

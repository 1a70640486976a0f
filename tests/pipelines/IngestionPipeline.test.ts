import { describe, it, expect, beforeEach } from 'vitest';
import { IngestionPipeline, type IngestionMetadata } from '../../src/server/pipelines/ingestion/IngestionPipeline.js';
import { cleanText } from '../../src/server/pipelines/ingestion/steps/index.js';
import { ArticleSegmenter } from '../../src/server/chunking/ArticleSegmenter.js';
import { ChunkBuilder, partMarker } from '../../src/server/chunking/ChunkBuilder.js';
import { CollectionFactory } from '../../src/server/services/collections/CollectionFactory.js';
import {
  FakeDenseEncoder,
  FakeSparseEncoder,
  FakeTextSource,
  InMemoryVectorStore,
  fakePdf,
} from '../helpers/fakes.js';
import { SAMPLE_PAGES } from '../helpers/fixtures.js';

const metadata: IngestionMetadata = {
  country: 'egypt',
  lawType: 'criminal',
  lawName: 'قانون تجريبي',
  sourceFile: 'sample.pdf',
};

function createPipeline(store: InMemoryVectorStore, source: FakeTextSource, stopOnError = true): IngestionPipeline {
  const denseEncoder = new FakeDenseEncoder();
  return new IngestionPipeline(
    {
      textSource: source,
      denseEncoder,
      sparseEncoder: new FakeSparseEncoder(),
      vectorStore: store,
      collections: new CollectionFactory(store, denseEncoder.getDims()),
      segmenter: new ArticleSegmenter(),
      // Article 2 is 74 characters and its paragraphs 39 and 33, so only it splits
      chunkBuilder: new ChunkBuilder({ maxChunkTokens: 50, charsPerToken: 1 }),
    },
    stopOnError
  );
}

describe('IngestionPipeline', () => {
  let store: InMemoryVectorStore;
  let source: FakeTextSource;

  beforeEach(() => {
    store = new InMemoryVectorStore();
    source = new FakeTextSource(SAMPLE_PAGES);
  });

  it('turns three articles into four stored chunks', async () => {
    const result = await createPipeline(store, source).ingest(fakePdf(), metadata);

    expect(result).toMatchObject({
      success: true,
      collection: 'laws_egypt',
      articlesFound: 3,
      chunksCreated: 4,
      pagesProcessed: 2,
      errors: [],
    });

    const points = [...(store.collections.get('laws_egypt')?.points.values() ?? [])];
    expect(points).toHaveLength(4);
    const parts = points
      .map((p) => [p.payload.article_number, p.payload.chunk_part, p.payload.total_parts])
      .sort((a, b) => a[0] - b[0] || a[1] - b[1]);
    expect(parts).toEqual([
      [1, 1, 1],
      [2, 1, 2],
      [2, 2, 2],
      [3, 1, 1],
    ]);
  });

  it('marks only the second and later parts of a split article', async () => {
    await createPipeline(store, source).ingest(fakePdf(), metadata);
    const points = [...(store.collections.get('laws_egypt')?.points.values() ?? [])];

    const marked = points.filter((p) => p.payload.content.startsWith('[مادة'));
    expect(marked).toHaveLength(1);
    expect(marked[0].payload.content).toBe(partMarker(2, 2, 2) + 'الفقرة الثانية من المادة الثانية.');
    expect(marked[0].payload).toMatchObject({ page_number: 2, law_name: 'قانون تجريبي', source_file: 'sample.pdf' });
  });

  it('overwrites earlier points when the same law is ingested again', async () => {
    const pipeline = createPipeline(store, source);
    await pipeline.ingest(fakePdf(), metadata);
    await pipeline.ingest(fakePdf(), metadata);

    expect(store.collections.get('laws_egypt')?.points.size).toBe(4);
  });

  it('reports a failing step and stores nothing', async () => {
    source.extractPages = async () => {
      throw new Error('corrupt file');
    };

    const result = await createPipeline(store, source).ingest(fakePdf(), metadata);

    expect(result.success).toBe(false);
    expect(result.errors).toEqual(['PDF Loader: corrupt file']);
    expect(result.chunksCreated).toBe(0);
    expect(store.collections.get('laws_egypt')?.points.size).toBe(0);
  });

  it('rejects input too small to be a PDF', async () => {
    const result = await createPipeline(store, source).ingest(Buffer.alloc(10), metadata);
    expect(result.errors).toEqual(['PDF Loader: Invalid input for step: PDF Loader']);
  });

  it('succeeds with nothing stored for a document without text', async () => {
    source.pages = [{ pageNumber: 1, text: '   \n  ' }];
    const result = await createPipeline(store, source).ingest(fakePdf(), metadata);

    expect(result).toMatchObject({ success: true, articlesFound: 0, chunksCreated: 0, pagesProcessed: 0 });
  });
});

describe('cleanText', () => {
  it('trims lines and keeps one blank line between paragraphs', () => {
    expect(cleanText('\n  أول  \n\n\n  ثان\n \n')).toBe('أول\n\nثان');
  });
});

/**
 * Ingestion Pipeline
 *
 * PDF bytes → page text → articles → chunks → dense vectors → sparse vectors → vector store.
 */

import { Pipeline, type PipelineContext, type PipelineResult } from '../PipelineEngine.js';
import type { DenseEncoder, PdfTextSource, SparseEncoder, VectorStore } from '../../contracts/capabilities.js';
import type { ArticleSegmenter } from '../../chunking/ArticleSegmenter.js';
import type { ChunkBuilder } from '../../chunking/ChunkBuilder.js';
import type { CollectionFactory } from '../../services/collections/CollectionFactory.js';
import type { SupportedCountry } from '../../config/jurisdictions.js';
import { createChildLogger } from '../../utils/logger.js';
import { readCounter } from './guards.js';
import {
  ArticleSplitterStep,
  DenseEmbedderStep,
  MetadataEnricherStep,
  PdfLoaderStep,
  SparseEncoderStep,
  TextExtractorStep,
  VectorStorerStep,
  type StoreSummary,
} from './steps/index.js';
import type { ArticleMetadata, IngestionResult } from './types.js';

export const INGESTION_PIPELINE_NAME = 'Legal Document Ingestion';

export interface IngestionDependencies {
  textSource: PdfTextSource;
  denseEncoder: DenseEncoder;
  sparseEncoder: SparseEncoder;
  vectorStore: VectorStore;
  collections: CollectionFactory;
  segmenter: ArticleSegmenter;
  chunkBuilder: ChunkBuilder;
}

export type IngestionMetadata = ArticleMetadata & { country: SupportedCountry };

export class IngestionPipeline {
  private readonly logger = createChildLogger({ pipeline: INGESTION_PIPELINE_NAME });

  constructor(
    private readonly deps: IngestionDependencies,
    private readonly stopOnError: boolean = true
  ) {}

  /**
   * Steps are bound to the document's metadata and target collection, so the
   * chain is assembled per document around the shared capability handles.
   */
  build(metadata: ArticleMetadata, collection: string): Pipeline<Buffer, StoreSummary> {
    const { textSource, denseEncoder, sparseEncoder, vectorStore, segmenter, chunkBuilder } = this.deps;
    return Pipeline.create<Buffer>(INGESTION_PIPELINE_NAME)
      .addStep(new PdfLoaderStep(textSource))
      .addStep(new TextExtractorStep())
      .addStep(new ArticleSplitterStep(segmenter))
      .addStep(new MetadataEnricherStep(chunkBuilder, metadata))
      .addStep(new DenseEmbedderStep(denseEncoder))
      .addStep(new SparseEncoderStep(sparseEncoder))
      .addStep(new VectorStorerStep(vectorStore, collection));
  }

  async ingest(pdf: Buffer, metadata: IngestionMetadata): Promise<IngestionResult> {
    const start = performance.now();
    const collection = await this.deps.collections.ensureCountryCollection(metadata.country);

    this.logger.info(
      { sourceFile: metadata.sourceFile, collection, lawName: metadata.lawName },
      'Starting ingestion'
    );

    const context: PipelineContext = { collection, sourceFile: metadata.sourceFile };
    const result: PipelineResult<StoreSummary> = await this.build(metadata, collection).run(
      pdf,
      context,
      this.stopOnError
    );

    const output: IngestionResult = {
      success: result.success,
      collection,
      articlesFound: readCounter(context, 'articlesFound'),
      chunksCreated: readCounter(context, 'chunksCreated'),
      pagesProcessed: readCounter(context, 'pagesWithText'),
      processingTimeMs: Math.round(performance.now() - start),
      errors: result.errors,
    };

    this.logger.info(
      {
        success: output.success,
        articlesFound: output.articlesFound,
        chunksCreated: output.chunksCreated,
        pointsStored: result.data?.pointsStored ?? 0,
        processingTimeMs: output.processingTimeMs,
      },
      'Ingestion finished'
    );
    return output;
  }
}

import { PipelineStep, type PipelineContext } from '../../PipelineEngine.js';
import type { ChunkBuilder } from '../../../chunking/ChunkBuilder.js';
import { isArrayOf, isRawArticle } from '../guards.js';
import type { ArticleMetadata, DocumentChunk, RawArticle } from '../types.js';

/**
 * Step 4: attach law metadata and cut articles into chunks
 */
export class MetadataEnricherStep extends PipelineStep<RawArticle[], DocumentChunk[]> {
  constructor(
    private readonly chunkBuilder: ChunkBuilder,
    private readonly metadata: ArticleMetadata
  ) {
    super('Metadata Enricher');
  }

  validateInput(input: unknown): input is RawArticle[] {
    return isArrayOf(input, isRawArticle);
  }

  process(input: RawArticle[], context: PipelineContext): DocumentChunk[] {
    const chunks = this.chunkBuilder.build(input, this.metadata);
    context.chunksCreated = chunks.length;
    this.logger.info({ chunks: chunks.length, articles: input.length }, 'Created chunks');
    return chunks;
  }

  describeOutput(output: DocumentChunk[]): Record<string, unknown> {
    return { splitArticles: new Set(output.filter((c) => c.totalParts > 1).map((c) => c.articleNumber)).size };
  }
}

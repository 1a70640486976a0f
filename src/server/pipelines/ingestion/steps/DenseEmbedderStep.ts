import { PipelineStep, type PipelineContext } from '../../PipelineEngine.js';
import type { DenseEncoder } from '../../../contracts/capabilities.js';
import { isArrayOf, isDocumentChunk } from '../guards.js';
import type { DenseChunk, DocumentChunk } from '../types.js';

/**
 * Step 5: dense embeddings for every chunk
 */
export class DenseEmbedderStep extends PipelineStep<DocumentChunk[], DenseChunk[]> {
  constructor(private readonly encoder: DenseEncoder) {
    super('Dense Embedder');
  }

  validateInput(input: unknown): input is DocumentChunk[] {
    return isArrayOf(input, isDocumentChunk);
  }

  async process(input: DocumentChunk[], context: PipelineContext): Promise<DenseChunk[]> {
    if (input.length === 0) {
      return [];
    }

    this.logger.info({ chunks: input.length, model: this.encoder.getModelName() }, 'Generating dense embeddings');
    const embeddings = await this.encoder.embedBatch(input.map((chunk) => chunk.content));
    if (embeddings.length !== input.length) {
      throw new Error(`Dense encoder returned ${embeddings.length} vectors for ${input.length} chunks`);
    }

    context.denseEmbeddingsGenerated = embeddings.length;
    this.logger.info({ count: embeddings.length, dims: this.encoder.getDims() }, 'Generated dense embeddings');
    return input.map((chunk, i) => ({ ...chunk, denseVector: embeddings[i] }));
  }
}

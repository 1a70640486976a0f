import { PipelineStep, type PipelineContext } from '../../PipelineEngine.js';
import type { SparseEncoder } from '../../../contracts/capabilities.js';
import { hasDenseVector, isArrayOf, isDocumentChunk } from '../guards.js';
import type { DenseChunk, EncodedChunk } from '../types.js';

function isDenseChunk(value: unknown): value is DenseChunk {
  return isDocumentChunk(value) && hasDenseVector(value);
}

/**
 * Step 6: sparse term vectors for every chunk
 */
export class SparseEncoderStep extends PipelineStep<DenseChunk[], EncodedChunk[]> {
  constructor(private readonly encoder: SparseEncoder) {
    super('Sparse Encoder');
  }

  validateInput(input: unknown): input is DenseChunk[] {
    return isArrayOf(input, isDenseChunk);
  }

  async process(input: DenseChunk[], context: PipelineContext): Promise<EncodedChunk[]> {
    if (input.length === 0) {
      return [];
    }

    const vectors = await this.encoder.encodeBatch(input.map((chunk) => chunk.content));
    if (vectors.length !== input.length) {
      throw new Error(`Sparse encoder returned ${vectors.length} vectors for ${input.length} chunks`);
    }

    const avgTerms = vectors.reduce((sum, v) => sum + v.indices.length, 0) / vectors.length;
    context.sparseVectorsGenerated = vectors.length;
    this.logger.info({ count: vectors.length, avgTerms: Math.round(avgTerms) }, 'Generated sparse vectors');
    return input.map((chunk, i) => ({ ...chunk, sparseVector: vectors[i] }));
  }
}

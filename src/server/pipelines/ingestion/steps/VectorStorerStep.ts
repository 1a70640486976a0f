import { PipelineStep, type PipelineContext } from '../../PipelineEngine.js';
import type { VectorStore } from '../../../contracts/capabilities.js';
import { toVectorPoint } from '../../../vector/payload.js';
import { isArrayOf, isEncodedChunk } from '../guards.js';
import type { EncodedChunk } from '../types.js';

export interface StoreSummary {
  collection: string;
  pointsStored: number;
}

/**
 * Step 7: upsert chunks with both vectors into the country collection.
 * A chunk missing either vector fails validation, so nothing half-encoded is stored.
 */
export class VectorStorerStep extends PipelineStep<EncodedChunk[], StoreSummary> {
  constructor(
    private readonly store: VectorStore,
    private readonly collection: string
  ) {
    super('Vector Storer');
  }

  validateInput(input: unknown): input is EncodedChunk[] {
    if (!isArrayOf(input, isEncodedChunk)) {
      this.logger.warn('Every chunk must carry a dense and a sparse vector before storage');
      return false;
    }
    return true;
  }

  async process(input: EncodedChunk[], context: PipelineContext): Promise<StoreSummary> {
    if (input.length === 0) {
      return { collection: this.collection, pointsStored: 0 };
    }

    this.logger.info({ chunks: input.length, collection: this.collection }, 'Storing chunks');
    const stored = await this.store.upsert(this.collection, input.map(toVectorPoint));
    context.pointsStored = stored;
    this.logger.info({ stored, collection: this.collection }, 'Stored chunks');
    return { collection: this.collection, pointsStored: stored };
  }
}

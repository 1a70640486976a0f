import { PipelineStep } from '../../PipelineEngine.js';
import type { DenseEncoder, SparseEncoder } from '../../../contracts/capabilities.js';
import type { QueryState } from '../types.js';
import { isQueryState } from './guards.js';

/**
 * Stage 2: dense and sparse vectors for the normalized query
 */
export class DualEncoderStage extends PipelineStep<QueryState, QueryState> {
  constructor(
    private readonly denseEncoder: DenseEncoder,
    private readonly sparseEncoder: SparseEncoder
  ) {
    super('Dual Encoder');
  }

  validateInput(input: unknown): input is QueryState {
    return isQueryState(input) && input.normalizedQuery.length > 0;
  }

  async process(state: QueryState): Promise<QueryState> {
    const [denseVector, sparseVector] = await Promise.all([
      this.denseEncoder.embed(state.normalizedQuery),
      this.sparseEncoder.encode(state.normalizedQuery),
    ]);
    this.logger.info({ denseDims: denseVector.length, sparseTerms: sparseVector.indices.length }, 'Encoded query');
    return { ...state, denseVector, sparseVector };
  }
}

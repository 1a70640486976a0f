import { PipelineStep } from '../../PipelineEngine.js';
import type { SearchFilter, VectorStore } from '../../../contracts/capabilities.js';
import { retrievedChunkFromHit } from '../../../vector/payload.js';
import type { QueryInput, QueryState } from '../types.js';
import { isQueryState } from './guards.js';

export function buildSearchFilter(input: QueryInput): SearchFilter {
  const filter: SearchFilter = { country: input.country };
  if (input.lawTypes && input.lawTypes.length > 0) {
    filter.lawTypes = input.lawTypes;
  }
  return filter;
}

/**
 * Stage 3: dense and sparse prefetch in the country collection, fused with RRF
 */
export class HybridRetrieverStage extends PipelineStep<QueryState, QueryState> {
  constructor(
    private readonly store: VectorStore,
    private readonly prefetchLimit: number
  ) {
    super('Hybrid Retriever');
  }

  validateInput(input: unknown): input is QueryState {
    if (!isQueryState(input)) {
      return false;
    }
    if (!input.denseVector || input.denseVector.length === 0 || !input.sparseVector) {
      this.logger.error('Missing dense or sparse query vector');
      return false;
    }
    return true;
  }

  async process(state: QueryState): Promise<QueryState> {
    const { denseVector, sparseVector } = state;
    if (!denseVector || !sparseVector) {
      throw new Error('Query vectors missing');
    }

    this.logger.info({ collection: state.collection, limit: this.prefetchLimit }, 'Hybrid search');
    const hits = await this.store.hybridSearch(state.collection, {
      dense: denseVector,
      sparse: sparseVector,
      limit: this.prefetchLimit,
      filter: buildSearchFilter(state.input),
    });

    const candidates = hits.map(retrievedChunkFromHit);
    this.logger.info({ candidates: candidates.length }, 'Retrieved candidates');
    return { ...state, candidates };
  }
}

import { PipelineStep } from '../../PipelineEngine.js';
import type { RelevanceScorer } from '../../../contracts/capabilities.js';
import type { QueryState, RetrievedChunk } from '../types.js';
import { isQueryState, isRetrievedChunk } from './guards.js';

/**
 * Stage 4: cross-encoder scores against the normalized query, top K kept
 */
export class RerankerStage extends PipelineStep<QueryState, QueryState> {
  constructor(
    private readonly scorer: RelevanceScorer,
    private readonly defaultTopK: number
  ) {
    super('Reranker');
  }

  validateInput(input: unknown): input is QueryState {
    return isQueryState(input) && input.candidates.every((c) => isRetrievedChunk(c));
  }

  async process(state: QueryState): Promise<QueryState> {
    const topK = state.input.topK ?? this.defaultTopK;
    const reranked = await this.rerank(state.normalizedQuery, state.candidates, topK);
    return { ...state, reranked };
  }

  async rerank(query: string, candidates: RetrievedChunk[], topK: number): Promise<RetrievedChunk[]> {
    if (candidates.length === 0) {
      return [];
    }

    this.logger.info({ candidates: candidates.length, topK }, 'Reranking candidates');
    const scores = await this.scorer.scoreBatch(
      query,
      candidates.map((c) => c.content)
    );
    if (scores.length !== candidates.length) {
      throw new Error(`Scorer returned ${scores.length} scores for ${candidates.length} candidates`);
    }

    // Array.prototype.sort is stable, so equal scores keep retrieval order
    const result = candidates
      .map((chunk, i) => ({ ...chunk, rerankScore: scores[i] }))
      .sort((a, b) => b.rerankScore - a.rerankScore)
      .slice(0, topK);

    this.logger.debug(
      { top: result.slice(0, 3).map((c) => ({ article: c.articleNumber, score: c.rerankScore })) },
      'Reranked'
    );
    return result;
  }
}

import { PipelineStep } from '../../PipelineEngine.js';
import type { QueryOutput, QueryState, RetrievedChunk, Source } from '../types.js';
import { isQueryState } from './guards.js';
import { NO_ANSWER_FALLBACK } from './AnswerGeneratorStage.js';

const PREVIEW_LENGTH = 200;

export interface ModelNames {
  embeddingModel: string;
  sparseModel: string;
  rerankerModel: string;
  llmModel: string;
}

export function roundScore(score: number): number {
  return Math.round(score * 10000) / 10000;
}

export function toSource(chunk: RetrievedChunk): Source {
  const preview =
    chunk.content.length > PREVIEW_LENGTH ? chunk.content.slice(0, PREVIEW_LENGTH) + '...' : chunk.content;
  return {
    lawName: chunk.lawName,
    articleNumber: chunk.articleNumber,
    markerText: chunk.markerText,
    pageNumber: chunk.pageNumber,
    relevanceScore: roundScore(chunk.rerankScore ?? chunk.hybridScore),
    contentPreview: preview,
  };
}

/**
 * Stage 6: answer, sources and run metadata
 */
export class ResponseFormatterStage extends PipelineStep<QueryState, QueryOutput> {
  constructor(private readonly models: ModelNames) {
    super('Response Formatter');
  }

  validateInput(input: unknown): input is QueryState {
    return isQueryState(input) && typeof input.answer === 'string';
  }

  process(state: QueryState): QueryOutput {
    const sources = state.reranked.map(toSource);
    this.logger.info({ sources: sources.length }, 'Formatted response');
    return {
      success: true,
      answer: state.answer ?? NO_ANSWER_FALLBACK,
      sources,
      metadata: {
        queryTimeMs: Math.round(performance.now() - state.startedAt),
        chunksRetrieved: state.candidates.length,
        chunksAfterRerank: state.reranked.length,
        stageTimings: { ...state.stageTimings },
        ...this.models,
      },
      errors: [],
    };
  }
}

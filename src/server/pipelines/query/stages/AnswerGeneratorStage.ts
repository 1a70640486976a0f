import { PipelineStep } from '../../PipelineEngine.js';
import type { AnswerGenerator } from '../../../contracts/capabilities.js';
import type { QueryState, RetrievedChunk } from '../types.js';
import { isQueryState } from './guards.js';

export const NO_ANSWER_FALLBACK = 'لم أجد معلومات كافية للإجابة على سؤالك.';

/**
 * `[i] <law name> - مادة <n>:\n<content>`, numbered from 1
 */
export function buildContextBlocks(chunks: RetrievedChunk[]): string[] {
  return chunks.map((chunk, i) => `[${i + 1}] ${chunk.lawName} - مادة ${chunk.articleNumber}:\n${chunk.content}`);
}

/**
 * Stage 5: answer from the reranked chunks. Nothing retrieved means a fixed
 * fallback and no generator call.
 */
export class AnswerGeneratorStage extends PipelineStep<QueryState, QueryState> {
  constructor(private readonly generator: AnswerGenerator) {
    super('Answer Generator');
  }

  validateInput(input: unknown): input is QueryState {
    return isQueryState(input) && Array.isArray(input.reranked);
  }

  async process(state: QueryState): Promise<QueryState> {
    if (state.reranked.length === 0) {
      this.logger.info('No chunks to answer from; returning fallback');
      return { ...state, answer: NO_ANSWER_FALLBACK };
    }

    this.logger.info({ chunks: state.reranked.length }, 'Generating answer');
    const answer = await this.generator.generate(state.rawQuery, buildContextBlocks(state.reranked), {
      history: state.input.history,
    });
    this.logger.info({ answerLength: answer.length }, 'Generated answer');
    return { ...state, answer };
  }
}

import { PipelineStep } from '../../PipelineEngine.js';
import { normalizeArabic } from '../../../utils/arabicText.js';
import type { QueryState } from '../types.js';
import { isQueryState } from './guards.js';

/**
 * Stage 1: normalize the question (diacritics, tatweel, alef forms, whitespace)
 */
export class QueryNormalizerStage extends PipelineStep<QueryState, QueryState> {
  constructor() {
    super('Query Preprocessor');
  }

  validateInput(input: unknown): input is QueryState {
    if (!isQueryState(input) || !input.rawQuery.trim()) {
      this.logger.error('Query cannot be empty');
      return false;
    }
    return true;
  }

  process(state: QueryState): QueryState {
    const normalizedQuery = normalizeArabic(state.rawQuery);
    this.logger.info(
      { original: state.rawQuery.slice(0, 50), normalized: normalizedQuery.slice(0, 50) },
      'Preprocessed query'
    );
    return { ...state, normalizedQuery };
  }
}

export { QueryNormalizerStage } from './QueryNormalizerStage.js';
export { DualEncoderStage } from './DualEncoderStage.js';
export { HybridRetrieverStage, buildSearchFilter } from './HybridRetrieverStage.js';
export { RerankerStage } from './RerankerStage.js';
export { AnswerGeneratorStage, NO_ANSWER_FALLBACK, buildContextBlocks } from './AnswerGeneratorStage.js';
export { ResponseFormatterStage, toSource, roundScore, type ModelNames } from './ResponseFormatterStage.js';

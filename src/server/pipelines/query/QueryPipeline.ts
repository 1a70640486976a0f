/**
 * Query Pipeline
 *
 * question → normalize → dual-encode → hybrid retrieve → rerank → generate → format.
 *
 * Stages are called directly on a typed QueryState rather than through the
 * generic engine: a query is either answered or fails, there is no partial
 * result worth returning. Each stage still validates its input first and is timed.
 */

import type { PipelineStep } from '../PipelineEngine.js';
import type {
  AnswerGenerator,
  DenseEncoder,
  RelevanceScorer,
  SparseEncoder,
  VectorStore,
} from '../../contracts/capabilities.js';
import { collectionNameFor } from '../../services/collections/CollectionFactory.js';
import { PipelineExecutionError, PipelineValidationError, errorMessage } from '../../types/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import {
  AnswerGeneratorStage,
  DualEncoderStage,
  HybridRetrieverStage,
  QueryNormalizerStage,
  RerankerStage,
  ResponseFormatterStage,
} from './stages/index.js';
import type { QueryInput, QueryOutput, QueryState } from './types.js';

export const QUERY_PIPELINE_NAME = 'Legal Query';

export interface QueryDependencies {
  denseEncoder: DenseEncoder;
  sparseEncoder: SparseEncoder;
  vectorStore: VectorStore;
  scorer: RelevanceScorer;
  generator: AnswerGenerator;
}

export interface QueryPipelineConfig {
  prefetchLimit: number;
  rerankTopK: number;
}

export class QueryPipeline {
  private readonly logger = createChildLogger({ pipeline: QUERY_PIPELINE_NAME });
  private readonly normalizer: QueryNormalizerStage;
  private readonly encoder: DualEncoderStage;
  private readonly retriever: HybridRetrieverStage;
  private readonly reranker: RerankerStage;
  private readonly answerer: AnswerGeneratorStage;
  private readonly formatter: ResponseFormatterStage;

  constructor(deps: QueryDependencies, config: QueryPipelineConfig) {
    this.normalizer = new QueryNormalizerStage();
    this.encoder = new DualEncoderStage(deps.denseEncoder, deps.sparseEncoder);
    this.retriever = new HybridRetrieverStage(deps.vectorStore, config.prefetchLimit);
    this.reranker = new RerankerStage(deps.scorer, config.rerankTopK);
    this.answerer = new AnswerGeneratorStage(deps.generator);
    this.formatter = new ResponseFormatterStage({
      embeddingModel: deps.denseEncoder.getModelName(),
      sparseModel: deps.sparseEncoder.getModelName(),
      rerankerModel: deps.scorer.getModelName(),
      llmModel: deps.generator.getModelName(),
    });
  }

  get stageNames(): string[] {
    return [this.normalizer, this.encoder, this.retriever, this.reranker, this.answerer, this.formatter].map(
      (stage) => stage.name
    );
  }

  async run(input: QueryInput): Promise<QueryOutput> {
    const collection = collectionNameFor(input.country);
    this.logger.info({ question: input.question.slice(0, 50), collection }, 'Query pipeline started');

    let state: QueryState = {
      input,
      collection,
      rawQuery: input.question,
      normalizedQuery: '',
      candidates: [],
      reranked: [],
      startedAt: performance.now(),
      stageTimings: {},
    };

    state = await this.runStage(this.normalizer, state);
    state = await this.runStage(this.encoder, state);
    state = await this.runStage(this.retriever, state);
    state = await this.runStage(this.reranker, state);
    state = await this.runStage(this.answerer, state);
    const output = await this.runStage(this.formatter, state);

    output.metadata.stageTimings = { ...state.stageTimings };
    output.metadata.queryTimeMs = Math.round(performance.now() - state.startedAt);

    this.logger.info(
      {
        queryTimeMs: output.metadata.queryTimeMs,
        chunksRetrieved: output.metadata.chunksRetrieved,
        chunksAfterRerank: output.metadata.chunksAfterRerank,
      },
      'Query completed'
    );
    return output;
  }

  /**
   * Validate, process and time one stage. Stage outputs are shallow copies of
   * the state, so they all share one `stageTimings` record. Invalid input raises
   * PipelineValidationError; any other failure is reported as `"<stage>: <message>"`.
   */
  private async runStage<TOut>(stage: PipelineStep<QueryState, TOut>, input: QueryState): Promise<TOut> {
    const start = performance.now();
    if (!stage.validateInput(input)) {
      throw new PipelineValidationError(stage.name, `Invalid input for step: ${stage.name}`);
    }

    try {
      const output = await stage.process(input, {});
      input.stageTimings[stage.name] = Math.round(performance.now() - start);
      return output;
    } catch (error) {
      this.logger.error({ stage: stage.name, error }, 'Query stage failed');
      throw new PipelineExecutionError(QUERY_PIPELINE_NAME, [`${stage.name}: ${errorMessage(error)}`]);
    }
  }
}

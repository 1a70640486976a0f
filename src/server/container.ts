/**
 * Composition root
 *
 * Every capability (models, stores, clients) is constructed exactly once here
 * and handed to the pipelines and services that need it.
 */

import type pg from 'pg';
import type { Redis } from 'ioredis';
import type { Env } from './config/env.js';
import { createPostgresPool } from './config/postgres.js';
import { createRedisClient } from './config/redis.js';
import type {
  AnswerGenerator,
  DenseEncoder,
  PdfTextSource,
  RelevanceScorer,
  SessionStore,
  SparseEncoder,
  VectorStore,
} from './contracts/capabilities.js';
import { ArticleSegmenter } from './chunking/ArticleSegmenter.js';
import { ChunkBuilder } from './chunking/ChunkBuilder.js';
import { TransformersDenseEncoder } from './embeddings/TransformersDenseEncoder.js';
import { Bm25SparseEncoder } from './embeddings/Bm25SparseEncoder.js';
import { CrossEncoderReranker } from './services/retrieval/CrossEncoderReranker.js';
import { OpenAIAnswerGenerator } from './services/llm/OpenAIAnswerGenerator.js';
import { PgVectorStore } from './vector/PgVectorStore.js';
import { RedisSessionStore } from './services/session/RedisSessionStore.js';
import { SessionService } from './services/session/SessionService.js';
import { CollectionFactory } from './services/collections/CollectionFactory.js';
import { PdfParseTextSource } from './extraction/pdf/PdfParseTextSource.js';
import { IngestionPipeline } from './pipelines/ingestion/IngestionPipeline.js';
import { QueryPipeline } from './pipelines/query/QueryPipeline.js';
import { logger } from './utils/logger.js';

/**
 * The capabilities the pipelines are built from
 */
export interface Capabilities {
  denseEncoder: DenseEncoder;
  sparseEncoder: SparseEncoder;
  scorer: RelevanceScorer;
  generator: AnswerGenerator;
  vectorStore: VectorStore;
  sessionStore: SessionStore;
  textSource: PdfTextSource;
}

export interface Container extends Capabilities {
  env: Env;
  collections: CollectionFactory;
  sessions: SessionService;
  ingestionPipeline: IngestionPipeline;
  queryPipeline: QueryPipeline;
  close(): Promise<void>;
}

/**
 * Wire pipelines and services around a set of capabilities
 */
export function assembleContainer(env: Env, capabilities: Capabilities, close: () => Promise<void> = async () => {}): Container {
  const collections = new CollectionFactory(capabilities.vectorStore, capabilities.denseEncoder.getDims());
  const sessions = new SessionService(capabilities.sessionStore);

  const ingestionPipeline = new IngestionPipeline(
    {
      textSource: capabilities.textSource,
      denseEncoder: capabilities.denseEncoder,
      sparseEncoder: capabilities.sparseEncoder,
      vectorStore: capabilities.vectorStore,
      collections,
      segmenter: new ArticleSegmenter({ minPreambleLength: env.MIN_PREAMBLE_LENGTH }),
      chunkBuilder: new ChunkBuilder({
        maxChunkTokens: env.MAX_CHUNK_TOKENS,
        charsPerToken: env.CHUNK_CHARS_PER_TOKEN,
      }),
    },
    env.INGEST_STOP_ON_ERROR
  );

  const queryPipeline = new QueryPipeline(
    {
      denseEncoder: capabilities.denseEncoder,
      sparseEncoder: capabilities.sparseEncoder,
      vectorStore: capabilities.vectorStore,
      scorer: capabilities.scorer,
      generator: capabilities.generator,
    },
    { prefetchLimit: env.HYBRID_PREFETCH_LIMIT, rerankTopK: env.RERANK_TOP_K }
  );

  return { env, ...capabilities, collections, sessions, ingestionPipeline, queryPipeline, close };
}

/**
 * Production container: local transformer models, pgvector, Redis and OpenAI
 */
export function createContainer(env: Env): Container {
  const pool: pg.Pool = createPostgresPool(env);
  const redis: Redis = createRedisClient(env);

  const capabilities: Capabilities = {
    denseEncoder: new TransformersDenseEncoder({
      modelName: env.EMBEDDING_MODEL,
      dims: env.EMBEDDING_DIMENSION,
      batchSize: env.EMBEDDING_BATCH_SIZE,
    }),
    sparseEncoder: new Bm25SparseEncoder({ modelName: env.SPARSE_MODEL }),
    scorer: new CrossEncoderReranker({ modelName: env.RERANKER_MODEL, maxLength: env.RERANKER_MAX_LENGTH }),
    generator: new OpenAIAnswerGenerator({
      apiKey: env.OPENAI_API_KEY,
      model: env.LLM_MODEL,
      temperature: env.LLM_TEMPERATURE,
      maxTokens: env.LLM_MAX_TOKENS,
    }),
    vectorStore: new PgVectorStore(pool, {
      schema: env.PGVECTOR_SCHEMA,
      upsertBatchSize: env.VECTOR_UPSERT_BATCH_SIZE,
      rrfK: env.RRF_K,
    }),
    sessionStore: new RedisSessionStore(redis, env.SESSION_TTL_SECONDS),
    textSource: new PdfParseTextSource(),
  };

  return assembleContainer(env, capabilities, async () => {
    // A lazy client that never connected has nothing to quit
    const closeRedis = redis.status === 'wait' ? Promise.resolve(redis.disconnect()) : redis.quit();
    await Promise.allSettled([pool.end(), closeRedis]);
    logger.info('Connections closed');
  });
}

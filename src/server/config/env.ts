/**
 * Environment Variable Validation
 *
 * Centralized parsing of every tunable the service reads from the environment.
 * Values are parsed once, validated, and cached; `resetEnv()` clears the cache
 * for tests that change variables between cases.
 */

// Load dotenv early so the values are present before the first getEnv() call
import * as dotenv from 'dotenv';
dotenv.config();

import { logger } from '../utils/logger.js';

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseFloatEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseFloat(value);
  return isNaN(num) ? defaultValue : num;
}

function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return value === 'true';
}

const NODE_ENVS = ['development', 'production', 'test'] as const;
type NodeEnv = (typeof NODE_ENVS)[number];

function isNodeEnv(value: string): value is NodeEnv {
  return NODE_ENVS.some((candidate) => candidate === value);
}

/**
 * Environment configuration type
 */
export interface Env {
  // Server Configuration
  NODE_ENV: NodeEnv;
  PORT: number;
  MAX_UPLOAD_BYTES: number;

  // Answer generation
  OPENAI_API_KEY?: string;
  LLM_MODEL: string;
  LLM_TEMPERATURE: number;
  LLM_MAX_TOKENS: number;

  // PostgreSQL + pgvector
  POSTGRES_HOST: string;
  POSTGRES_PORT: number;
  POSTGRES_DB: string;
  POSTGRES_USER: string;
  POSTGRES_PASSWORD: string;
  POSTGRES_POOL_MAX: number;
  PGVECTOR_SCHEMA: string;
  VECTOR_UPSERT_BATCH_SIZE: number;

  // Redis session storage
  REDIS_HOST: string;
  REDIS_PORT: number;
  REDIS_PASSWORD?: string;
  REDIS_DB: number;
  SESSION_TTL_SECONDS: number;

  // Dense embedding model
  EMBEDDING_MODEL: string;
  EMBEDDING_DIMENSION: number;
  EMBEDDING_BATCH_SIZE: number;

  // Sparse encoder
  SPARSE_MODEL: string;

  // Cross-encoder reranker
  RERANKER_MODEL: string;
  RERANKER_MAX_LENGTH: number;

  // Retrieval
  HYBRID_PREFETCH_LIMIT: number;
  RERANK_TOP_K: number;
  RRF_K: number;

  // Chunking
  MAX_CHUNK_TOKENS: number;
  CHUNK_CHARS_PER_TOKEN: number;
  MIN_PREAMBLE_LENGTH: number;

  // Ingestion
  INGEST_STOP_ON_ERROR: boolean;
}

let validatedEnv: Env | null = null;

/**
 * Validate and return environment variables
 * @throws {Error} If required validation fails
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  const nodeEnvRaw = process.env.NODE_ENV || 'development';
  let nodeEnv: NodeEnv = 'development';
  if (isNodeEnv(nodeEnvRaw)) {
    nodeEnv = nodeEnvRaw;
  } else {
    errors.push(`NODE_ENV: Invalid value "${nodeEnvRaw}". Must be development, production, or test.`);
  }

  const port = parseNumericEnv(process.env.PORT, 8000);
  if (port < 1 || port > 65535) {
    errors.push(`PORT: Invalid value "${process.env.PORT}". Must be between 1 and 65535.`);
  }

  const embeddingDimension = parseNumericEnv(process.env.EMBEDDING_DIMENSION, 384);
  if (embeddingDimension < 1) {
    errors.push(`EMBEDDING_DIMENSION: Invalid value "${process.env.EMBEDDING_DIMENSION}". Must be at least 1.`);
  }

  const prefetchLimit = parseNumericEnv(process.env.HYBRID_PREFETCH_LIMIT, 25);
  const rerankTopK = parseNumericEnv(process.env.RERANK_TOP_K, 5);
  if (prefetchLimit < 1) {
    errors.push(`HYBRID_PREFETCH_LIMIT: Invalid value "${process.env.HYBRID_PREFETCH_LIMIT}". Must be at least 1.`);
  }
  if (rerankTopK < 1) {
    errors.push(`RERANK_TOP_K: Invalid value "${process.env.RERANK_TOP_K}". Must be at least 1.`);
  }
  if (rerankTopK > prefetchLimit) {
    logger.warn(
      { rerankTopK, prefetchLimit },
      'RERANK_TOP_K is larger than HYBRID_PREFETCH_LIMIT; the reranker can never fill its quota'
    );
  }

  const charsPerToken = parseFloatEnv(process.env.CHUNK_CHARS_PER_TOKEN, 1.5);
  if (charsPerToken <= 0) {
    errors.push(`CHUNK_CHARS_PER_TOKEN: Invalid value "${process.env.CHUNK_CHARS_PER_TOKEN}". Must be greater than 0.`);
  }

  const maxChunkTokens = parseNumericEnv(process.env.MAX_CHUNK_TOKENS, 1000);
  if (maxChunkTokens < 1) {
    errors.push(`MAX_CHUNK_TOKENS: Invalid value "${process.env.MAX_CHUNK_TOKENS}". Must be at least 1.`);
  }

  const pgvectorSchema = process.env.PGVECTOR_SCHEMA || 'laws';
  if (!/^[a-z0-9_]+$/i.test(pgvectorSchema)) {
    errors.push(`PGVECTOR_SCHEMA: Invalid value "${pgvectorSchema}". Only alphanumeric characters and underscores are allowed.`);
  }

  if (nodeEnv === 'production' && !process.env.OPENAI_API_KEY) {
    errors.push('OPENAI_API_KEY: Environment variable is required in production.');
  }

  if (errors.length > 0) {
    const message = `Environment validation failed:\n${errors.map((e) => `  - ${e}`).join('\n')}`;
    logger.error({ errors }, 'Environment validation failed');
    throw new Error(message);
  }

  validatedEnv = {
    NODE_ENV: nodeEnv,
    PORT: port,
    MAX_UPLOAD_BYTES: parseNumericEnv(process.env.MAX_UPLOAD_BYTES, 50 * 1024 * 1024),

    OPENAI_API_KEY: process.env.OPENAI_API_KEY || undefined,
    LLM_MODEL: process.env.LLM_MODEL || 'gpt-4o-mini',
    LLM_TEMPERATURE: parseFloatEnv(process.env.LLM_TEMPERATURE, 0.3),
    LLM_MAX_TOKENS: parseNumericEnv(process.env.LLM_MAX_TOKENS, 2048),

    POSTGRES_HOST: process.env.POSTGRES_HOST || 'localhost',
    POSTGRES_PORT: parseNumericEnv(process.env.POSTGRES_PORT, 5432),
    POSTGRES_DB: process.env.POSTGRES_DB || 'statutes',
    POSTGRES_USER: process.env.POSTGRES_USER || 'postgres',
    POSTGRES_PASSWORD: process.env.POSTGRES_PASSWORD || 'postgres',
    POSTGRES_POOL_MAX: parseNumericEnv(process.env.POSTGRES_POOL_MAX, 10),
    PGVECTOR_SCHEMA: pgvectorSchema,
    VECTOR_UPSERT_BATCH_SIZE: parseNumericEnv(process.env.VECTOR_UPSERT_BATCH_SIZE, 100),

    REDIS_HOST: process.env.REDIS_HOST || 'localhost',
    REDIS_PORT: parseNumericEnv(process.env.REDIS_PORT, 6379),
    REDIS_PASSWORD: process.env.REDIS_PASSWORD || undefined,
    REDIS_DB: parseNumericEnv(process.env.REDIS_DB, 0),
    SESSION_TTL_SECONDS: parseNumericEnv(process.env.SESSION_TTL_SECONDS, 86400), // 24 hours

    EMBEDDING_MODEL: process.env.EMBEDDING_MODEL || 'Xenova/multilingual-e5-small',
    EMBEDDING_DIMENSION: embeddingDimension,
    EMBEDDING_BATCH_SIZE: parseNumericEnv(process.env.EMBEDDING_BATCH_SIZE, 32),

    SPARSE_MODEL: process.env.SPARSE_MODEL || 'bm25-hashed',

    RERANKER_MODEL: process.env.RERANKER_MODEL || 'Xenova/bge-reranker-base',
    RERANKER_MAX_LENGTH: parseNumericEnv(process.env.RERANKER_MAX_LENGTH, 512),

    HYBRID_PREFETCH_LIMIT: prefetchLimit,
    RERANK_TOP_K: rerankTopK,
    RRF_K: parseNumericEnv(process.env.RRF_K, 60),

    MAX_CHUNK_TOKENS: maxChunkTokens,
    CHUNK_CHARS_PER_TOKEN: charsPerToken,
    MIN_PREAMBLE_LENGTH: parseNumericEnv(process.env.MIN_PREAMBLE_LENGTH, 100),

    INGEST_STOP_ON_ERROR: parseBooleanEnv(process.env.INGEST_STOP_ON_ERROR, true),
  };

  return validatedEnv;
}

/**
 * Get validated environment variables
 * Validates on first call, then returns cached result
 */
export function getEnv(): Env {
  return validateEnv();
}

/**
 * Reset validated environment cache
 * Used for testing to allow re-validation after env vars change
 */
export function resetEnv(): void {
  validatedEnv = null;
}

export function isTest(): boolean {
  return getEnv().NODE_ENV === 'test';
}

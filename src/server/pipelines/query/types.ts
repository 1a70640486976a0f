/**
 * Query data model
 */

import type { ConversationTurn, SparseVector } from '../../contracts/capabilities.js';

export interface RetrievedChunk {
  chunkId: string;
  content: string;
  articleNumber: number;
  markerText: string;
  lawName: string;
  lawType: string;
  pageNumber: number;
  /** Fused score from hybrid retrieval */
  hybridScore: number;
  /** Cross-encoder score, set by the rerank stage */
  rerankScore?: number;
  chapter?: string;
  chunkPart: number;
  totalParts: number;
}

export interface Source {
  lawName: string;
  articleNumber: number;
  markerText: string;
  pageNumber: number;
  relevanceScore: number;
  contentPreview: string;
}

export interface QueryInput {
  question: string;
  country: string;
  lawTypes?: string[];
  /** Results kept after reranking */
  topK?: number;
  /** Earlier turns of the conversation, used only as generation context */
  history?: ConversationTurn[];
}

/**
 * Typed state threaded through the funnel stages
 */
export interface QueryState {
  input: QueryInput;
  collection: string;
  rawQuery: string;
  normalizedQuery: string;
  denseVector?: number[];
  sparseVector?: SparseVector;
  candidates: RetrievedChunk[];
  reranked: RetrievedChunk[];
  answer?: string;
  /** performance.now() when the query started */
  startedAt: number;
  /** Milliseconds per completed stage, keyed by stage name */
  stageTimings: Record<string, number>;
}

export interface QueryMetadata {
  queryTimeMs: number;
  chunksRetrieved: number;
  chunksAfterRerank: number;
  /** Wall-clock milliseconds per stage, keyed by stage name */
  stageTimings: Record<string, number>;
  embeddingModel: string;
  sparseModel: string;
  rerankerModel: string;
  llmModel: string;
}

export interface QueryOutput {
  success: boolean;
  answer: string;
  sources: Source[];
  metadata: QueryMetadata;
  errors: string[];
}

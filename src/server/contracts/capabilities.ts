/**
 * Capability contracts
 *
 * The pipelines depend only on these interfaces. Concrete adapters (transformers
 * models, pgvector, Redis, OpenAI) are wired in by the container; tests pass fakes.
 */

/**
 * Sparse vector as parallel arrays of term ids and weights
 */
export interface SparseVector {
  indices: number[];
  values: number[];
}

export interface DenseEncoder {
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
  getDims(): number;
  getModelName(): string;
}

export interface SparseEncoder {
  encode(text: string): Promise<SparseVector>;
  encodeBatch(texts: string[]): Promise<SparseVector[]>;
  getModelName(): string;
}

export interface RelevanceScorer {
  score(query: string, document: string): Promise<number>;
  /** One score per document, in input order */
  scoreBatch(query: string, documents: string[]): Promise<number[]>;
  getModelName(): string;
}

export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
}

export interface GenerationOptions {
  /** Earlier turns of the same session, oldest first */
  history?: ConversationTurn[];
  temperature?: number;
  maxTokens?: number;
}

/**
 * Produces the final answer. Implementations must instruct the model to decline
 * when the supplied context does not contain the answer.
 */
export interface AnswerGenerator {
  generate(query: string, contextBlocks: string[], options?: GenerationOptions): Promise<string>;
  getModelName(): string;
}

// Vector store

export type DistanceMetric = 'cosine' | 'dot' | 'euclid';

export interface DenseSchema {
  dims: number;
  distance: DistanceMetric;
}

export interface SparseSchema {
  /** Apply inverse document frequency weighting at query time */
  idf: boolean;
}

/**
 * Snake-case payload persisted with every point
 */
export interface ChunkPayload {
  chunk_id: string;
  content: string;
  article_number: number;
  marker_text: string;
  page_number: number;
  country: string;
  law_type: string;
  law_name: string;
  law_name_en: string | null;
  law_number: string | null;
  law_year: number | null;
  source_file: string | null;
  chapter: string | null;
  chunk_part: number;
  total_parts: number;
}

export interface VectorPoint {
  id: string;
  dense: number[];
  sparse: SparseVector;
  payload: ChunkPayload;
}

export interface SearchFilter {
  country?: string;
  /** Any-of match on law_type; empty or absent means no restriction */
  lawTypes?: string[];
}

export interface HybridSearchRequest {
  dense: number[];
  sparse: SparseVector;
  /** Candidates fetched per modality before fusion, and the fused result size */
  limit: number;
  filter?: SearchFilter;
}

export interface SearchHit {
  id: string;
  /** Fused relevance score */
  score: number;
  payload: ChunkPayload;
}

export interface CollectionStats {
  name: string;
  pointsCount: number;
  status: string;
}

export interface VectorStore {
  createCollection(name: string, dense: DenseSchema, sparse: SparseSchema): Promise<void>;
  collectionExists(name: string): Promise<boolean>;
  upsert(collection: string, points: VectorPoint[]): Promise<number>;
  hybridSearch(collection: string, request: HybridSearchRequest): Promise<SearchHit[]>;
  collectionStats(name: string): Promise<CollectionStats | null>;
  deleteCollection(name: string): Promise<void>;
  healthCheck(): Promise<boolean>;
}

// Sessions

export interface SessionMessage {
  role: 'user' | 'assistant';
  content: string;
  timestamp: string;
  metadata?: Record<string, unknown>;
}

export interface SessionRecord {
  sessionId: string;
  createdAt: string;
  updatedAt: string;
  messages: SessionMessage[];
  metadata: Record<string, unknown>;
}

/**
 * Conversation storage with a fixed inactivity TTL refreshed on every write
 */
export interface SessionStore {
  createSession(sessionId: string, metadata?: Record<string, unknown>): Promise<SessionRecord>;
  getSession(sessionId: string): Promise<SessionRecord | null>;
  sessionExists(sessionId: string): Promise<boolean>;
  addMessage(sessionId: string, message: SessionMessage): Promise<boolean>;
  getMessages(sessionId: string, limit?: number): Promise<SessionMessage[]>;
  deleteSession(sessionId: string): Promise<boolean>;
  listSessions(limit?: number): Promise<string[]>;
  healthCheck(): Promise<boolean>;
}

/**
 * Source of per-page text for a PDF document
 */
export interface PdfTextSource {
  extractPages(pdf: Buffer): Promise<Array<{ pageNumber: number; text: string }>>;
}

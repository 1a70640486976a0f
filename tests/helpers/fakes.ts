/**
 * In-process stand-ins for every capability the pipelines and routes depend on
 */

import type {
  AnswerGenerator,
  CollectionStats,
  DenseEncoder,
  DenseSchema,
  GenerationOptions,
  HybridSearchRequest,
  PdfTextSource,
  RelevanceScorer,
  SearchHit,
  SessionMessage,
  SessionRecord,
  SessionStore,
  SparseEncoder,
  SparseSchema,
  SparseVector,
  VectorPoint,
  VectorStore,
} from '../../src/server/contracts/capabilities.js';
import { reciprocalRankFusion } from '../../src/server/search/reciprocalRankFusion.js';

/**
 * Deterministic dense encoder: character-code buckets, L2 normalized
 */
export class FakeDenseEncoder implements DenseEncoder {
  calls = 0;

  constructor(private readonly dims = 4) {}

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.calls++;
    return texts.map((text) => {
      const vector = new Array<number>(this.dims).fill(0);
      for (let i = 0; i < text.length; i++) {
        vector[text.charCodeAt(i) % this.dims] += 1;
      }
      const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0)) || 1;
      return vector.map((v) => v / norm);
    });
  }

  getDims(): number {
    return this.dims;
  }

  getModelName(): string {
    return 'fake-dense';
  }
}

/**
 * Sparse encoder that counts whitespace tokens, with ids assigned in first-seen order
 */
export class FakeSparseEncoder implements SparseEncoder {
  private readonly vocabulary = new Map<string, number>();

  async encode(text: string): Promise<SparseVector> {
    const counts = new Map<number, number>();
    for (const token of text.split(/\s+/).filter(Boolean)) {
      let id = this.vocabulary.get(token);
      if (id === undefined) {
        id = this.vocabulary.size + 1;
        this.vocabulary.set(token, id);
      }
      counts.set(id, (counts.get(id) ?? 0) + 1);
    }
    const indices = [...counts.keys()].sort((a, b) => a - b);
    return { indices, values: indices.map((i) => counts.get(i) ?? 0) };
  }

  async encodeBatch(texts: string[]): Promise<SparseVector[]> {
    return Promise.all(texts.map((text) => this.encode(text)));
  }

  getModelName(): string {
    return 'fake-sparse';
  }
}

/**
 * Scores by the number of query words found in the document
 */
export class FakeScorer implements RelevanceScorer {
  batchCalls = 0;

  async score(query: string, document: string): Promise<number> {
    const [score] = await this.scoreBatch(query, [document]);
    return score;
  }

  async scoreBatch(query: string, documents: string[]): Promise<number[]> {
    this.batchCalls++;
    const words = query.split(/\s+/).filter(Boolean);
    return documents.map((doc) => words.filter((word) => doc.includes(word)).length);
  }

  getModelName(): string {
    return 'fake-reranker';
  }
}

export interface GenerateCall {
  query: string;
  contextBlocks: string[];
  options?: GenerationOptions;
}

export class FakeGenerator implements AnswerGenerator {
  readonly calls: GenerateCall[] = [];

  constructor(private readonly answer = 'إجابة تجريبية') {}

  async generate(query: string, contextBlocks: string[], options?: GenerationOptions): Promise<string> {
    this.calls.push({ query, contextBlocks, options });
    return this.answer;
  }

  getModelName(): string {
    return 'fake-llm';
  }
}

interface StoredCollection {
  dense: DenseSchema;
  sparse: SparseSchema;
  points: Map<string, VectorPoint>;
}

function dot(a: number[], b: number[]): number {
  return a.reduce((sum, value, i) => sum + value * (b[i] ?? 0), 0);
}

function sparseDot(a: SparseVector, b: SparseVector): number {
  const weights = new Map<number, number>();
  a.indices.forEach((index, i) => weights.set(index, a.values[i]));
  return b.indices.reduce((sum, index, i) => sum + (weights.get(index) ?? 0) * b.values[i], 0);
}

/**
 * In-memory vector store: exact dense and sparse ranking fused with the
 * production RRF function
 */
export class InMemoryVectorStore implements VectorStore {
  readonly collections = new Map<string, StoredCollection>();
  searches: Array<{ collection: string; request: HybridSearchRequest }> = [];
  healthy = true;

  async createCollection(name: string, dense: DenseSchema, sparse: SparseSchema): Promise<void> {
    if (!this.collections.has(name)) {
      this.collections.set(name, { dense, sparse, points: new Map() });
    }
  }

  async collectionExists(name: string): Promise<boolean> {
    return this.collections.has(name);
  }

  async upsert(collection: string, points: VectorPoint[]): Promise<number> {
    const stored = this.collections.get(collection);
    if (!stored) {
      throw new Error(`Collection ${collection} does not exist`);
    }
    for (const point of points) {
      stored.points.set(point.id, point);
    }
    return points.length;
  }

  async hybridSearch(collection: string, request: HybridSearchRequest): Promise<SearchHit[]> {
    this.searches.push({ collection, request });
    const stored = this.collections.get(collection);
    if (!stored) {
      return [];
    }

    const candidates = [...stored.points.values()].filter((point) => {
      const filter = request.filter;
      if (filter?.country && point.payload.country !== filter.country) {
        return false;
      }
      if (filter?.lawTypes && filter.lawTypes.length > 0 && !filter.lawTypes.includes(point.payload.law_type)) {
        return false;
      }
      return true;
    });

    const denseRanked = candidates
      .map((point) => ({ point, score: dot(point.dense, request.dense) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, request.limit);
    const sparseRanked = candidates
      .map((point) => ({ point, score: sparseDot(point.sparse, request.sparse) }))
      .filter((entry) => entry.score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, request.limit);

    return reciprocalRankFusion(
      [
        denseRanked.map(({ point }) => ({ id: point.id, item: point })),
        sparseRanked.map(({ point }) => ({ id: point.id, item: point })),
      ],
      { limit: request.limit }
    ).map((fused) => ({ id: fused.id, score: fused.score, payload: fused.item.payload }));
  }

  async collectionStats(name: string): Promise<CollectionStats | null> {
    const stored = this.collections.get(name);
    return stored ? { name, pointsCount: stored.points.size, status: 'ready' } : null;
  }

  async deleteCollection(name: string): Promise<void> {
    this.collections.delete(name);
  }

  async healthCheck(): Promise<boolean> {
    return this.healthy;
  }
}

export class InMemorySessionStore implements SessionStore {
  readonly sessions = new Map<string, SessionRecord>();
  healthy = true;
  failWrites = false;

  async createSession(sessionId: string, metadata: Record<string, unknown> = {}): Promise<SessionRecord> {
    const now = '2024-01-01T00:00:00.000Z';
    const session: SessionRecord = { sessionId, createdAt: now, updatedAt: now, messages: [], metadata };
    this.sessions.set(sessionId, session);
    return session;
  }

  async getSession(sessionId: string): Promise<SessionRecord | null> {
    return this.sessions.get(sessionId) ?? null;
  }

  async sessionExists(sessionId: string): Promise<boolean> {
    return this.sessions.has(sessionId);
  }

  async addMessage(sessionId: string, message: SessionMessage): Promise<boolean> {
    if (this.failWrites) {
      throw new Error('session store unavailable');
    }
    const session = this.sessions.get(sessionId);
    if (!session) {
      return false;
    }
    session.messages.push(message);
    session.updatedAt = message.timestamp;
    return true;
  }

  async getMessages(sessionId: string, limit?: number): Promise<SessionMessage[]> {
    const messages = this.sessions.get(sessionId)?.messages ?? [];
    return limit ? messages.slice(-limit) : messages;
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    return this.sessions.delete(sessionId);
  }

  async listSessions(limit = 100): Promise<string[]> {
    return [...this.sessions.keys()].slice(0, limit);
  }

  async healthCheck(): Promise<boolean> {
    return this.healthy;
  }
}

/**
 * Returns the configured pages for any input
 */
export class FakeTextSource implements PdfTextSource {
  constructor(public pages: Array<{ pageNumber: number; text: string }> = []) {}

  async extractPages(_pdf: Buffer): Promise<Array<{ pageNumber: number; text: string }>> {
    return this.pages;
  }
}

/** A buffer large enough to pass the PDF size checks */
export function fakePdf(bytes = 2048): Buffer {
  return Buffer.alloc(bytes, 0x20);
}

/**
 * PgVectorStore - hybrid dense + sparse vector store on PostgreSQL/pgvector
 *
 * Each collection is one table in the configured schema holding a `vector(dims)`
 * column, a `sparsevec` column, the folded term ids (for document frequencies),
 * the filterable `country` / `law_type` columns and the JSONB payload. A registry
 * table records each collection's schema.
 *
 * Hybrid search runs one dense and one sparse prefetch under the same filter and
 * fuses the two rankings with Reciprocal Rank Fusion.
 */

import type pg from 'pg';
import type {
  ChunkPayload,
  CollectionStats,
  DenseSchema,
  DistanceMetric,
  HybridSearchRequest,
  SearchFilter,
  SearchHit,
  SparseSchema,
  SparseVector,
  VectorPoint,
  VectorStore,
} from '../contracts/capabilities.js';
import { reciprocalRankFusion, DEFAULT_RRF_K, type RankedItem } from '../search/reciprocalRankFusion.js';
import { BadRequestError } from '../types/errors.js';
import { createChildLogger } from '../utils/logger.js';

/** pgvector's upper bound on sparsevec dimensions */
export const SPARSEVEC_DIMENSIONS = 1_000_000_000;

const REGISTRY_TABLE = 'collections';
const COLLECTION_NAME = /^[a-z][a-z0-9_]*$/;

const DISTANCE_OPERATORS: Record<DistanceMetric, { operator: string; opclass: string }> = {
  cosine: { operator: '<=>', opclass: 'vector_cosine_ops' },
  dot: { operator: '<#>', opclass: 'vector_ip_ops' },
  euclid: { operator: '<->', opclass: 'vector_l2_ops' },
};

export interface PgVectorStoreOptions {
  schema: string;
  upsertBatchSize?: number;
  rrfK?: number;
}

interface RegistryRow {
  name: string;
  dims: number;
  distance: DistanceMetric;
  idf: boolean;
}

interface HitRow {
  id: string;
  payload: ChunkPayload;
  score: number | string;
}

/**
 * Escape identifier (schema/table name): doubles double quotes and wraps in double quotes
 */
export function escapeIdentifier(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`;
}

/**
 * pgvector text form of a dense vector: '[1,2,3]'
 */
export function toVectorLiteral(values: number[]): string {
  return JSON.stringify(values);
}

/**
 * Map a 32-bit term id into sparsevec's 1-based index space
 */
export function foldTermId(termId: number): number {
  return (termId % SPARSEVEC_DIMENSIONS) + 1;
}

/**
 * Fold, merge colliding indices by summing, and sort ascending
 */
export function foldSparseVector(vector: SparseVector): SparseVector {
  const merged = new Map<number, number>();
  vector.indices.forEach((termId, i) => {
    const index = foldTermId(termId);
    merged.set(index, (merged.get(index) ?? 0) + (vector.values[i] ?? 0));
  });
  const indices = [...merged.keys()].sort((a, b) => a - b);
  return { indices, values: indices.map((index) => merged.get(index) ?? 0) };
}

/**
 * pgvector text form of an already folded sparse vector: '{1:0.5,7:1.2}/dims'
 */
export function toSparsevecLiteral(folded: SparseVector): string {
  const entries = folded.indices.map((index, i) => `${index}:${folded.values[i]}`);
  return `{${entries.join(',')}}/${SPARSEVEC_DIMENSIONS}`;
}

/**
 * BM25 inverse document frequency, kept positive for very common terms
 */
export function idfWeight(totalDocuments: number, documentFrequency: number): number {
  return Math.log((totalDocuments - documentFrequency + 0.5) / (documentFrequency + 0.5) + 1);
}

/**
 * WHERE clause for the payload filter. Parameters are numbered from `firstParam`.
 */
export function buildFilterClause(
  filter: SearchFilter | undefined,
  firstParam: number
): { conditions: string[]; params: unknown[] } {
  const conditions: string[] = [];
  const params: unknown[] = [];
  if (filter?.country) {
    params.push(filter.country);
    conditions.push(`country = $${firstParam + params.length - 1}`);
  }
  if (filter?.lawTypes && filter.lawTypes.length > 0) {
    params.push(filter.lawTypes);
    conditions.push(`law_type = ANY($${firstParam + params.length - 1}::text[])`);
  }
  return { conditions, params };
}

export class PgVectorStore implements VectorStore {
  private readonly logger = createChildLogger({ service: 'PgVectorStore' });
  private readonly schema: string;
  private readonly upsertBatchSize: number;
  private readonly rrfK: number;
  private schemaEnsured = false;

  constructor(
    private readonly pool: pg.Pool,
    options: PgVectorStoreOptions
  ) {
    if (!/^[a-z0-9_]+$/i.test(options.schema)) {
      throw new Error(`Invalid schema name: ${options.schema}. Only alphanumeric characters and underscores are allowed.`);
    }
    this.schema = options.schema;
    this.upsertBatchSize = Math.max(1, options.upsertBatchSize ?? 100);
    this.rrfK = options.rrfK ?? DEFAULT_RRF_K;
  }

  private table(name: string): string {
    if (!COLLECTION_NAME.test(name)) {
      throw new BadRequestError(`Invalid collection name: ${name}`);
    }
    return `${escapeIdentifier(this.schema)}.${escapeIdentifier(name)}`;
  }

  private get registry(): string {
    return `${escapeIdentifier(this.schema)}.${escapeIdentifier(REGISTRY_TABLE)}`;
  }

  /**
   * Ensure the pgvector extension, the schema and the registry table exist
   */
  async ensureSchema(): Promise<void> {
    if (this.schemaEnsured) {
      return;
    }
    await this.pool.query('CREATE EXTENSION IF NOT EXISTS vector');
    await this.pool.query(`CREATE SCHEMA IF NOT EXISTS ${escapeIdentifier(this.schema)}`);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS ${this.registry} (
        name TEXT PRIMARY KEY,
        dims INTEGER NOT NULL,
        distance TEXT NOT NULL,
        idf BOOLEAN NOT NULL,
        created_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW()
      );
    `);
    this.schemaEnsured = true;
    this.logger.info({ schema: this.schema }, 'pgvector schema ensured');
  }

  private async getRegistryEntry(name: string): Promise<RegistryRow | null> {
    await this.ensureSchema();
    const result = await this.pool.query<RegistryRow>(
      `SELECT name, dims, distance, idf FROM ${this.registry} WHERE name = $1`,
      [name]
    );
    return result.rows[0] ?? null;
  }

  private async requireCollection(name: string): Promise<RegistryRow> {
    const entry = await this.getRegistryEntry(name);
    if (!entry) {
      throw new Error(`Collection not found: ${name}`);
    }
    return entry;
  }

  async createCollection(name: string, dense: DenseSchema, sparse: SparseSchema): Promise<void> {
    const table = this.table(name);
    await this.ensureSchema();
    const { opclass } = DISTANCE_OPERATORS[dense.distance];

    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS ${table} (
        id TEXT PRIMARY KEY,
        dense vector(${dense.dims}) NOT NULL,
        sparse sparsevec(${SPARSEVEC_DIMENSIONS}) NOT NULL,
        term_ids INTEGER[] NOT NULL DEFAULT '{}',
        country TEXT NOT NULL,
        law_type TEXT NOT NULL,
        payload JSONB NOT NULL,
        updated_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW()
      );
    `);
    // CREATE INDEX WITH clause doesn't support parameterized queries; names are validated above
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS ${escapeIdentifier(`${name}_dense_idx`)} ON ${table} USING hnsw (dense ${opclass})`
    );
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS ${escapeIdentifier(`${name}_terms_idx`)} ON ${table} USING GIN (term_ids)`
    );
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS ${escapeIdentifier(`${name}_country_idx`)} ON ${table} USING BTREE (country)`
    );
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS ${escapeIdentifier(`${name}_law_type_idx`)} ON ${table} USING BTREE (law_type)`
    );
    await this.pool.query(
      `INSERT INTO ${this.registry} (name, dims, distance, idf) VALUES ($1, $2, $3, $4)
       ON CONFLICT (name) DO UPDATE SET dims = EXCLUDED.dims, distance = EXCLUDED.distance, idf = EXCLUDED.idf`,
      [name, dense.dims, dense.distance, sparse.idf]
    );

    this.logger.info({ collection: name, dims: dense.dims, distance: dense.distance, idf: sparse.idf }, 'Created collection');
  }

  async collectionExists(name: string): Promise<boolean> {
    return (await this.getRegistryEntry(name)) !== null;
  }

  /**
   * Insert or overwrite points by id, in batches. Returns the number of points written.
   */
  async upsert(collection: string, points: VectorPoint[]): Promise<number> {
    if (points.length === 0) {
      return 0;
    }
    const table = this.table(collection);
    const entry = await this.requireCollection(collection);

    for (const point of points) {
      if (point.dense.length !== entry.dims) {
        throw new Error(`Embedding dimension mismatch: expected ${entry.dims}, got ${point.dense.length}`);
      }
    }

    let written = 0;
    for (let start = 0; start < points.length; start += this.upsertBatchSize) {
      const batch = points.slice(start, start + this.upsertBatchSize);
      const params: unknown[] = [];
      const rows = batch.map((point) => {
        const folded = foldSparseVector(point.sparse);
        const base = params.length;
        params.push(
          point.id,
          toVectorLiteral(point.dense),
          toSparsevecLiteral(folded),
          folded.indices,
          point.payload.country,
          point.payload.law_type,
          JSON.stringify(point.payload)
        );
        return `($${base + 1}, $${base + 2}::text::vector, $${base + 3}::text::sparsevec, $${base + 4}::int[], $${base + 5}, $${base + 6}, $${base + 7}::jsonb, NOW())`;
      });

      await this.pool.query(
        `INSERT INTO ${table} (id, dense, sparse, term_ids, country, law_type, payload, updated_at)
         VALUES ${rows.join(',\n')}
         ON CONFLICT (id) DO UPDATE SET
           dense = EXCLUDED.dense,
           sparse = EXCLUDED.sparse,
           term_ids = EXCLUDED.term_ids,
           country = EXCLUDED.country,
           law_type = EXCLUDED.law_type,
           payload = EXCLUDED.payload,
           updated_at = NOW()`,
        params
      );
      written += batch.length;
      this.logger.debug({ collection, written, total: points.length }, 'Upserted batch');
    }

    return written;
  }

  async hybridSearch(collection: string, request: HybridSearchRequest): Promise<SearchHit[]> {
    const table = this.table(collection);
    const entry = await this.requireCollection(collection);

    const denseHits = await this.denseSearch(table, entry, request);
    const sparseQuery = entry.idf
      ? await this.applyIdf(table, foldSparseVector(request.sparse))
      : foldSparseVector(request.sparse);
    const sparseHits = sparseQuery.indices.length > 0 ? await this.sparseSearch(table, sparseQuery, request) : [];

    const toRanked = (hits: SearchHit[]): Array<RankedItem<SearchHit>> => hits.map((hit) => ({ id: hit.id, item: hit }));
    const fused = reciprocalRankFusion([toRanked(denseHits), toRanked(sparseHits)], {
      k: this.rrfK,
      limit: request.limit,
    });

    this.logger.debug(
      { collection, dense: denseHits.length, sparse: sparseHits.length, fused: fused.length },
      'Hybrid search completed'
    );
    return fused.map((hit) => ({ id: hit.id, score: hit.score, payload: hit.item.payload }));
  }

  private async denseSearch(table: string, entry: RegistryRow, request: HybridSearchRequest): Promise<SearchHit[]> {
    const { operator } = DISTANCE_OPERATORS[entry.distance];
    const score =
      entry.distance === 'cosine' ? `1 - (dense ${operator} $1::text::vector)` : `-(dense ${operator} $1::text::vector)`;
    const filter = buildFilterClause(request.filter, 3);
    const where = filter.conditions.length > 0 ? `WHERE ${filter.conditions.join(' AND ')}` : '';

    const result = await this.pool.query<HitRow>(
      `SELECT id, payload, ${score} AS score
       FROM ${table}
       ${where}
       ORDER BY dense ${operator} $1::text::vector
       LIMIT $2`,
      [toVectorLiteral(request.dense), request.limit, ...filter.params]
    );
    return result.rows.map(toHit);
  }

  private async sparseSearch(table: string, query: SparseVector, request: HybridSearchRequest): Promise<SearchHit[]> {
    const filter = buildFilterClause(request.filter, 4);
    const conditions = ['term_ids && $3::int[]', ...filter.conditions];

    const result = await this.pool.query<HitRow>(
      `SELECT id, payload, -(sparse <#> $1::text::sparsevec) AS score
       FROM ${table}
       WHERE ${conditions.join(' AND ')}
       ORDER BY sparse <#> $1::text::sparsevec
       LIMIT $2`,
      [toSparsevecLiteral(query), request.limit, query.indices, ...filter.params]
    );
    return result.rows.map(toHit);
  }

  /**
   * Weight each query term by its inverse document frequency in the collection
   */
  private async applyIdf(table: string, query: SparseVector): Promise<SparseVector> {
    if (query.indices.length === 0) {
      return query;
    }
    const total = await this.pool.query<{ total: number }>(`SELECT count(*)::int AS total FROM ${table}`);
    const totalDocuments = total.rows[0]?.total ?? 0;
    const frequencies = await this.pool.query<{ term: number; df: number }>(
      `SELECT term, count(*)::int AS df
       FROM ${table}, unnest(term_ids) AS term
       WHERE term = ANY($1::int[])
       GROUP BY term`,
      [query.indices]
    );
    const df = new Map(frequencies.rows.map((row) => [row.term, row.df]));
    return {
      indices: query.indices,
      values: query.values.map((value, i) => value * idfWeight(totalDocuments, df.get(query.indices[i]) ?? 0)),
    };
  }

  async collectionStats(name: string): Promise<CollectionStats | null> {
    const entry = await this.getRegistryEntry(name);
    if (!entry) {
      return null;
    }
    const result = await this.pool.query<{ total: number }>(`SELECT count(*)::int AS total FROM ${this.table(name)}`);
    return { name, pointsCount: result.rows[0]?.total ?? 0, status: 'ready' };
  }

  async deleteCollection(name: string): Promise<void> {
    const table = this.table(name);
    await this.ensureSchema();
    await this.pool.query(`DROP TABLE IF EXISTS ${table}`);
    await this.pool.query(`DELETE FROM ${this.registry} WHERE name = $1`, [name]);
    this.logger.info({ collection: name }, 'Deleted collection');
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.debug({ error }, 'PostgreSQL connection check failed');
      return false;
    }
  }
}

function toHit(row: HitRow): SearchHit {
  return { id: row.id, score: typeof row.score === 'number' ? row.score : parseFloat(row.score), payload: row.payload };
}

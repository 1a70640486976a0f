/**
 * Conversion between chunks and the snake_case payload stored with each point
 */

import type { ChunkPayload, SearchHit, VectorPoint } from '../contracts/capabilities.js';
import type { DocumentChunk, EncodedChunk } from '../pipelines/ingestion/types.js';
import type { RetrievedChunk } from '../pipelines/query/types.js';

export function toPayload(chunk: DocumentChunk): ChunkPayload {
  return {
    chunk_id: chunk.chunkId,
    content: chunk.content,
    article_number: chunk.articleNumber,
    marker_text: chunk.markerText,
    page_number: chunk.pageNumber,
    country: chunk.country,
    law_type: chunk.lawType,
    law_name: chunk.lawName,
    law_name_en: chunk.lawNameEn ?? null,
    law_number: chunk.lawNumber ?? null,
    law_year: chunk.lawYear ?? null,
    source_file: chunk.sourceFile ?? null,
    chapter: chunk.chapter ?? null,
    chunk_part: chunk.chunkPart,
    total_parts: chunk.totalParts,
  };
}

export function toVectorPoint(chunk: EncodedChunk): VectorPoint {
  return {
    id: chunk.chunkId,
    dense: chunk.denseVector,
    sparse: chunk.sparseVector,
    payload: toPayload(chunk),
  };
}

export function retrievedChunkFromHit(hit: SearchHit): RetrievedChunk {
  const payload = hit.payload;
  return {
    chunkId: payload.chunk_id || hit.id,
    content: payload.content,
    articleNumber: payload.article_number,
    markerText: payload.marker_text,
    lawName: payload.law_name,
    lawType: payload.law_type,
    pageNumber: payload.page_number,
    hybridScore: hit.score,
    chapter: payload.chapter ?? undefined,
    chunkPart: payload.chunk_part,
    totalParts: payload.total_parts,
  };
}

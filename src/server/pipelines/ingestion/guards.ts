/**
 * Runtime checks used by ingestion steps to validate their input
 */

import type { DenseChunk, DocumentChunk, EncodedChunk, PageContent, RawArticle } from './types.js';
import type { PipelineContext } from '../PipelineEngine.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isPageContent(value: unknown): value is PageContent {
  return isRecord(value) && typeof value.pageNumber === 'number' && typeof value.text === 'string';
}

export function isRawArticle(value: unknown): value is RawArticle {
  return (
    isRecord(value) &&
    typeof value.articleNumber === 'number' &&
    typeof value.content === 'string' &&
    typeof value.pageNumber === 'number'
  );
}

export function isDocumentChunk(value: unknown): value is DocumentChunk {
  return (
    isRecord(value) &&
    typeof value.chunkId === 'string' &&
    typeof value.content === 'string' &&
    typeof value.articleNumber === 'number' &&
    typeof value.chunkPart === 'number' &&
    typeof value.totalParts === 'number'
  );
}

export function hasDenseVector(chunk: DocumentChunk): chunk is DenseChunk {
  return Array.isArray(chunk.denseVector) && chunk.denseVector.length > 0;
}

export function isEncodedChunk(value: unknown): value is EncodedChunk {
  return isDocumentChunk(value) && hasDenseVector(value) && value.sparseVector !== undefined;
}

export function isArrayOf<T>(value: unknown, guard: (item: unknown) => item is T): value is T[] {
  return Array.isArray(value) && value.every((item) => guard(item));
}

/**
 * Numeric counter written by a step into the shared context, 0 when absent
 */
export function readCounter(context: PipelineContext, key: string): number {
  const value = context[key];
  return typeof value === 'number' ? value : 0;
}

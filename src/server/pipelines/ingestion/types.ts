/**
 * Ingestion data model
 */

import type { SparseVector } from '../../contracts/capabilities.js';

export interface PageContent {
  /** 1-based */
  pageNumber: number;
  text: string;
}

export interface ArticleMatch {
  articleNumber: number;
  /** The matched header text, e.g. "مادة ٩ -" */
  markerText: string;
  startOffset: number;
  endOffset: number;
}

export interface RawArticle {
  /** 0 for the preamble */
  articleNumber: number;
  markerText?: string;
  content: string;
  pageNumber: number;
  chapter?: string;
}

export interface ArticleMetadata {
  country: string;
  lawType: string;
  lawName: string;
  lawNameEn?: string;
  lawNumber?: string;
  lawYear?: number;
  sourceFile?: string;
}

export interface DocumentChunk {
  chunkId: string;
  content: string;
  articleNumber: number;
  markerText: string;
  pageNumber: number;
  country: string;
  lawType: string;
  lawName: string;
  lawNameEn?: string;
  lawNumber?: string;
  lawYear?: number;
  sourceFile?: string;
  chapter?: string;
  chunkPart: number;
  totalParts: number;
  denseVector?: number[];
  sparseVector?: SparseVector;
}

export type DenseChunk = DocumentChunk & { denseVector: number[] };

/** A chunk that carries both vectors and may be stored */
export type EncodedChunk = DocumentChunk & {
  denseVector: number[];
  sparseVector: SparseVector;
};

export interface IngestionResult {
  success: boolean;
  collection: string;
  articlesFound: number;
  chunksCreated: number;
  pagesProcessed: number;
  processingTimeMs: number;
  errors: string[];
}

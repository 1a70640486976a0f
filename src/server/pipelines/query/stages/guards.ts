import type { QueryState, RetrievedChunk } from '../types.js';

export function isQueryState(value: unknown): value is QueryState {
  return (
    typeof value === 'object' &&
    value !== null &&
    'rawQuery' in value &&
    typeof value.rawQuery === 'string' &&
    'collection' in value &&
    typeof value.collection === 'string' &&
    'candidates' in value &&
    Array.isArray(value.candidates)
  );
}

export function isRetrievedChunk(value: unknown): value is RetrievedChunk {
  return (
    typeof value === 'object' &&
    value !== null &&
    'chunkId' in value &&
    typeof value.chunkId === 'string' &&
    'content' in value &&
    typeof value.content === 'string' &&
    'hybridScore' in value &&
    typeof value.hybridScore === 'number'
  );
}

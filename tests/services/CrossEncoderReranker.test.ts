import { describe, it, expect } from 'vitest';
import { CrossEncoderReranker, logitsToScores } from '../../src/server/services/retrieval/CrossEncoderReranker.js';

describe('logitsToScores', () => {
  it('uses the single logit of a regression head', () => {
    expect(logitsToScores(new Float32Array([0.5, -1.5]), 2, 1)).toEqual([0.5, -1.5]);
  });

  it('uses the positive-class logit of a binary head', () => {
    expect(logitsToScores([0.1, 2, 0.3, -4], 2, 2)).toEqual([2, -4]);
  });

  it('throws on a shape mismatch', () => {
    expect(() => logitsToScores([1, 2, 3], 2, 2)).toThrow('Logit output size mismatch');
  });
});

describe('CrossEncoderReranker', () => {
  it('scores nothing without loading the model', async () => {
    const reranker = new CrossEncoderReranker({ modelName: 'test/reranker' });
    expect(await reranker.scoreBatch('سؤال', [])).toEqual([]);
    expect(reranker.getModelName()).toBe('test/reranker');
  });
});

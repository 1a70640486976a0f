/**
 * Cross-encoder relevance scorer
 *
 * Scores (question, passage) pairs jointly with a sequence-classification model
 * run locally through @huggingface/transformers. Scores are raw logits: only their
 * order matters to the reranker.
 */

import { AutoModelForSequenceClassification, AutoTokenizer } from '@huggingface/transformers';
import type { PreTrainedModel, PreTrainedTokenizer, Tensor } from '@huggingface/transformers';
import type { RelevanceScorer } from '../../contracts/capabilities.js';
import { createChildLogger } from '../../utils/logger.js';

export interface CrossEncoderRerankerOptions {
  modelName: string;
  maxLength?: number;
  /** Pairs scored per forward pass */
  batchSize?: number;
}

/**
 * One relevance score per row. Single-logit heads give the logit itself; binary
 * heads give the positive-class logit (column 1).
 */
export function logitsToScores(data: ArrayLike<number | bigint>, rows: number, cols: number): number[] {
  if (data.length !== rows * cols) {
    throw new Error(`Logit output size mismatch: expected ${rows * cols} values, got ${data.length}`);
  }
  const column = cols >= 2 ? 1 : 0;
  const scores: number[] = [];
  for (let row = 0; row < rows; row++) {
    scores.push(Number(data[row * cols + column]));
  }
  return scores;
}

interface LoadedModel {
  tokenizer: PreTrainedTokenizer;
  model: PreTrainedModel;
}

export class CrossEncoderReranker implements RelevanceScorer {
  private readonly logger = createChildLogger({ service: 'CrossEncoderReranker' });
  private readonly modelName: string;
  private readonly maxLength: number;
  private readonly batchSize: number;
  private loading: Promise<LoadedModel> | null = null;

  constructor(options: CrossEncoderRerankerOptions) {
    this.modelName = options.modelName;
    this.maxLength = options.maxLength ?? 512;
    this.batchSize = Math.max(1, options.batchSize ?? 16);
  }

  getModelName(): string {
    return this.modelName;
  }

  private init(): Promise<LoadedModel> {
    if (!this.loading) {
      this.logger.info({ model: this.modelName, maxLength: this.maxLength }, 'Loading reranker model');
      this.loading = Promise.all([
        AutoTokenizer.from_pretrained(this.modelName),
        AutoModelForSequenceClassification.from_pretrained(this.modelName),
      ])
        .then(([tokenizer, model]) => {
          this.logger.info({ model: this.modelName }, 'Reranker model loaded');
          return { tokenizer, model };
        })
        .catch((error: unknown) => {
          this.loading = null;
          throw error;
        });
    }
    return this.loading;
  }

  async score(query: string, document: string): Promise<number> {
    const [score] = await this.scoreBatch(query, [document]);
    return score;
  }

  async scoreBatch(query: string, documents: string[]): Promise<number[]> {
    if (documents.length === 0) {
      return [];
    }
    const { tokenizer, model } = await this.init();
    const scores: number[] = [];

    for (let start = 0; start < documents.length; start += this.batchSize) {
      const batch = documents.slice(start, start + this.batchSize);
      const inputs = tokenizer(
        batch.map(() => query),
        {
          text_pair: batch,
          padding: true,
          truncation: true,
          max_length: this.maxLength,
        }
      );
      const output: { logits: Tensor } = await model(inputs);
      const [rows, cols] = output.logits.dims;
      scores.push(...logitsToScores(output.logits.data, rows, cols ?? 1));
    }

    this.logger.debug({ documents: documents.length }, 'Scored candidate passages');
    return scores;
  }
}

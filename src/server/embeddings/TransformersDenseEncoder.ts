/**
 * TransformersDenseEncoder - local dense embeddings via @huggingface/transformers
 *
 * Runs a multilingual sentence-embedding model on CPU with mean pooling and L2
 * normalization, so cosine similarity equals the dot product. The model is
 * loaded on first use and shared by every later call.
 */

import { pipeline } from '@huggingface/transformers';
import type { FeatureExtractionPipeline, Tensor } from '@huggingface/transformers';
import type { DenseEncoder } from '../contracts/capabilities.js';
import { createChildLogger } from '../utils/logger.js';

export interface TransformersDenseEncoderOptions {
  modelName: string;
  dims: number;
  batchSize?: number;
}

/**
 * Split a flat [rows × dims] tensor buffer into one vector per row
 */
export function splitRows(data: ArrayLike<number | bigint>, rows: number, dims: number): number[][] {
  if (data.length !== rows * dims) {
    throw new Error(`Embedding output size mismatch: expected ${rows * dims} values, got ${data.length}`);
  }
  const vectors: number[][] = [];
  for (let row = 0; row < rows; row++) {
    const vector = new Array<number>(dims);
    for (let col = 0; col < dims; col++) {
      vector[col] = Number(data[row * dims + col]);
    }
    vectors.push(vector);
  }
  return vectors;
}

export class TransformersDenseEncoder implements DenseEncoder {
  private readonly logger = createChildLogger({ service: 'TransformersDenseEncoder' });
  private readonly modelName: string;
  private readonly dims: number;
  private readonly batchSize: number;
  private pipe: FeatureExtractionPipeline | null = null;
  private loading: Promise<FeatureExtractionPipeline> | null = null;

  constructor(options: TransformersDenseEncoderOptions) {
    this.modelName = options.modelName;
    this.dims = options.dims;
    this.batchSize = Math.max(1, options.batchSize ?? 32);
  }

  getDims(): number {
    return this.dims;
  }

  getModelName(): string {
    return this.modelName;
  }

  async init(): Promise<FeatureExtractionPipeline> {
    if (this.pipe) {
      return this.pipe;
    }
    if (!this.loading) {
      this.logger.info({ model: this.modelName }, 'Loading embedding model');
      this.loading = pipeline('feature-extraction', this.modelName)
        .then((loaded) => {
          this.pipe = loaded;
          this.logger.info({ model: this.modelName, dims: this.dims }, 'Embedding model loaded');
          return loaded;
        })
        .catch((error: unknown) => {
          this.loading = null;
          throw error;
        });
    }
    return this.loading;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    const pipe = await this.init();
    const vectors: number[][] = [];

    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);
      const output: Tensor = await pipe(batch, { pooling: 'mean', normalize: true });
      const [rows, dims] = output.dims;
      if (dims !== this.dims) {
        throw new Error(`Embedding dimension mismatch: expected ${this.dims}, got ${dims}`);
      }
      vectors.push(...splitRows(output.data, rows, dims));

      if (texts.length > this.batchSize) {
        this.logger.debug(
          { embedded: Math.min(start + this.batchSize, texts.length), total: texts.length },
          'Embedding batch completed'
        );
      }
    }

    return vectors;
  }
}

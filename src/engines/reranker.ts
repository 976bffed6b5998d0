/**
 * Reranker
 *
 * Cross-encoder scoring of (query, passage) pairs. Scores are the sigmoid
 * of the model's single relevance logit, so they fall in (0, 1).
 */

import {
  AutoModelForSequenceClassification,
  AutoTokenizer,
  type PreTrainedModel,
  type PreTrainedTokenizer,
} from '@huggingface/transformers';
import { z } from 'zod';
import { getLogger } from '../utils/logger.js';
import { RerankingProviderError, wrapError } from '../errors/index.js';

export interface RerankedText {
  text: string;
  score: number;
}

export interface RerankingProvider {
  /**
   * Score every text against the query
   *
   * @returns at most topK entries, best first
   */
  rerank(query: string, texts: string[], topK: number): Promise<RerankedText[]>;
}

export const DEFAULT_RERANKER_MODEL = 'Xenova/bge-reranker-base';

const LogitsSchema = z.array(z.array(z.number()).nonempty());

export function sigmoid(x: number): number {
  return 1 / (1 + Math.exp(-x));
}

interface LoadedModel {
  tokenizer: PreTrainedTokenizer;
  model: PreTrainedModel;
}

export class TransformersReranker implements RerankingProvider {
  private readonly modelName: string;
  private readonly batchSize: number;
  private loaded: LoadedModel | null = null;
  private loading: Promise<LoadedModel> | null = null;

  constructor(modelName: string = DEFAULT_RERANKER_MODEL, batchSize: number = 32) {
    this.modelName = modelName;
    this.batchSize = batchSize;
  }

  private async load(): Promise<LoadedModel> {
    if (this.loaded) {
      return this.loaded;
    }
    if (!this.loading) {
      getLogger().info('Reranker', `Loading ${this.modelName} (may download on first use)...`);
      this.loading = Promise.all([
        AutoTokenizer.from_pretrained(this.modelName),
        AutoModelForSequenceClassification.from_pretrained(this.modelName, { dtype: 'fp32' }),
      ]).then(([tokenizer, model]) => ({ tokenizer, model }));
    }

    try {
      this.loaded = await this.loading;
      return this.loaded;
    } catch (error) {
      this.loading = null;
      throw wrapError(
        error,
        (cause) => new RerankingProviderError(`cannot load ${this.modelName}: ${cause.message}`, cause)
      );
    }
  }

  async rerank(query: string, texts: string[], topK: number): Promise<RerankedText[]> {
    if (texts.length === 0 || topK <= 0) {
      return [];
    }

    const { tokenizer, model } = await this.load();
    const scored: RerankedText[] = [];

    try {
      for (let i = 0; i < texts.length; i += this.batchSize) {
        const batch = texts.slice(i, i + this.batchSize);
        const inputs = tokenizer(
          batch.map(() => query),
          { text_pair: batch, padding: true, truncation: true }
        );
        const { logits } = await model(inputs);
        const rows = LogitsSchema.parse(logits.tolist());
        rows.forEach((row, index) => {
          scored.push({ text: batch[index], score: sigmoid(row[0]) });
        });
      }
    } catch (error) {
      throw wrapError(
        error,
        (cause) => new RerankingProviderError(`scoring ${texts.length} passages failed: ${cause.message}`, cause)
      );
    }

    return scored.sort((a, b) => b.score - a.score).slice(0, topK);
  }
}

/**
 * Embedding Engine
 *
 * The `EmbeddingProvider` contract and its transformers.js implementation.
 * Passages and queries are framed with different prompt prefixes, as the
 * default model (nomic-embed-text v1.5) expects.
 */

import { pipeline, type FeatureExtractionPipeline } from '@huggingface/transformers';
import { z } from 'zod';
import { getLogger } from '../utils/logger.js';
import { EmbeddingProviderError, wrapError } from '../errors/index.js';

// ============================================================================
// Contract
// ============================================================================

export interface EmbeddingProvider {
  /** Length of every returned vector */
  readonly dimension: number;
  /** Embed texts to be stored in the index */
  embedPassages(texts: string[]): Promise<number[][]>;
  /** Embed a search query */
  embedQuery(text: string): Promise<number[]>;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_EMBEDDING_MODEL = 'nomic-ai/nomic-embed-text-v1.5';

export const DEFAULT_EMBEDDING_DIMENSION = 768;

export type PromptType = 'passage' | 'query';

/**
 * Prompt prefixes per model
 */
export const MODEL_PROMPTS: Record<string, Record<PromptType, string>> = {
  'nomic-ai/nomic-embed-text-v1.5': {
    passage: 'search_document: ',
    query: 'search_query: ',
  },
};

export function getPromptPrefix(modelName: string, promptType: PromptType): string {
  return MODEL_PROMPTS[modelName]?.[promptType] ?? '';
}

export interface TransformersEmbeddingConfig {
  modelName: string;
  dimension: number;
  /** Texts per model call */
  batchSize: number;
}

const VectorsSchema = z.array(z.array(z.number()));

// ============================================================================
// TransformersEmbeddingProvider Class
// ============================================================================

/**
 * Local embedding model through @huggingface/transformers
 *
 * The model is downloaded on first use to the transformers cache and loaded
 * once; concurrent first calls share the same load.
 *
 * @example
 * ```typescript
 * const provider = new TransformersEmbeddingProvider();
 * const [vector] = await provider.embedPassages(['hello world']);
 * ```
 */
export class TransformersEmbeddingProvider implements EmbeddingProvider {
  private extractor: FeatureExtractionPipeline | null = null;
  private initializationPromise: Promise<void> | null = null;
  private readonly config: TransformersEmbeddingConfig;

  constructor(config: Partial<TransformersEmbeddingConfig> = {}) {
    this.config = {
      modelName: config.modelName ?? DEFAULT_EMBEDDING_MODEL,
      dimension: config.dimension ?? DEFAULT_EMBEDDING_DIMENSION,
      batchSize: config.batchSize ?? 32,
    };
  }

  get dimension(): number {
    return this.config.dimension;
  }

  get modelName(): string {
    return this.config.modelName;
  }

  isInitialized(): boolean {
    return this.extractor !== null;
  }

  /**
   * Load the model. Idempotent; a failed load can be retried.
   *
   * @throws EmbeddingProviderError if the model cannot be loaded
   */
  async initialize(): Promise<void> {
    if (this.extractor) {
      return;
    }
    if (this.initializationPromise) {
      return this.initializationPromise;
    }

    this.initializationPromise = this.loadModel();
    try {
      await this.initializationPromise;
    } finally {
      if (!this.extractor) {
        this.initializationPromise = null;
      }
    }
  }

  private async loadModel(): Promise<void> {
    const logger = getLogger();
    logger.info('EmbeddingEngine', `Loading ${this.config.modelName} (may download on first use)...`);

    try {
      // pipeline() has too many overloads for TypeScript to resolve the union
      this.extractor = await pipeline('feature-extraction', this.config.modelName, {
        dtype: 'fp32',
        progress_callback: (progress: { status: string; file?: string; progress?: number }) => {
          if (progress.status === 'download' && progress.progress !== undefined) {
            logger.debug('EmbeddingEngine', `Downloading: ${progress.file} - ${Math.round(progress.progress)}%`);
          } else if (progress.status === 'done') {
            logger.debug('EmbeddingEngine', `Downloaded: ${progress.file}`);
          }
        },
      });
      logger.info('EmbeddingEngine', 'Embedding model ready', { model: this.config.modelName });
    } catch (error) {
      this.extractor = null;
      throw wrapError(
        error,
        (cause) => new EmbeddingProviderError(`cannot load ${this.config.modelName}: ${cause.message}`, cause)
      );
    }
  }

  async embedPassages(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i += this.config.batchSize) {
      const batch = texts.slice(i, i + this.config.batchSize);
      vectors.push(...(await this.embedBatch(batch, 'passage')));
    }
    return vectors;
  }

  async embedQuery(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text], 'query');
    return vector;
  }

  private async embedBatch(texts: string[], promptType: PromptType): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    await this.initialize();
    const extractor = this.extractor;
    if (!extractor) {
      throw new EmbeddingProviderError('pipeline not initialized');
    }

    const prefix = getPromptPrefix(this.config.modelName, promptType);

    try {
      const output = await extractor(
        texts.map((text) => prefix + text),
        { pooling: 'mean', normalize: true }
      );
      try {
        const vectors = VectorsSchema.parse(output.tolist());
        for (const vector of vectors) {
          if (vector.length !== this.config.dimension) {
            throw new Error(`expected dimension ${this.config.dimension}, got ${vector.length}`);
          }
        }
        return vectors;
      } finally {
        output.dispose();
      }
    } catch (error) {
      throw wrapError(
        error,
        (cause) => new EmbeddingProviderError(`${promptType} batch of ${texts.length} failed: ${cause.message}`, cause)
      );
    }
  }
}

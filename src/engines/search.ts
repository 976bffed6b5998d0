/**
 * Search Service
 *
 * Query-time path: embed the query, search each selected collection,
 * drop weak matches, optionally rerank with a cross-encoder.
 */

import { getLogger } from '../utils/logger.js';
import type { VectorStore } from '../storage/vectorStore.js';
import type { EmbeddingProvider } from './embedding.js';
import type { RerankingProvider } from './reranker.js';

// ============================================================================
// Types
// ============================================================================

export interface SearchHit {
  /** Absolute path of the source file */
  path: string;
  text: string;
  /** First characters of the text */
  preview: string;
  /** Cosine similarity of the fragment to the query */
  score: number;
  /** Cross-encoder score, when reranked */
  rerankScore?: number;
  ordinal: number;
  collectionName: string;
}

export interface SearchOptions {
  /** Maximum hits returned (default 10) */
  topK?: number;
  /** Restrict to these watched roots (default: all) */
  folders?: string[];
  /** Rerank candidates with the cross-encoder (default: true when available) */
  rerank?: boolean;
}

export interface SearchSettings {
  searchScoreThreshold: number;
  rerankScoreThreshold: number;
  previewChars: number;
  /** Candidates fetched per collection, as a multiple of topK */
  candidateMultiplier: number;
}

/**
 * Resolves the collections to search; throws for unknown folders
 */
export type CollectionResolver = (folders?: string[]) => Promise<string[]>;

export interface SearchServiceDeps {
  store: VectorStore;
  embedder: EmbeddingProvider;
  reranker?: RerankingProvider;
  resolveCollections: CollectionResolver;
  settings: SearchSettings;
}

export const DEFAULT_TOP_K = 10;

// ============================================================================
// SearchService Class
// ============================================================================

export class SearchService {
  private readonly deps: SearchServiceDeps;

  constructor(deps: SearchServiceDeps) {
    this.deps = deps;
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchHit[]> {
    const logger = getLogger();
    const { store, embedder, reranker, settings } = this.deps;
    const topK = Math.max(1, options.topK ?? DEFAULT_TOP_K);

    if (query.trim() === '') {
      return [];
    }

    const collections = await this.deps.resolveCollections(options.folders);
    if (collections.length === 0) {
      return [];
    }

    const vector = await embedder.embedQuery(query);
    const candidateLimit = topK * settings.candidateMultiplier;

    let hits: SearchHit[] = [];
    for (const collectionName of collections) {
      const results = await store.search(collectionName, vector, candidateLimit);
      for (const { fragment, score } of results) {
        if (score < settings.searchScoreThreshold) {
          continue;
        }
        hits.push({
          path: fragment.path,
          text: fragment.text,
          preview: fragment.text.slice(0, settings.previewChars),
          score,
          ordinal: fragment.ordinal,
          collectionName,
        });
      }
    }
    hits.sort((a, b) => b.score - a.score);

    logger.debug('SearchService', `Vector search returned ${hits.length} candidates`, {
      collections: collections.length,
    });

    const wantRerank = options.rerank ?? reranker !== undefined;
    if (wantRerank && !reranker) {
      logger.warn('SearchService', 'Rerank requested but no reranker is configured');
    }

    if (wantRerank && reranker && hits.length > 0) {
      hits = await this.rerank(reranker, query, hits);
    }

    return hits.slice(0, topK);
  }

  /**
   * Rescore candidates and keep those above the rerank threshold, best first
   */
  private async rerank(reranker: RerankingProvider, query: string, hits: SearchHit[]): Promise<SearchHit[]> {
    const ranked = await reranker.rerank(
      query,
      hits.map((hit) => hit.text),
      hits.length
    );

    // Texts may repeat across files; hand each score to the next unclaimed hit
    const byText = new Map<string, SearchHit[]>();
    for (const hit of hits) {
      const list = byText.get(hit.text);
      if (list) {
        list.push(hit);
      } else {
        byText.set(hit.text, [hit]);
      }
    }

    const result: SearchHit[] = [];
    for (const { text, score } of ranked) {
      const hit = byText.get(text)?.shift();
      if (hit && score >= this.deps.settings.rerankScoreThreshold) {
        result.push({ ...hit, rerankScore: score });
      }
    }

    return result.sort((a, b) => (b.rerankScore ?? 0) - (a.rerankScore ?? 0));
  }
}

/**
 * rag-folder-sync
 *
 * Keeps a vector-search index synchronized with watched folders.
 *
 * `createSyncEngine()` wires the configuration, logger, LanceDB store,
 * embedding and reranking models, extractor, worker pool and orchestrator,
 * restores previously watched folders and returns the running engine.
 *
 * @example
 * ```typescript
 * const engine = await createSyncEngine();
 * await engine.orchestrator.watchFolder('~/notes', ['text', 'pdf']);
 * const hits = await engine.search('how do I rotate the keys?', { topK: 5 });
 * await engine.close();
 * ```
 */

import { ExtractorGateway } from './engines/extraction.js';
import { TransformersEmbeddingProvider, type EmbeddingProvider } from './engines/embedding.js';
import { TransformersReranker, type RerankingProvider } from './engines/reranker.js';
import { SearchService, type SearchHit, type SearchOptions } from './engines/search.js';
import { WatcherOrchestrator } from './engines/watcherOrchestrator.js';
import type { NotificationSourceFactory } from './engines/notificationSource.js';
import { EngineConfigSchema, loadConfig, parseFileSize, type EngineConfig, type EngineConfigInput } from './storage/config.js';
import { LanceDBVectorStore } from './storage/lancedb.js';
import type { VectorStore } from './storage/vectorStore.js';
import { InvalidConfigError } from './errors/index.js';
import { registerCleanup, runCleanup, unregisterCleanup, isShutdownInProgress } from './utils/cleanup.js';
import { createLogger, flushLogger, getLogger } from './utils/logger.js';
import { WorkerPool } from './utils/workerPool.js';

// ============================================================================
// Types
// ============================================================================

export interface CreateSyncEngineOptions {
  /** Inline configuration; when omitted the config file is loaded */
  config?: EngineConfigInput;
  /** Config file read when `config` is omitted */
  configPath?: string;
  /** Write logs to files in this directory instead of the console */
  logDir?: string;
  /** Defaults to LanceDB at config.storagePath */
  store?: VectorStore;
  /** Defaults to the transformers model named by config.embeddingModel */
  embedder?: EmbeddingProvider;
  /** Defaults to config.rerankerModel; null disables reranking */
  reranker?: RerankingProvider | null;
  sourceFactory?: NotificationSourceFactory;
  /** Restore previously watched folders (default true) */
  restore?: boolean;
}

export interface SyncEngine {
  readonly config: EngineConfig;
  readonly orchestrator: WatcherOrchestrator;
  readonly store: VectorStore;
  search(query: string, options?: SearchOptions): Promise<SearchHit[]>;
  /** Stop every watcher, flush state and close the store */
  close(): Promise<void>;
}

// ============================================================================
// Composition Root
// ============================================================================

async function resolveConfig(options: CreateSyncEngineOptions): Promise<EngineConfig> {
  if (options.config === undefined) {
    return loadConfig(options.configPath);
  }
  const result = EngineConfigSchema.safeParse(options.config);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new InvalidConfigError('engine options', errors);
  }
  return result.data;
}

export async function createSyncEngine(options: CreateSyncEngineOptions = {}): Promise<SyncEngine> {
  if (options.logDir) {
    createLogger(options.logDir);
  }
  const logger = getLogger();
  const config = await resolveConfig(options);

  const embedder =
    options.embedder ??
    new TransformersEmbeddingProvider({
      modelName: config.embeddingModel,
      dimension: config.vectorSize,
      batchSize: config.embedBatchSize,
    });
  if (embedder.dimension !== config.vectorSize) {
    throw new InvalidConfigError(
      'vectorSize',
      `embedding model produces ${embedder.dimension} dimensions, config expects ${config.vectorSize}`
    );
  }

  let reranker: RerankingProvider | undefined;
  if (options.reranker !== undefined) {
    reranker = options.reranker ?? undefined;
  } else if (config.rerankerModel !== null) {
    reranker = new TransformersReranker(config.rerankerModel);
  }

  let store: VectorStore;
  if (options.store) {
    store = options.store;
  } else {
    const lance = new LanceDBVectorStore(config.storagePath);
    await lance.open();
    store = lance;
  }

  const extractor = new ExtractorGateway({
    maxFileSizeBytes: parseFileSize(config.maxFileSize),
    fallbackEncoding: config.fallbackEncoding,
    textExtensions: config.textExtensions,
    includeUnknownExtensions: config.includeUnknownExtensions,
  });
  const pool = new WorkerPool({
    concurrency: config.workerConcurrency,
    maxQueueDepth: config.maxQueueDepth,
  });

  const orchestrator = new WatcherOrchestrator({
    store,
    embedder,
    extractor,
    pool,
    config,
    sourceFactory: options.sourceFactory,
  });

  const searchService = new SearchService({
    store,
    embedder,
    reranker,
    resolveCollections: (folders) => orchestrator.resolveCollections(folders),
    settings: {
      searchScoreThreshold: config.searchScoreThreshold,
      rerankScoreThreshold: config.rerankScoreThreshold,
      previewChars: config.previewChars,
      candidateMultiplier: config.candidateMultiplier,
    },
  });

  let closePromise: Promise<void> | null = null;
  const close = (): Promise<void> => {
    if (!closePromise) {
      closePromise = (async () => {
        unregisterCleanup(close);
        await orchestrator.close();
        await store.close();
        logger.info('SyncEngine', 'Engine closed');
        await flushLogger();
      })();
    }
    return closePromise;
  };
  registerCleanup(close, 'SyncEngine');

  if (options.restore ?? true) {
    const restored = await orchestrator.restore();
    logger.info('SyncEngine', 'Engine ready', { folders: restored.length, storagePath: config.storagePath });
  }

  return {
    config,
    orchestrator,
    store,
    search: (query, searchOptions) => searchService.search(query, searchOptions),
    close,
  };
}

/**
 * Run every registered cleanup handler on SIGINT / SIGTERM, then exit
 */
export function installShutdownHandlers(): void {
  const shutdown = (signal: string): void => {
    if (isShutdownInProgress()) {
      return;
    }
    getLogger().info('SyncEngine', `Shutting down... (${signal})`);
    runCleanup()
      .catch((error: unknown) => {
        getLogger().error('SyncEngine', 'Cleanup failed', { error: String(error) });
      })
      .finally(() => {
        process.exit(0);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

// ============================================================================
// Library Exports
// ============================================================================

export { WatcherOrchestrator, collectionNameFor, type FolderStatusSnapshot } from './engines/watcherOrchestrator.js';
export { FolderSynchronizer, type StartMode, type SynchronizerProgress } from './engines/folderSynchronizer.js';
export { SearchService, type SearchHit, type SearchOptions } from './engines/search.js';
export { ExtractorGateway, type ContentCategory, type PdfBackend } from './engines/extraction.js';
export { TransformersEmbeddingProvider, type EmbeddingProvider } from './engines/embedding.js';
export { TransformersReranker, type RerankingProvider } from './engines/reranker.js';
export { ChokidarNotificationSource, type NotificationSource } from './engines/notificationSource.js';
export { chunkText, type TextWindow } from './engines/chunking.js';
export { identify, fragmentIdsFor } from './engines/fragmentIdentity.js';
export { EventDebouncer, type RawEvent, type SettledEvent } from './engines/eventDebouncer.js';
export { LanceDBVectorStore } from './storage/lancedb.js';
export type { VectorStore, Fragment, FragmentMetadata, VectorHit } from './storage/vectorStore.js';
export { loadConfig, getDefaultConfig, type EngineConfig, type EngineConfigInput } from './storage/config.js';
export type { WatchedFolder, FolderStatus } from './storage/watcherState.js';
export * from './errors/index.js';

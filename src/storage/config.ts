/**
 * Engine Configuration
 *
 * Provides configuration management for the synchronization engine:
 * - Zod schema validation with defaults for every field
 * - Loading from a JSON file with fallback to defaults
 * - Environment variable overrides
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import { getLogger } from '../utils/logger.js';
import { expandTilde, getDefaultConfigPath, getDefaultLanceDbPath } from '../utils/paths.js';

// ============================================================================
// File Size Parser
// ============================================================================

/**
 * Parse a file size string to bytes
 *
 * @example
 * ```typescript
 * parseFileSize('20MB')  // => 20971520
 * parseFileSize('500KB') // => 512000
 * ```
 */
export function parseFileSize(size: string): number {
  const match = size.match(/^(\d+)(KB|MB)$/i);
  if (!match) {
    throw new Error(`Invalid file size format: "${size}". Expected format like "20MB" or "500KB".`);
  }

  const value = parseInt(match[1], 10);
  return match[2].toUpperCase() === 'MB' ? value * 1024 * 1024 : value * 1024;
}

const FILE_SIZE_REGEX = /^\d+(KB|MB)$/i;

// ============================================================================
// Config Schema
// ============================================================================

/**
 * Extensions treated as plain text
 */
export const DEFAULT_TEXT_EXTENSIONS: readonly string[] = [
  // Programming languages
  '.c', '.cpp', '.cs', '.csproj', '.go', '.h', '.hpp', '.java', '.js', '.php',
  '.py', '.rb', '.rs', '.sln', '.ts',
  // Scripts and configs
  '.bat', '.cfg', '.ini', '.sh', '.toml', '.yaml', '.yml',
  // Markup and web
  '.txt', '.css', '.html', '.ipynb', '.json', '.log', '.md', '.xml',
];

export const RetryConfigSchema = z
  .object({
    attempts: z.number().int().positive().default(5),
    baseDelayMs: z.number().int().nonnegative().default(200),
    maxDelayMs: z.number().int().nonnegative().default(10000),
  })
  .strict();

export const EngineConfigSchema = z
  .object({
    /** LanceDB directory */
    storagePath: z.string().min(1).default(getDefaultLanceDbPath()),
    /** Prefix of every collection name */
    collectionPrefix: z
      .string()
      .regex(/^[A-Za-z0-9_-]+$/, 'Must contain only letters, digits, _ and -')
      .default('rag'),
    /** Embedding dimensionality */
    vectorSize: z.number().int().positive().default(768),
    embeddingModel: z.string().min(1).default('nomic-ai/nomic-embed-text-v1.5'),
    /** Cross-encoder used to rerank search results; null disables reranking */
    rerankerModel: z.string().min(1).nullable().default('Xenova/bge-reranker-base'),

    chunkSizeWords: z.number().int().positive().default(150),
    chunkOverlapRatio: z.number().min(0).lt(1).default(0.15),
    /** Windows shorter than this (after trimming) are not indexed */
    minChunkChars: z.number().int().nonnegative().default(10),

    /** Idle window of the event debouncer */
    debounceMs: z.number().int().nonnegative().default(500),
    workerConcurrency: z.number().int().positive().default(4),
    maxQueueDepth: z.number().int().positive().default(64),
    embedBatchSize: z.number().int().positive().default(32),
    persistIntervalMs: z.number().int().nonnegative().default(1000),
    sweepIntervalMs: z.number().int().positive().default(30000),
    retry: RetryConfigSchema.default({}),

    /** Maximum file size to extract (e.g., "20MB", "500KB") */
    maxFileSize: z
      .string()
      .regex(FILE_SIZE_REGEX, 'Must be a valid file size like "20MB" or "500KB"')
      .default('20MB'),
    /** Encoding used when a file is not valid UTF-8 */
    fallbackEncoding: z.enum(['latin1', 'utf16le', 'ascii']).default('latin1'),
    /** Glob patterns ignored by the scan and the watcher */
    exclude: z.array(z.string()).default(['**/node_modules/**', '**/.git/**']),
    textExtensions: z
      .array(z.string().regex(/^\.[^./\\]+$/, 'Must be an extension like ".md"'))
      .default([...DEFAULT_TEXT_EXTENSIONS]),
    /** Also index files whose extension is unlisted but not known to be binary */
    includeUnknownExtensions: z.boolean().default(false),

    searchScoreThreshold: z.number().default(0.15),
    rerankScoreThreshold: z.number().default(0.35),
    /** Candidates fetched per collection, as a multiple of topK */
    candidateMultiplier: z.number().int().positive().default(3),
    previewChars: z.number().int().nonnegative().default(100),
  })
  .strict()
  .refine((config) => Math.round(config.chunkSizeWords * config.chunkOverlapRatio) < config.chunkSizeWords, {
    message: 'chunkOverlapRatio leaves no step between windows',
    path: ['chunkOverlapRatio'],
  });

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

/**
 * Defaults for every field
 */
export function getDefaultConfig(): EngineConfig {
  return EngineConfigSchema.parse({});
}

// ============================================================================
// Config I/O
// ============================================================================

/**
 * Apply environment variable overrides
 *
 * - RAG_SYNC_STORAGE_PATH: storagePath
 * - RAG_SYNC_DEBOUNCE_MS: debounceMs
 */
export function applyEnvOverrides(config: EngineConfig, env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const result = { ...config };

  const storagePath = env.RAG_SYNC_STORAGE_PATH;
  if (storagePath && storagePath.trim() !== '') {
    result.storagePath = expandTilde(storagePath.trim());
  }

  const debounce = env.RAG_SYNC_DEBOUNCE_MS;
  if (debounce !== undefined) {
    const parsed = Number(debounce);
    if (Number.isInteger(parsed) && parsed >= 0) {
      result.debounceMs = parsed;
    } else {
      getLogger().warn('ConfigManager', 'Ignoring invalid RAG_SYNC_DEBOUNCE_MS', { value: debounce });
    }
  }

  return result;
}

/**
 * Load the engine configuration
 *
 * Falls back to defaults if:
 * - File doesn't exist
 * - File is not valid JSON
 * - Content fails schema validation
 *
 * Environment overrides are applied in every case.
 *
 * @param configPath - JSON file (defaults to ~/.rag-folder-sync/config.json)
 */
export async function loadConfig(
  configPath: string = getDefaultConfigPath(),
  env: NodeJS.ProcessEnv = process.env
): Promise<EngineConfig> {
  const logger = getLogger();
  let config = getDefaultConfig();

  try {
    const content = await fs.promises.readFile(configPath, 'utf-8');
    const result = EngineConfigSchema.safeParse(JSON.parse(content));

    if (result.success) {
      config = result.data;
      logger.debug('ConfigManager', 'Config loaded successfully', { configPath });
    } else {
      const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
      logger.warn('ConfigManager', 'Config validation failed, using defaults', { configPath, errors });
    }
  } catch (error) {
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError.code === 'ENOENT') {
      logger.debug('ConfigManager', 'No config file found, using defaults', { configPath });
    } else {
      logger.warn('ConfigManager', 'Failed to load config, using defaults', {
        configPath,
        error: nodeError.message,
      });
    }
  }

  config.storagePath = expandTilde(config.storagePath);
  return applyEnvOverrides(config, env);
}

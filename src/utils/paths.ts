/**
 * Path Utilities Module
 *
 * Provides cross-platform path manipulation utilities for:
 * - Path normalization (absolute paths, separator normalization)
 * - Containment checks between watched roots
 * - Storage path helpers
 */

import * as path from 'node:path';
import * as os from 'node:os';
import { minimatch } from 'minimatch';

// ============================================================================
// Path Normalization
// ============================================================================

/**
 * Normalize a path to absolute form with consistent separators
 *
 * - Resolves to absolute path
 * - Normalizes separators (removes redundant separators)
 * - Removes trailing slashes (except for root paths)
 * - Normalizes Unicode to NFC
 *
 * @example
 * ```typescript
 * normalizePath('./docs/notes/')
 * // => '/Users/dev/docs/notes' (Unix)
 * ```
 */
export function normalizePath(inputPath: string): string {
  let normalized = path.normalize(path.resolve(inputPath)).normalize('NFC');

  // Remove trailing separator (except for root paths like '/' or 'C:\')
  if (normalized.length > 1 && normalized.endsWith(path.sep)) {
    normalized = normalized.slice(0, -1);
  }

  // Handle Windows drive root case (e.g., 'C:' -> 'C:\')
  if (process.platform === 'win32' && /^[A-Za-z]:$/.test(normalized)) {
    normalized = normalized + path.sep;
  }

  return normalized;
}

/**
 * Check if a path is within a directory (or is the directory itself)
 */
export function isWithinDirectory(targetPath: string, directoryPath: string): boolean {
  const normalizedTarget = normalizePath(targetPath);
  const normalizedDir = normalizePath(directoryPath);
  const prefix = normalizedDir.endsWith(path.sep) ? normalizedDir : normalizedDir + path.sep;

  // On Windows, compare case-insensitively
  if (process.platform === 'win32') {
    const lowerTarget = normalizedTarget.toLowerCase();
    return lowerTarget === normalizedDir.toLowerCase() || lowerTarget.startsWith(prefix.toLowerCase());
  }

  return normalizedTarget === normalizedDir || normalizedTarget.startsWith(prefix);
}

/**
 * Convert an absolute path to a forward-slash path relative to a root
 */
export function toRelativePath(absolutePath: string, basePath: string): string {
  return path.relative(basePath, absolutePath).split(path.sep).join('/');
}

/**
 * Check a forward-slash relative path against glob patterns
 *
 * @example
 * ```typescript
 * matchesAnyPattern('lib/node_modules/x/index.js', ['**\/node_modules/**']) // => true
 * ```
 */
export function matchesAnyPattern(relativePath: string, patterns: readonly string[]): boolean {
  const normalized = relativePath.normalize('NFC');
  return patterns.some((pattern) => minimatch(normalized, pattern, { dot: true }));
}

/**
 * Lowercased extension including the dot ('' when there is none)
 */
export function getExtension(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}

/**
 * Expand a leading ~ to the user's home directory
 */
export function expandTilde(inputPath: string): string {
  if (inputPath === '~') {
    return os.homedir();
  }
  if (inputPath.startsWith('~/') || inputPath.startsWith('~\\')) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  return inputPath;
}

// ============================================================================
// Storage Path Helpers
// ============================================================================

/** Base storage directory under home */
const STORAGE_BASE = '.rag-folder-sync';

/**
 * Get the storage root directory (~/.rag-folder-sync)
 */
export function getStorageRoot(): string {
  return path.join(os.homedir(), STORAGE_BASE);
}

/**
 * Default LanceDB directory (~/.rag-folder-sync/lancedb)
 */
export function getDefaultLanceDbPath(): string {
  return path.join(getStorageRoot(), 'lancedb');
}

/**
 * Default configuration file (~/.rag-folder-sync/config.json)
 */
export function getDefaultConfigPath(): string {
  return path.join(getStorageRoot(), 'config.json');
}

/**
 * Hash Utilities Module
 *
 * Provides SHA256 hashing utilities for:
 * - String content hashing (collection name suffixes)
 * - File content fingerprinting (change detection)
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import { getLogger } from './logger.js';
import { ExtractionError } from '../errors/index.js';

/**
 * Files above this size are hashed with a stream instead of a single read
 */
const STREAMING_THRESHOLD = 10 * 1024 * 1024; // 10MB

/**
 * Content fingerprint of a file at the time it was hashed
 */
export interface FileFingerprint {
  /** SHA256 hex digest of the file bytes */
  fingerprint: string;
  /** Inode number, used to pair move notifications */
  inode: number;
  /** Size in bytes */
  size: number;
  /** Modification time in milliseconds */
  mtimeMs: number;
}

/**
 * Compute SHA256 hash of a string
 *
 * @example
 * ```typescript
 * hashString('hello world')
 * // => 'b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9'
 * ```
 */
export function hashString(input: string): string {
  return crypto.createHash('sha256').update(input, 'utf8').digest('hex');
}

/**
 * Compute SHA256 hash of a file using streaming
 */
async function hashFileStream(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash('sha256');
    const stream = fs.createReadStream(filePath);

    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('end', () => resolve(hash.digest('hex')));
    stream.on('error', reject);
  });
}

/**
 * Fingerprint a file's content
 *
 * Returns null when the file no longer exists (it may have been deleted
 * between the notification and processing).
 *
 * @param filePath - Absolute path to the file
 * @throws ExtractionError if the path is not a regular file or can't be read
 */
export async function fingerprintFile(filePath: string): Promise<FileFingerprint | null> {
  const logger = getLogger();

  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(filePath);
  } catch (error) {
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError.code === 'ENOENT' || nodeError.code === 'ENOTDIR') {
      return null;
    }
    throw new ExtractionError(filePath, `cannot stat file: ${nodeError.message}`, nodeError);
  }

  if (!stats.isFile()) {
    throw new ExtractionError(filePath, 'not a regular file');
  }

  try {
    let fingerprint: string;
    if (stats.size > STREAMING_THRESHOLD) {
      logger.debug('hash', `Using streaming for large file: ${filePath}`, { size: stats.size });
      fingerprint = await hashFileStream(filePath);
    } else {
      const content = await fs.promises.readFile(filePath);
      fingerprint = crypto.createHash('sha256').update(content).digest('hex');
    }

    return {
      fingerprint,
      inode: stats.ino,
      size: stats.size,
      mtimeMs: stats.mtimeMs,
    };
  } catch (error) {
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError.code === 'ENOENT') {
      return null;
    }
    throw new ExtractionError(filePath, `cannot read file: ${nodeError.message}`, nodeError);
  }
}

/**
 * Cleanup Registry Module
 *
 * Resources that hold open handles (folder synchronizers, the orchestrator's
 * sweep timer, the vector store) register a shutdown handler here. Handlers
 * run in LIFO order so that a resource is closed before the ones it depends
 * on, and one failing handler does not stop the rest.
 */

import { getLogger } from './logger.js';

export type CleanupHandler = () => Promise<void>;

interface CleanupHandlerEntry {
  handler: CleanupHandler;
  name: string;
}

/**
 * Default timeout for each cleanup handler in milliseconds (30 seconds)
 */
export const DEFAULT_CLEANUP_TIMEOUT = 30000;

const cleanupHandlers: CleanupHandlerEntry[] = [];

let isShuttingDown = false;
let cleanupCompleted = false;

/**
 * Register a cleanup handler to be called on shutdown.
 *
 * @example
 * ```typescript
 * const handler = async () => this.stop();
 * registerCleanup(handler, `FolderSynchronizer:${root}`);
 * ```
 */
export function registerCleanup(handler: CleanupHandler, name: string = 'anonymous'): void {
  if (isShuttingDown || cleanupCompleted) {
    getLogger().warn('cleanup', 'Attempted to register handler during/after shutdown', { name });
    return;
  }

  cleanupHandlers.push({ handler, name });
  getLogger().debug('cleanup', `Registered cleanup handler: ${name}`, {
    totalHandlers: cleanupHandlers.length,
  });
}

/**
 * Unregister a handler whose resource was closed before shutdown
 */
export function unregisterCleanup(handler: CleanupHandler): void {
  const index = cleanupHandlers.findIndex((entry) => entry.handler === handler);
  if (index === -1) {
    return;
  }
  const [removed] = cleanupHandlers.splice(index, 1);
  getLogger().debug('cleanup', `Unregistered cleanup handler: ${removed.name}`, {
    totalHandlers: cleanupHandlers.length,
  });
}

async function runWithTimeout(entry: CleanupHandlerEntry, timeoutMs: number): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new Error(`Cleanup handler '${entry.name}' timed out after ${timeoutMs}ms`)),
      timeoutMs
    );
  });

  try {
    await Promise.race([entry.handler(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Run all cleanup handlers in reverse registration order.
 * Subsequent calls are no-ops.
 */
export async function runCleanup(timeoutMs: number = DEFAULT_CLEANUP_TIMEOUT): Promise<void> {
  const logger = getLogger();

  if (isShuttingDown || cleanupCompleted) {
    logger.debug('cleanup', 'Cleanup already in progress or completed, skipping');
    return;
  }

  isShuttingDown = true;
  const handlersToRun = cleanupHandlers.splice(0).reverse();
  logger.info('cleanup', `Running ${handlersToRun.length} cleanup handlers...`);

  for (const entry of handlersToRun) {
    try {
      logger.debug('cleanup', `Running cleanup handler: ${entry.name}`);
      await runWithTimeout(entry, timeoutMs);
    } catch (error) {
      logger.error('cleanup', `Cleanup handler '${entry.name}' failed`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  cleanupCompleted = true;
  logger.info('cleanup', 'All cleanup handlers completed');
}

export function isShutdownInProgress(): boolean {
  return isShuttingDown && !cleanupCompleted;
}

export function getCleanupHandlerCount(): number {
  return cleanupHandlers.length;
}

/**
 * Reset the registry. Only for tests.
 */
export function resetCleanupRegistry(): void {
  cleanupHandlers.length = 0;
  isShuttingDown = false;
  cleanupCompleted = false;
}

/**
 * LanceDB Vector Store
 *
 * `VectorStore` adapter over an embedded LanceDB database. Each collection
 * is one LanceDB table; a separate table holds opaque metadata blobs such
 * as the persisted watcher state.
 *
 * Features:
 * - Lazy table creation on first upsert (LanceDB infers the schema from data)
 * - Upsert by id via merge-insert
 * - Cosine vector search
 * - In-place path rewrite for renamed files
 */

import * as lancedb from '@lancedb/lancedb';
import * as fs from 'node:fs';
import { z } from 'zod';
import { getLogger } from '../utils/logger.js';
import { registerCleanup, unregisterCleanup, CleanupHandler } from '../utils/cleanup.js';
import { IndexStoreError, wrapError } from '../errors/index.js';
import { AsyncMutex } from '../utils/asyncMutex.js';
import type { DistanceMetric, Fragment, FragmentMetadata, VectorHit, VectorStore } from './vectorStore.js';

// ============================================================================
// Row Schemas
// ============================================================================

/**
 * Table holding metadata blobs
 */
export const METADATA_TABLE = '_sync_metadata';

/**
 * Columns read back for fragment payloads (the vector is never read)
 */
const FRAGMENT_COLUMNS = [
  'id',
  'path',
  'text',
  'ordinal',
  'total_fragments',
  'fingerprint',
  'word_start',
  'word_end',
  'char_start',
  'char_end',
  'indexed_at',
];

const FragmentRowSchema = z.object({
  id: z.string(),
  path: z.string(),
  text: z.string(),
  ordinal: z.number(),
  total_fragments: z.number(),
  fingerprint: z.string(),
  word_start: z.number(),
  word_end: z.number(),
  char_start: z.number(),
  char_end: z.number(),
  indexed_at: z.string(),
});

type FragmentRow = z.infer<typeof FragmentRowSchema>;

const HitRowSchema = FragmentRowSchema.extend({
  _distance: z.number(),
});

const MetadataRowSchema = z.object({
  id: z.string(),
  payload: z.string(),
});

/**
 * Row layout written to LanceDB (snake_case columns)
 *
 * The index signature is required for LanceDB's record input type.
 */
interface FragmentRecord extends FragmentRow {
  vector: number[];
  [key: string]: string | number | number[];
}

function toRecord(fragment: Fragment): FragmentRecord {
  return {
    id: fragment.id,
    path: fragment.path,
    text: fragment.text,
    vector: fragment.vector,
    ordinal: fragment.ordinal,
    total_fragments: fragment.totalFragments,
    fingerprint: fragment.fingerprint,
    word_start: fragment.wordStart,
    word_end: fragment.wordEnd,
    char_start: fragment.charStart,
    char_end: fragment.charEnd,
    indexed_at: fragment.indexedAt,
  };
}

function fromRow(row: FragmentRow): FragmentMetadata {
  return {
    id: row.id,
    path: row.path,
    text: row.text,
    ordinal: row.ordinal,
    totalFragments: row.total_fragments,
    fingerprint: row.fingerprint,
    wordStart: row.word_start,
    wordEnd: row.word_end,
    charStart: row.char_start,
    charEnd: row.char_end,
    indexedAt: row.indexed_at,
  };
}

const ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * SQL `IN` predicate over ids
 *
 * Ids are UUID-shaped (fragment ids and fixed metadata keys); anything else
 * is rejected so that no caller-controlled text reaches the filter expression.
 */
function idPredicate(ids: string[]): string {
  for (const id of ids) {
    if (!ID_PATTERN.test(id)) {
      throw new IndexStoreError('filter', `invalid id: ${id.substring(0, 50)}`);
    }
  }
  return `id IN (${ids.map((id) => `'${id}'`).join(', ')})`;
}

/**
 * Cosine distance (0..2) to cosine similarity (-1..1)
 */
export function distanceToScore(distance: number): number {
  return 1 - distance;
}

// ============================================================================
// LanceDBVectorStore Class
// ============================================================================

/**
 * @example
 * ```typescript
 * const store = new LanceDBVectorStore('~/.rag-folder-sync/lancedb');
 * await store.open();
 * await store.ensureCollection('rag_home_me_notes', 768, 'cosine');
 * await store.upsert('rag_home_me_notes', fragments);
 * ```
 */
export class LanceDBVectorStore implements VectorStore {
  private readonly dbPath: string;
  private db: lancedb.Connection | null = null;
  private readonly tables = new Map<string, lancedb.Table>();
  /** Declared vector size per collection */
  private readonly vectorSizes = new Map<string, number>();
  private isOpen = false;

  /** Serializes every database operation */
  private readonly mutex = new AsyncMutex('LanceDBVectorStore');

  private cleanupHandler: CleanupHandler | null = null;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  // --------------------------------------------------------------------------
  // Lifecycle Methods
  // --------------------------------------------------------------------------

  /**
   * Open the database, creating its directory if needed
   */
  async open(): Promise<void> {
    const logger = getLogger();

    if (this.isOpen) {
      logger.debug('lancedb', 'Database already open');
      return;
    }

    try {
      await fs.promises.mkdir(this.dbPath, { recursive: true });
      this.db = await lancedb.connect(this.dbPath);
      this.isOpen = true;

      this.cleanupHandler = async () => {
        await this.close();
      };
      registerCleanup(this.cleanupHandler, 'LanceDBVectorStore');

      logger.info('lancedb', 'Database opened successfully', { dbPath: this.dbPath });
    } catch (error) {
      throw wrapError(error, (cause) => new IndexStoreError('open', `cannot open ${this.dbPath}: ${cause.message}`, cause));
    }
  }

  /**
   * Close the connection. Safe to call multiple times.
   */
  async close(): Promise<void> {
    if (!this.isOpen) {
      return;
    }

    if (this.cleanupHandler) {
      unregisterCleanup(this.cleanupHandler);
      this.cleanupHandler = null;
    }

    await this.mutex.withLock(async () => {
      // Local connections hold no sockets; dropping the references is enough
      this.tables.clear();
      this.db = null;
      this.isOpen = false;
    });

    getLogger().debug('lancedb', 'Database connection closed');
  }

  // --------------------------------------------------------------------------
  // Private Helpers
  // --------------------------------------------------------------------------

  private getConnection(operation: string): lancedb.Connection {
    if (!this.isOpen || !this.db) {
      throw new IndexStoreError(operation, 'database is not open');
    }
    return this.db;
  }

  /**
   * Open a table if it exists; null otherwise
   */
  private async findTable(operation: string, name: string): Promise<lancedb.Table | null> {
    const cached = this.tables.get(name);
    if (cached) {
      return cached;
    }

    const db = this.getConnection(operation);
    const names = await db.tableNames();
    if (!names.includes(name)) {
      return null;
    }

    const table = await db.openTable(name);
    this.tables.set(name, table);
    return table;
  }

  /**
   * Run an operation under the mutex, wrapping failures in IndexStoreError
   */
  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return this.mutex.withLock(async () => {
      try {
        return await fn();
      } catch (error) {
        throw wrapError(error, (cause) => new IndexStoreError(operation, cause.message, cause));
      }
    });
  }

  // --------------------------------------------------------------------------
  // Collections
  // --------------------------------------------------------------------------

  async ensureCollection(name: string, vectorSize: number, metric: DistanceMetric): Promise<void> {
    return this.run('ensureCollection', async () => {
      this.getConnection('ensureCollection');
      this.vectorSizes.set(name, vectorSize);
      getLogger().debug('lancedb', `Collection declared: ${name}`, { vectorSize, metric });
    });
  }

  async dropCollection(name: string): Promise<void> {
    return this.run('dropCollection', async () => {
      const db = this.getConnection('dropCollection');
      this.tables.delete(name);
      this.vectorSizes.delete(name);

      const names = await db.tableNames();
      if (names.includes(name)) {
        await db.dropTable(name);
        getLogger().info('lancedb', `Dropped collection: ${name}`);
      }
    });
  }

  // --------------------------------------------------------------------------
  // Fragments
  // --------------------------------------------------------------------------

  /**
   * Insert or replace fragments
   *
   * The table is created with the first batch when it doesn't exist yet.
   */
  async upsert(collection: string, fragments: Fragment[]): Promise<void> {
    if (fragments.length === 0) {
      return;
    }

    return this.run('upsert', async () => {
      const expected = this.vectorSizes.get(collection);
      for (const fragment of fragments) {
        if (expected !== undefined && fragment.vector.length !== expected) {
          throw new IndexStoreError(
            'upsert',
            `vector dimension mismatch in ${collection}: expected ${expected}, got ${fragment.vector.length}`
          );
        }
      }

      const records = fragments.map(toRecord);
      const table = await this.findTable('upsert', collection);

      if (!table) {
        const created = await this.getConnection('upsert').createTable(collection, records);
        this.tables.set(collection, created);
        getLogger().info('lancedb', `Created collection table: ${collection}`);
        return;
      }

      await table.mergeInsert('id').whenMatchedUpdateAll().whenNotMatchedInsertAll().execute(records);
      getLogger().debug('lancedb', `Upserted ${records.length} fragments into ${collection}`);
    });
  }

  async delete(collection: string, ids: string[]): Promise<void> {
    if (ids.length === 0) {
      return;
    }

    return this.run('delete', async () => {
      const table = await this.findTable('delete', collection);
      if (!table) {
        return;
      }
      await table.delete(idPredicate(ids));
      getLogger().debug('lancedb', `Deleted ${ids.length} fragments from ${collection}`);
    });
  }

  async relocate(collection: string, ids: string[], newPath: string): Promise<void> {
    if (ids.length === 0) {
      return;
    }

    return this.run('relocate', async () => {
      const table = await this.findTable('relocate', collection);
      if (!table) {
        return;
      }
      await table.update({ where: idPredicate(ids), values: { path: newPath } });
      getLogger().debug('lancedb', `Relocated ${ids.length} fragments in ${collection}`, { newPath });
    });
  }

  async listFragments(collection: string): Promise<FragmentMetadata[]> {
    return this.run('listFragments', async () => {
      const table = await this.findTable('listFragments', collection);
      if (!table) {
        return [];
      }

      const total = await table.countRows();
      if (total === 0) {
        return [];
      }

      const rows = await table.query().select(FRAGMENT_COLUMNS).limit(total).toArray();
      return rows.map((row) => fromRow(FragmentRowSchema.parse(row)));
    });
  }

  async search(collection: string, vector: number[], limit: number): Promise<VectorHit[]> {
    return this.run('search', async () => {
      const table = await this.findTable('search', collection);
      if (!table) {
        return [];
      }

      const rows = await table
        .vectorSearch(vector)
        .distanceType('cosine')
        .select(FRAGMENT_COLUMNS)
        .limit(Math.max(1, limit))
        .toArray();

      return rows.map((row) => {
        const parsed = HitRowSchema.parse(row);
        return { fragment: fromRow(parsed), score: distanceToScore(parsed._distance) };
      });
    });
  }

  // --------------------------------------------------------------------------
  // Metadata
  // --------------------------------------------------------------------------

  async getMetadata(id: string): Promise<string | null> {
    return this.run('getMetadata', async () => {
      const table = await this.findTable('getMetadata', METADATA_TABLE);
      if (!table) {
        return null;
      }

      const rows = await table.query().where(idPredicate([id])).limit(1).toArray();
      if (rows.length === 0) {
        return null;
      }
      return MetadataRowSchema.parse(rows[0]).payload;
    });
  }

  async putMetadata(id: string, blob: string): Promise<void> {
    return this.run('putMetadata', async () => {
      const record = { id, payload: blob };
      idPredicate([id]);

      const table = await this.findTable('putMetadata', METADATA_TABLE);
      if (!table) {
        const created = await this.getConnection('putMetadata').createTable(METADATA_TABLE, [record]);
        this.tables.set(METADATA_TABLE, created);
        return;
      }

      await table.mergeInsert('id').whenMatchedUpdateAll().whenNotMatchedInsertAll().execute([record]);
    });
  }
}

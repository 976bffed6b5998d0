/**
 * Vector Store contract
 *
 * The synchronization engine reaches the index only through this interface.
 * `LanceDBVectorStore` is the shipped adapter; tests use an in-memory one.
 * Every method rejects with `IndexStoreError` on failure.
 */

/**
 * Only cosine similarity is supported
 */
export type DistanceMetric = 'cosine';

/**
 * Payload of one indexed fragment (everything but the vector)
 */
export interface FragmentMetadata {
  id: string;
  text: string;
  /** Absolute path of the source file */
  path: string;
  ordinal: number;
  totalFragments: number;
  /** SHA256 of the file bytes the fragment was extracted from */
  fingerprint: string;
  wordStart: number;
  wordEnd: number;
  charStart: number;
  charEnd: number;
  /** ISO 8601 */
  indexedAt: string;
}

export interface Fragment extends FragmentMetadata {
  vector: number[];
}

export interface VectorHit {
  fragment: FragmentMetadata;
  /** Cosine similarity, higher is closer */
  score: number;
}

export interface VectorStore {
  /**
   * Declare a collection. Idempotent.
   */
  ensureCollection(name: string, vectorSize: number, metric: DistanceMetric): Promise<void>;

  /**
   * Insert fragments, replacing any with the same id
   */
  upsert(collection: string, fragments: Fragment[]): Promise<void>;

  /**
   * Delete fragments by id. Unknown ids are ignored.
   */
  delete(collection: string, ids: string[]): Promise<void>;

  /**
   * Rewrite the path of existing fragments without re-embedding them
   */
  relocate(collection: string, ids: string[], newPath: string): Promise<void>;

  /**
   * All fragment payloads of a collection
   */
  listFragments(collection: string): Promise<FragmentMetadata[]>;

  search(collection: string, vector: number[], limit: number): Promise<VectorHit[]>;

  /**
   * Remove a collection and everything in it. Unknown names are ignored.
   */
  dropCollection(name: string): Promise<void>;

  getMetadata(id: string): Promise<string | null>;

  putMetadata(id: string, blob: string): Promise<void>;

  close(): Promise<void>;
}

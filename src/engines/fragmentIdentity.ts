/**
 * Fragment Identity
 *
 * Fragment ids are UUID v5 values derived from (path, fingerprint, ordinal).
 * The same content at the same path always maps to the same ids, and a new
 * fingerprint maps to a disjoint set, so old and new fragments of a file
 * never collide in the index.
 */

import { v5 as uuidv5 } from 'uuid';

/**
 * Namespace for all fragment ids
 */
export const FRAGMENT_NAMESPACE = '6f1c1d0e-52a4-4c43-9a5e-2b7f3c8d9e10';

export type FragmentId = string;

export function identify(filePath: string, fingerprint: string, ordinal: number): FragmentId {
  return uuidv5(`${filePath}\0${fingerprint}\0${ordinal}`, FRAGMENT_NAMESPACE);
}

/**
 * Ids of ordinals 0..count-1
 */
export function fragmentIdsFor(filePath: string, fingerprint: string, count: number): FragmentId[] {
  const ids: FragmentId[] = [];
  for (let ordinal = 0; ordinal < count; ordinal++) {
    ids.push(identify(filePath, fingerprint, ordinal));
  }
  return ids;
}

import type { BlobReference, IndexEntry } from "./storageTypes.js";

/** Orders keys by their UTF-8 bytes, the order S3 lists them in. */
export function compareKeys(a: string, b: string): number {
  if (a === b) return 0;
  return Buffer.compare(Buffer.from(a, "utf-8"), Buffer.from(b, "utf-8"));
}

export interface ListSortedOptions {
  prefix?: string;
  /** Only keys strictly greater than this are returned. */
  startAfter?: string;
}

/**
 * Key to current-version mapping for a single bucket.
 *
 * Entries are frozen and replaced wholesale on overwrite, never mutated, so
 * anything holding an entry keeps seeing one consistent version of it.
 */
export class ObjectIndex {
  private entries = new Map<string, IndexEntry>();

  get size(): number {
    return this.entries.size;
  }

  isEmpty(): boolean {
    return this.entries.size === 0;
  }

  /**
   * Inserts or replaces the entry for `entry.key` and returns the blob the
   * previous version pointed at, which the caller now owns and must release.
   */
  put(entry: IndexEntry): BlobReference | undefined {
    const previous = this.entries.get(entry.key);
    this.entries.set(entry.key, Object.freeze({ ...entry, metadata: { ...entry.metadata } }));
    return previous?.blobRef;
  }

  get(key: string): IndexEntry | undefined {
    return this.entries.get(key);
  }

  /** Returns the released entry's blob, or `undefined` when the key was absent. */
  delete(key: string): BlobReference | undefined {
    const previous = this.entries.get(key);
    if (!previous) return undefined;
    this.entries.delete(key);
    return previous.blobRef;
  }

  /**
   * Snapshot of the index at call time in ascending key order. Each call takes
   * a new snapshot; writes after the call are not reflected in the iterator.
   */
  listSorted(options: ListSortedOptions = {}): IterableIterator<IndexEntry> {
    const prefix = options.prefix ?? "";
    const snapshot: IndexEntry[] = [];
    for (const entry of this.entries.values()) {
      if (entry.key.startsWith(prefix)) snapshot.push(entry);
    }
    snapshot.sort((a, b) => compareKeys(a.key, b.key));
    return iterateAfter(snapshot, options.startAfter);
  }
}

function* iterateAfter(sorted: IndexEntry[], startAfter: string | undefined): Generator<IndexEntry> {
  for (const entry of sorted) {
    if (startAfter && compareKeys(entry.key, startAfter) <= 0) continue;
    yield entry;
  }
}

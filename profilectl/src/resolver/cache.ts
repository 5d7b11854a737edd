import type { ConfigMapping, LoadedConfig } from "../types/config-document.js";
import type { SourceMap } from "../types/resolution.js";

/** A resolved config as the resolver keeps it: tagged tree plus provenance. */
export type ResolvedEntry = {
  key: string;
  name: string;
  value: ConfigMapping;
  sourceMap: SourceMap;
  /** Root to leaf. */
  chain: string[];
  /** Every document merged into this entry, root to leaf, with the checksum it had. */
  documents: LoadedConfig[];
  instantiable: boolean;
};

/** Digest of the file at `relPath` as it is now, or null when there is none. */
export type ChecksumSource = (relPath: string) => string | null;

/**
 * Resolution cache keyed by lookup key. An entry is only served while every
 * document in its chain still has the checksum it was built from and no file
 * has appeared ahead of one in its search order; stale entries are dropped
 * on read.
 */
export class ResolutionCache {
  private entries = new Map<string, ResolvedEntry>();

  get(key: string, current: ChecksumSource): ResolvedEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    const fresh = entry.documents.every(
      (d) => current(d.path) === d.checksum && d.shadowedBy.every((candidate) => current(candidate) === null),
    );
    if (!fresh) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  set(entry: ResolvedEntry): void {
    this.entries.set(entry.key, entry);
  }

  /**
   * Evict every entry whose chain includes `relPath`, which covers all
   * descendants of that document. Without a path the cache is cleared.
   */
  invalidate(relPath?: string): number {
    if (relPath === undefined) {
      const n = this.entries.size;
      this.entries.clear();
      return n;
    }
    let evicted = 0;
    for (const [key, entry] of this.entries) {
      if (entry.documents.some((d) => d.path === relPath)) {
        this.entries.delete(key);
        evicted++;
      }
    }
    return evicted;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }
}

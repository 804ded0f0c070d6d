import { Artifact } from '@domain/types/responses';
import { CacheBackend, CacheUsage } from './types';

export interface LruCacheOptions {
  maxEntries: number;
  maxBytes: number;
  /** 0 disables expiry. */
  ttlSeconds: number;
  now?: () => number;
}

interface Entry {
  artifact: Artifact;
  expiresAt: number;
}

/**
 * In-process LRU bounded by entry count and total artifact bytes. Map
 * insertion order doubles as recency order: a hit re-inserts the key.
 */
export class LruCacheBackend implements CacheBackend {
  readonly name = 'memory';
  private readonly entries = new Map<string, Entry>();
  private bytes = 0;
  private evictions = 0;
  private readonly now: () => number;

  constructor(private readonly options: LruCacheOptions) {
    this.now = options.now ?? Date.now;
  }

  async get(fingerprint: string): Promise<Artifact | null> {
    const entry = this.entries.get(fingerprint);
    if (!entry) return null;

    if (this.isExpired(entry)) {
      this.remove(fingerprint, entry);
      return null;
    }

    this.entries.delete(fingerprint);
    this.entries.set(fingerprint, entry);
    return entry.artifact;
  }

  async set(fingerprint: string, artifact: Artifact): Promise<boolean> {
    const size = artifact.buffer.length;
    if (size > this.options.maxBytes) return false;

    const existing = this.entries.get(fingerprint);
    if (existing) this.remove(fingerprint, existing);

    this.entries.set(fingerprint, {
      artifact,
      expiresAt: this.options.ttlSeconds > 0 ? this.now() + this.options.ttlSeconds * 1000 : Infinity,
    });
    this.bytes += size;
    this.evict();
    return true;
  }

  async delete(fingerprint: string): Promise<boolean> {
    const entry = this.entries.get(fingerprint);
    if (!entry) return false;
    this.remove(fingerprint, entry);
    return true;
  }

  usage(): CacheUsage {
    return { entries: this.entries.size, bytes: this.bytes, evictions: this.evictions };
  }

  async ping(): Promise<void> {
    return;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  private evict(): void {
    for (const [fingerprint, entry] of this.entries) {
      if (this.entries.size <= this.options.maxEntries && this.bytes <= this.options.maxBytes) break;
      this.remove(fingerprint, entry);
      this.evictions++;
    }
  }

  private remove(fingerprint: string, entry: Entry): void {
    this.entries.delete(fingerprint);
    this.bytes -= entry.artifact.buffer.length;
  }

  private isExpired(entry: Entry): boolean {
    return this.now() >= entry.expiresAt;
  }
}

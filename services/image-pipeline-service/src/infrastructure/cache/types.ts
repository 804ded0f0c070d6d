import { Artifact } from '@domain/types/responses';

export interface CacheUsage {
  entries: number;
  bytes: number;
  evictions: number;
}

/** Storage for finished artifacts, keyed by fingerprint. */
export interface CacheBackend {
  readonly name: string;
  get(fingerprint: string): Promise<Artifact | null>;
  set(fingerprint: string, artifact: Artifact): Promise<boolean>;
  delete(fingerprint: string): Promise<boolean>;
  /** Null when the backend cannot report its own footprint. */
  usage(): CacheUsage | null;
  ping(): Promise<void>;
}

import { ImageFormat, JobState } from './common';

export interface ImageMetadata {
  width: number;
  height: number;
  format: ImageFormat;
  mimeType: string;
  size: number;
  hasAlpha: boolean;
}

export interface ImageRecord {
  id: string;
  ownerId: string;
  storageKey: string;
  contentHash: string;
  width: number;
  height: number;
  format: ImageFormat;
  mimeType: string;
  size: number;
  hasAlpha: boolean;
  createdAt: string;
}

export interface Artifact {
  fingerprint: string;
  buffer: Buffer;
  metadata: ImageMetadata;
  createdAt: string;
}

/** Artifact without its bytes, as reported by job status queries. */
export interface ArtifactRef {
  fingerprint: string;
  width: number;
  height: number;
  format: ImageFormat;
  mimeType: string;
  size: number;
}

export interface JobError {
  code: string;
  message: string;
}

export interface JobRecord {
  id: string;
  fingerprint: string;
  imageId: string;
  /** User whose request created the job. */
  userId: string;
  /** Every user whose request attached to the job, the creator included. */
  subscribers: string[];
  state: JobState;
  outputFormat: ImageFormat;
  operations: string;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
  artifact?: ArtifactRef;
  error?: JobError;
}

export interface JobHandle {
  jobId: string;
  fingerprint: string;
  state: JobState;
  /** False when the request attached to an already in-flight job. */
  created: boolean;
}

export interface CacheStats {
  hits: number;
  misses: number;
  hitRate: number;
  size: number;
  bytes: number;
  evictions: number;
}

export function toArtifactRef(artifact: Artifact): ArtifactRef {
  return {
    fingerprint: artifact.fingerprint,
    width: artifact.metadata.width,
    height: artifact.metadata.height,
    format: artifact.metadata.format,
    mimeType: artifact.metadata.mimeType,
    size: artifact.metadata.size,
  };
}

/** Job record as reported to callers: no users, no serialized spec. */
export interface JobStatusView {
  jobId: string;
  fingerprint: string;
  imageId: string;
  state: JobState;
  outputFormat: ImageFormat;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
  artifact?: ArtifactRef;
  error?: JobError;
}

export function toJobStatusView(record: JobRecord): JobStatusView {
  return {
    jobId: record.id,
    fingerprint: record.fingerprint,
    imageId: record.imageId,
    state: record.state,
    outputFormat: record.outputFormat,
    createdAt: record.createdAt,
    startedAt: record.startedAt,
    completedAt: record.completedAt,
    artifact: record.artifact,
    error: record.error,
  };
}

/** Image record as returned to clients; the storage key stays internal. */
export type ImageView = Omit<ImageRecord, 'storageKey'>;

export function toImageView(record: ImageRecord): ImageView {
  const { storageKey: _storageKey, ...view } = record;
  return view;
}

import { ImageRecord, JobRecord } from '@domain/types/responses';

/** Persistence for image records and job records. */
export interface MetadataStore {
  readonly name: string;
  createImage(record: ImageRecord): Promise<void>;
  getImage(id: string): Promise<ImageRecord | null>;
  deleteImage(id: string): Promise<boolean>;
  saveJob(record: JobRecord): Promise<void>;
  getJob(id: string): Promise<JobRecord | null>;
  deleteJob(id: string): Promise<boolean>;
  ping(): Promise<void>;
}

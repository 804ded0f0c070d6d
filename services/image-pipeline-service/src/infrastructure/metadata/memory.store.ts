import { ImageRecord, JobRecord } from '@domain/types/responses';
import { MetadataStore } from './types';

export class MemoryMetadataStore implements MetadataStore {
  readonly name = 'memory';
  private readonly images = new Map<string, ImageRecord>();
  private readonly jobs = new Map<string, JobRecord>();

  async createImage(record: ImageRecord): Promise<void> {
    this.images.set(record.id, { ...record });
  }

  async getImage(id: string): Promise<ImageRecord | null> {
    const record = this.images.get(id);
    return record ? { ...record } : null;
  }

  async deleteImage(id: string): Promise<boolean> {
    return this.images.delete(id);
  }

  async saveJob(record: JobRecord): Promise<void> {
    this.jobs.set(record.id, { ...record, subscribers: [...record.subscribers] });
  }

  async getJob(id: string): Promise<JobRecord | null> {
    const record = this.jobs.get(id);
    return record ? { ...record, subscribers: [...record.subscribers] } : null;
  }

  async deleteJob(id: string): Promise<boolean> {
    return this.jobs.delete(id);
  }

  async ping(): Promise<void> {
    return;
  }

  get jobCount(): number {
    return this.jobs.size;
  }
}

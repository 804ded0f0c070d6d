export * from './pipeline.service';
export * from './bootstrap';

export * from './types';
export * from './memory.queue';
export * from './bullmq.queue';

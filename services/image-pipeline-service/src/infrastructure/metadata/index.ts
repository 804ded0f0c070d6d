export * from './types';
export * from './memory.store';
export * from './redis.store';

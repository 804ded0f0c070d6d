export * from './types';
export * from './lru.backend';
export * from './redis.backend';

export * from './common';
export * from './operations';
export * from './responses';

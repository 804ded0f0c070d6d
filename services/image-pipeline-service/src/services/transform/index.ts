export * from './geometry';
export * from './transform.service';

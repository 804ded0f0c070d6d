export * from './image.service';

export * from './admission.service';

// Operation schemas live in the domain layer; request bodies are validated here
export {
  operationSchema,
  transformSpecSchema,
  formatSchema,
  validate,
  validateSafe,
  validateOperations,
  validateFormat,
  type ValidationResult,
} from '@domain/schemas';
export {
  transformRequestSchema,
  validateTransformRequest,
  type TransformRequestInput,
} from './schemas';

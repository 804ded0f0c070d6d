export {
  formatSchema,
  operationSchema,
  transformSpecSchema,
  validate,
  validateSafe,
  validateOperations,
  validateFormat,
  type ValidationResult,
} from './operations';

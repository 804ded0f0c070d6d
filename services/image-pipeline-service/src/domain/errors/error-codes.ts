export enum ErrorCode {
  // Validation
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_DIMENSIONS = 'INVALID_DIMENSIONS',
  CROP_OUT_OF_BOUNDS = 'CROP_OUT_OF_BOUNDS',
  INVALID_FORMAT = 'INVALID_FORMAT',
  INVALID_QUALITY = 'INVALID_QUALITY',
  INVALID_IMAGE = 'INVALID_IMAGE',
  FILE_TOO_LARGE = 'FILE_TOO_LARGE',

  // Lookup
  IMAGE_NOT_FOUND = 'IMAGE_NOT_FOUND',
  JOB_NOT_FOUND = 'JOB_NOT_FOUND',
  JOB_NOT_READY = 'JOB_NOT_READY',

  // Auth
  MISSING_TOKEN = 'MISSING_TOKEN',
  INVALID_TOKEN = 'INVALID_TOKEN',
  EXPIRED_TOKEN = 'EXPIRED_TOKEN',
  INSUFFICIENT_PERMISSIONS = 'INSUFFICIENT_PERMISSIONS',

  // Admission
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',

  // Execution
  EXECUTION_ERROR = 'EXECUTION_ERROR',
  EXECUTION_TIMEOUT = 'EXECUTION_TIMEOUT',

  // Infrastructure
  CACHE_UNAVAILABLE = 'CACHE_UNAVAILABLE',
  STORAGE_ERROR = 'STORAGE_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export const ERROR_HTTP_STATUS: Record<ErrorCode, number> = {
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_DIMENSIONS]: 400,
  [ErrorCode.CROP_OUT_OF_BOUNDS]: 400,
  [ErrorCode.INVALID_FORMAT]: 400,
  [ErrorCode.INVALID_QUALITY]: 400,
  [ErrorCode.INVALID_IMAGE]: 400,
  [ErrorCode.FILE_TOO_LARGE]: 413,
  [ErrorCode.IMAGE_NOT_FOUND]: 404,
  [ErrorCode.JOB_NOT_FOUND]: 404,
  [ErrorCode.JOB_NOT_READY]: 409,
  [ErrorCode.MISSING_TOKEN]: 401,
  [ErrorCode.INVALID_TOKEN]: 401,
  [ErrorCode.EXPIRED_TOKEN]: 401,
  [ErrorCode.INSUFFICIENT_PERMISSIONS]: 403,
  [ErrorCode.RATE_LIMIT_EXCEEDED]: 429,
  [ErrorCode.EXECUTION_ERROR]: 500,
  [ErrorCode.EXECUTION_TIMEOUT]: 504,
  [ErrorCode.CACHE_UNAVAILABLE]: 503,
  [ErrorCode.STORAGE_ERROR]: 502,
  [ErrorCode.INTERNAL_ERROR]: 500,
};

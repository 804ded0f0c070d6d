import { z } from 'zod';
import { AppError, FieldError } from '@domain/errors';
import { SUPPORTED_FORMATS, ImageFormat } from '@domain/types/common';
import { TransformOperation } from '@domain/types/operations';

// Base schemas
const dimensionSchema = z.number().int().positive().max(10000);
const offsetSchema = z.number().int().nonnegative().max(10000);
const qualitySchema = z.number().int().min(0).max(100);
const opacitySchema = z.number().min(0).max(100);
const hexColorSchema = z
  .string()
  .regex(/^#([0-9A-Fa-f]{3}|[0-9A-Fa-f]{6}|[0-9A-Fa-f]{8})$/, 'Invalid hex color format');
export const formatSchema = z.enum(['jpeg', 'png', 'webp', 'avif', 'tiff', 'gif']);

// Operation schemas
export const resizeSchema = z.object({
  op: z.literal('resize'),
  width: dimensionSchema.optional(),
  height: dimensionSchema.optional(),
}).strict();

export const cropSchema = z.object({
  op: z.literal('crop'),
  x: offsetSchema,
  y: offsetSchema,
  width: dimensionSchema,
  height: dimensionSchema,
}).strict();

export const rotateSchema = z.object({
  op: z.literal('rotate'),
  degrees: z.number().finite(),
  background: hexColorSchema.default('#000000'),
}).strict();

export const flipSchema = z.object({
  op: z.literal('flip'),
  axis: z.enum(['horizontal', 'vertical']),
}).strict();

export const mirrorSchema = z.object({ op: z.literal('mirror') }).strict();
export const grayscaleSchema = z.object({ op: z.literal('grayscale') }).strict();
export const sepiaSchema = z.object({ op: z.literal('sepia') }).strict();

export const watermarkSchema = z.object({
  op: z.literal('watermark'),
  overlay: z.string().min(1, 'Overlay image id is required').max(128),
  position: z.enum(['top-left', 'top-center', 'top-right', 'center-left', 'center',
    'center-right', 'bottom-left', 'bottom-center', 'bottom-right']),
  opacity: opacitySchema,
}).strict();

export const formatOperationSchema = z.object({
  op: z.literal('format'),
  target: formatSchema,
}).strict();

export const compressSchema = z.object({
  op: z.literal('compress'),
  quality: qualitySchema,
}).strict();

export const operationSchema = z.discriminatedUnion('op', [
  resizeSchema,
  cropSchema,
  rotateSchema,
  flipSchema,
  mirrorSchema,
  grayscaleSchema,
  sepiaSchema,
  watermarkSchema,
  formatOperationSchema,
  compressSchema,
]).superRefine((operation, ctx) => {
  if (operation.op === 'resize' && operation.width === undefined && operation.height === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'At least one of width or height must be provided',
      path: ['width'],
    });
  }
});

export const transformSpecSchema = z
  .array(operationSchema)
  .min(1, 'At least one operation is required')
  .max(32, 'At most 32 operations are allowed');

// Validation result type
export type ValidationResult<T> = { success: true; data: T } | { success: false; errors: FieldError[] };

function toFieldErrors(error: z.ZodError): FieldError[] {
  return error.errors.map(e => ({
    field: e.path.join('.'),
    message: e.message,
    code: e.code,
  }));
}

// Generic validation function with structured errors
export function validate<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const result = schema.safeParse(input);

  if (!result.success) {
    throw AppError.validationError('Validation failed', toFieldErrors(result.error));
  }

  return result.data;
}

// Safe validation (returns result instead of throwing)
export function validateSafe<S extends z.ZodTypeAny>(schema: S, input: unknown): ValidationResult<z.infer<S>> {
  const result = schema.safeParse(input);

  if (!result.success) {
    return { success: false, errors: toFieldErrors(result.error) };
  }

  return { success: true, data: result.data };
}

export function validateOperations(input: unknown): TransformOperation[] {
  return validate(transformSpecSchema, input);
}

export function validateFormat(input: string): ImageFormat {
  const result = formatSchema.safeParse(input);
  if (!result.success) {
    throw AppError.invalidFormat(`Unsupported output format: ${input}`, {
      supported: SUPPORTED_FORMATS,
    });
  }
  return result.data;
}

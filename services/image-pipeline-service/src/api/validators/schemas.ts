import { z } from 'zod';
import { validate } from '@domain/schemas';

export const transformRequestSchema = z.object({
  operations: z.unknown(),
  format: z.string().optional(),
  waitMs: z.number().int().nonnegative().max(60000).optional(),
});

export type TransformRequestInput = z.infer<typeof transformRequestSchema>;

export const validateTransformRequest = (input: unknown): TransformRequestInput => validate(transformRequestSchema, input);

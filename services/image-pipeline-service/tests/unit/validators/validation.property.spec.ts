import * as fc from 'fast-check';
import {
  validateOperations, validateFormat, validateTransformRequest, validateSafe, transformSpecSchema,
} from '../../../src/api/validators';
import * as domainSchemas from '../../../src/domain/schemas';
import { AppError } from '../../../src/domain/errors';
import { ErrorCode } from '../../../src/domain/errors/error-codes';

function expectCode(fn: () => unknown, code: ErrorCode): void {
  try {
    fn();
  } catch (error) {
    expect(error).toBeInstanceOf(AppError);
    if (error instanceof AppError) {
      expect(error.code).toBe(code);
    }
    return;
  }
  throw new Error(`Expected ${code} to be thrown`);
}

describe('Transform Spec Validation', () => {
  describe('Property 4: Valid Dimensions Accepted', () => {
    it('should accept resize within 1..10000 on either side', async () => {
      await fc.assert(
        fc.property(
          fc.integer({ min: 1, max: 10000 }),
          fc.integer({ min: 1, max: 10000 }),
          (width, height) => {
            expect(validateOperations([{ op: 'resize', width, height }])).toEqual([{ op: 'resize', width, height }]);
            expect(validateOperations([{ op: 'resize', width }])).toEqual([{ op: 'resize', width }]);
          }
        ),
        { numRuns: 100 }
      );
    });
  });

  describe('Property 5: Invalid Parameters Rejected', () => {
    it('should reject non-positive or fractional dimensions', async () => {
      await fc.assert(
        fc.property(
          fc.oneof(fc.integer({ min: -10000, max: 0 }), fc.integer({ min: 10001, max: 100000 }), fc.constant(1.5)),
          (width) => {
            expectCode(() => validateOperations([{ op: 'resize', width }]), ErrorCode.VALIDATION_ERROR);
          }
        ),
        { numRuns: 100 }
      );
    });

    it('should reject resize with neither side', () => {
      expectCode(() => validateOperations([{ op: 'resize' }]), ErrorCode.VALIDATION_ERROR);
    });

    it('should reject quality outside 0..100', async () => {
      await fc.assert(
        fc.property(
          fc.oneof(fc.integer({ min: -1000, max: -1 }), fc.integer({ min: 101, max: 1000 })),
          (quality) => {
            expectCode(() => validateOperations([{ op: 'compress', quality }]), ErrorCode.VALIDATION_ERROR);
          }
        ),
        { numRuns: 50 }
      );
    });

    it('should reject unknown operations and unknown keys', () => {
      expectCode(() => validateOperations([{ op: 'blur', sigma: 2 }]), ErrorCode.VALIDATION_ERROR);
      expectCode(() => validateOperations([{ op: 'grayscale', amount: 1 }]), ErrorCode.VALIDATION_ERROR);
    });

    it('should reject empty and non-array specs', () => {
      expectCode(() => validateOperations([]), ErrorCode.VALIDATION_ERROR);
      expectCode(() => validateOperations({ op: 'mirror' }), ErrorCode.VALIDATION_ERROR);
    });

    it('should report the failing field path', () => {
      const result = validateSafe(transformSpecSchema, [{ op: 'mirror' }, { op: 'crop', x: 0, y: 0, width: 0, height: 5 }]);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.errors.map((e) => e.field)).toContain('1.width');
      }
    });
  });

  describe('Property 6: Operation Defaults', () => {
    it('should default rotate background to black', () => {
      expect(validateOperations([{ op: 'rotate', degrees: 90 }])).toEqual([
        { op: 'rotate', degrees: 90, background: '#000000' },
      ]);
    });
  });

  describe('Property 7: Output Formats', () => {
    it('should accept supported formats', () => {
      for (const format of ['jpeg', 'png', 'webp', 'avif', 'tiff', 'gif']) {
        expect(validateFormat(format)).toBe(format);
      }
    });

    it('should reject unsupported formats with INVALID_FORMAT', () => {
      expectCode(() => validateFormat('bmp'), ErrorCode.INVALID_FORMAT);
      expectCode(() => validateOperations([{ op: 'format', target: 'heic' }]), ErrorCode.VALIDATION_ERROR);
    });
  });

  describe('Property 8: Transform Request Body', () => {
    it('should accept operations with optional format and wait', () => {
      const body = validateTransformRequest({ operations: [{ op: 'mirror' }], format: 'png', waitMs: 500 });
      expect(body).toEqual({ operations: [{ op: 'mirror' }], format: 'png', waitMs: 500 });
    });

    it('should reject a wait above one minute', () => {
      expectCode(() => validateTransformRequest({ operations: [], waitMs: 60001 }), ErrorCode.VALIDATION_ERROR);
    });
  });

  describe('Property 54: Shared Operation Schemas', () => {
    it('should expose the domain schemas through the API validators', () => {
      expect(validateOperations).toBe(domainSchemas.validateOperations);
      expect(validateFormat).toBe(domainSchemas.validateFormat);
      expect(transformSpecSchema).toBe(domainSchemas.transformSpecSchema);
    });
  });
});

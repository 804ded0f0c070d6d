import sharp from 'sharp';
import * as fc from 'fast-check';
import { TransformService, resolveOutputFormat, ExecutionContext } from '../../../../src/services/transform';
import { AppError, ExecutionError, ValidationError } from '../../../../src/domain/errors';
import { ErrorCode } from '../../../../src/domain/errors/error-codes';
import { ImageFormat, TransformSpec } from '../../../../src/domain/types';
import { generateTestImage, getImageInfo, getPixelColor, pixelsEqual, solidImage } from '../../../helpers/images';

async function codeOf(promise: Promise<unknown>): Promise<string | undefined> {
  try {
    await promise;
    return undefined;
  } catch (error) {
    return error instanceof AppError ? error.code : 'UNKNOWN';
  }
}

function withOverlays(overlays: Record<string, Buffer>): ExecutionContext {
  return {
    loadOverlay: async (reference) => {
      const overlay = overlays[reference];
      if (!overlay) throw AppError.imageNotFound(`missing ${reference}`);
      return overlay;
    },
  };
}

describe('TransformService Property Tests', () => {
  const service = new TransformService({ defaultQuality: 80, maxInputPixels: 268402689 });
  let source: Buffer;

  beforeAll(async () => {
    source = await generateTestImage(100, 100, 'png');
  });

  describe('Property 17: Deterministic Output', () => {
    it('should produce identical bytes for identical requests', async () => {
      await fc.assert(
        fc.asyncProperty(
          fc.constantFrom<ImageFormat>('png', 'jpeg', 'webp'),
          fc.integer({ min: 10, max: 80 }),
          fc.boolean(),
          async (format, width, gray) => {
            const spec: TransformSpec = gray
              ? [{ op: 'resize', width }, { op: 'grayscale' }]
              : [{ op: 'resize', width }, { op: 'mirror' }];

            const first = await service.execute(source, spec, format);
            const second = await service.execute(source, spec, format);

            expect(first.buffer.equals(second.buffer)).toBe(true);
            expect(first.fingerprint).toBe(second.fingerprint);
          }
        ),
        { numRuns: 10 }
      );
    });
  });

  describe('Property 18: Resize And Convert', () => {
    it('should resize 800x600 to 400x300 and encode webp', async () => {
      const input = await generateTestImage(800, 600, 'png');
      const artifact = await service.execute(input, [{ op: 'resize', width: 400 }, { op: 'format', target: 'webp' }], 'webp');

      expect(artifact.metadata).toMatchObject({ width: 400, height: 300, format: 'webp', mimeType: 'image/webp' });
      expect(await getImageInfo(artifact.buffer)).toEqual({ width: 400, height: 300, format: 'webp' });
      expect(artifact.metadata.size).toBe(artifact.buffer.length);
    });

    it('should stretch to exact dimensions when both sides are given', async () => {
      const artifact = await service.execute(source, [{ op: 'resize', width: 30, height: 70 }], 'png');
      expect(artifact.metadata).toMatchObject({ width: 30, height: 70 });
    });
  });

  describe('Property 19: Geometry Operations', () => {
    it('should swap dimensions on a quarter turn', async () => {
      const input = await generateTestImage(200, 100, 'png');
      const artifact = await service.execute(input, [{ op: 'rotate', degrees: 90, background: '#000000' }], 'png');
      expect(artifact.metadata).toMatchObject({ width: 100, height: 200 });
    });

    it('should flip vertically', async () => {
      const artifact = await service.execute(source, [{ op: 'flip', axis: 'vertical' }], 'png');
      const pixel = await getPixelColor(artifact.buffer, 0, 0);
      expect(pixel.g).toBe(Math.floor((99 / 100) * 255));
    });

    it('should mirror horizontally', async () => {
      const artifact = await service.execute(source, [{ op: 'mirror' }], 'png');
      const pixel = await getPixelColor(artifact.buffer, 0, 0);
      expect(pixel.r).toBe(Math.floor((99 / 100) * 255));
    });

    it('should crop a region', async () => {
      const artifact = await service.execute(source, [{ op: 'crop', x: 10, y: 20, width: 30, height: 40 }], 'png');
      expect(artifact.metadata).toMatchObject({ width: 30, height: 40 });
      const pixel = await getPixelColor(artifact.buffer, 0, 0);
      expect(pixel.r).toBe(Math.floor((10 / 100) * 255));
      expect(pixel.g).toBe(Math.floor((20 / 100) * 255));
    });

    it('should reject an out-of-bounds crop without producing output', async () => {
      const promise = service.execute(source, [{ op: 'crop', x: 90, y: 0, width: 20, height: 10 }], 'png');
      await expect(promise).rejects.toBeInstanceOf(ValidationError);
      expect(await codeOf(service.execute(source, [{ op: 'crop', x: 90, y: 0, width: 20, height: 10 }], 'png')))
        .toBe(ErrorCode.CROP_OUT_OF_BOUNDS);
    });
  });

  describe('Property 20: Color Operations', () => {
    it('should produce a single-channel image for grayscale', async () => {
      const artifact = await service.execute(source, [{ op: 'grayscale' }], 'png');
      expect((await sharp(artifact.buffer).metadata()).channels).toBe(1);
    });

    it('should tint towards brown for sepia', async () => {
      const artifact = await service.execute(source, [{ op: 'sepia' }], 'png');
      const pixel = await getPixelColor(artifact.buffer, 50, 50);
      expect(pixel.r).toBeGreaterThan(pixel.g);
      expect(pixel.g).toBeGreaterThan(pixel.b);
    });

    it('should restore colour channels for sepia after grayscale', async () => {
      const artifact = await service.execute(source, [{ op: 'grayscale' }, { op: 'sepia' }], 'png');
      expect((await sharp(artifact.buffer).metadata()).channels).toBe(3);
    });
  });

  describe('Property 21: Watermark', () => {
    it('should leave pixels untouched at opacity 0', async () => {
      const overlay = await solidImage(20, 20, [255, 0, 0, 255]);
      const artifact = await service.execute(
        source,
        [{ op: 'watermark', overlay: 'logo', position: 'center', opacity: 0 }],
        'png',
        withOverlays({ logo: overlay })
      );

      expect(await pixelsEqual(source, artifact.buffer, 0)).toBe(true);
    });

    it('should draw the overlay at its position at full opacity', async () => {
      const overlay = await solidImage(20, 20, [255, 0, 0, 255]);
      const artifact = await service.execute(
        source,
        [{ op: 'watermark', overlay: 'logo', position: 'top-left', opacity: 100 }],
        'png',
        withOverlays({ logo: overlay })
      );

      const corner = await getPixelColor(artifact.buffer, 0, 0);
      expect([corner.r, corner.g, corner.b]).toEqual([255, 0, 0]);
      const outside = await getPixelColor(artifact.buffer, 50, 50);
      expect(outside.g).toBe(Math.floor((50 / 100) * 255));
    });

    it('should scale down overlays larger than the base', async () => {
      const overlay = await solidImage(300, 150, [0, 0, 255, 255]);
      const artifact = await service.execute(
        source,
        [{ op: 'watermark', overlay: 'banner', position: 'center', opacity: 50 }],
        'png',
        withOverlays({ banner: overlay })
      );

      expect(artifact.metadata).toMatchObject({ width: 100, height: 100 });
    });

    it('should fail when the overlay cannot be loaded', async () => {
      const promise = service.execute(
        source,
        [{ op: 'watermark', overlay: 'missing', position: 'center', opacity: 100 }],
        'png'
      );
      expect(await codeOf(promise)).toBe(ErrorCode.IMAGE_NOT_FOUND);
    });
  });

  describe('Property 22: Encoding', () => {
    it('should produce smaller JPEG output at lower quality', async () => {
      const input = await generateTestImage(200, 200, 'png');
      const low = await service.execute(input, [{ op: 'compress', quality: 10 }], 'jpeg');
      const high = await service.execute(input, [{ op: 'compress', quality: 95 }], 'jpeg');

      expect(low.buffer.length).toBeLessThan(high.buffer.length);
      expect(low.metadata.format).toBe('jpeg');
    });

    it('should flatten transparency onto white for JPEG', async () => {
      const transparent = await solidImage(10, 10, [0, 0, 0, 0]);
      const artifact = await service.execute(transparent, [{ op: 'format', target: 'jpeg' }], 'jpeg');
      const pixel = await getPixelColor(artifact.buffer, 5, 5);

      expect(pixel.r).toBeGreaterThanOrEqual(250);
      expect(artifact.metadata.hasAlpha).toBe(false);
    });

    it('should keep working after a mid-chain compress', async () => {
      const artifact = await service.execute(source, [{ op: 'compress', quality: 50 }, { op: 'resize', width: 50 }], 'webp');
      expect(artifact.metadata).toMatchObject({ width: 50, height: 50, format: 'webp' });
    });

    it('should reject compress for GIF output', async () => {
      expect(await codeOf(service.execute(source, [{ op: 'compress', quality: 50 }], 'gif')))
        .toBe(ErrorCode.INVALID_QUALITY);
    });
  });

  describe('Property 23: Failures', () => {
    it('should report undecodable sources as execution errors', async () => {
      const promise = service.execute(Buffer.from('not an image'), [{ op: 'mirror' }], 'png');
      await expect(promise).rejects.toBeInstanceOf(ExecutionError);
    });

    it('should stamp the fingerprint passed in the context', async () => {
      const artifact = await service.execute(source, [{ op: 'mirror' }], 'png', {
        fingerprint: 'c'.repeat(64),
        loadOverlay: async () => Buffer.alloc(0),
      });
      expect(artifact.fingerprint).toBe('c'.repeat(64));
    });
  });

  describe('Output format resolution', () => {
    it('should prefer the request, then the last format operation, then the source', () => {
      expect(resolveOutputFormat([{ op: 'mirror' }], 'webp', 'png')).toBe('webp');
      expect(resolveOutputFormat([{ op: 'format', target: 'jpeg' }, { op: 'format', target: 'avif' }], undefined, 'png'))
        .toBe('avif');
      expect(resolveOutputFormat([{ op: 'mirror' }], undefined, 'png')).toBe('png');
    });

    it('should reject a request that contradicts a format operation', () => {
      expect(() => resolveOutputFormat([{ op: 'format', target: 'jpeg' }], 'png', 'png')).toThrow(ValidationError);
    });
  });

  describe('Metadata', () => {
    it('should read dimensions and format of a source', async () => {
      const input = await generateTestImage(64, 32, 'jpeg');
      expect(await service.getMetadata(input)).toEqual({
        width: 64,
        height: 32,
        format: 'jpeg',
        mimeType: 'image/jpeg',
        size: input.length,
        hasAlpha: false,
      });
    });
  });
});

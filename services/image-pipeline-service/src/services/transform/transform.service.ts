import sharp from 'sharp';
import { AppError, errorMessage } from '@domain/errors';
import { ImageFormat, MIME_TYPES, WatermarkPosition } from '@domain/types/common';
import {
  CompressOperation, FormatOperation, TransformOperation, TransformSpec, WatermarkOperation,
} from '@domain/types/operations';
import { Artifact, ImageMetadata } from '@domain/types/responses';
import { fingerprintService } from '@services/fingerprint';
import { assertCropInBounds } from './geometry';

type Channels = 1 | 2 | 3 | 4;

interface RawImage {
  data: Buffer;
  width: number;
  height: number;
  channels: Channels;
}

export interface ExecutionContext {
  /** Resolves a watermark overlay reference to its bytes. */
  loadOverlay(reference: string): Promise<Buffer>;
  /** Fingerprint to stamp on the artifact; derived from the source bytes when absent. */
  fingerprint?: string;
  /** libvips processing budget per pipeline step, in whole seconds. */
  timeoutSeconds?: number;
}

export interface TransformServiceOptions {
  defaultQuality: number;
  maxInputPixels: number;
}

const SEPIA_MATRIX: [[number, number, number], [number, number, number], [number, number, number]] = [
  [0.393, 0.769, 0.189],
  [0.349, 0.686, 0.168],
  [0.272, 0.534, 0.131],
];

const GRAVITY: Record<WatermarkPosition, string> = {
  'top-left': 'northwest',
  'top-center': 'north',
  'top-right': 'northeast',
  'center-left': 'west',
  'center': 'centre',
  'center-right': 'east',
  'bottom-left': 'southwest',
  'bottom-center': 'south',
  'bottom-right': 'southeast',
};

const noOverlays: ExecutionContext = {
  loadOverlay: async (reference) => {
    throw AppError.imageNotFound(`Overlay not available: ${reference}`, { overlay: reference });
  },
};

/**
 * Effective output encoding: the explicit request, else the last `format`
 * operation, else the source format. A request that contradicts a `format`
 * operation is rejected, as is `compress` on GIF output.
 */
export function resolveOutputFormat(
  spec: TransformSpec,
  requested: ImageFormat | undefined,
  sourceFormat: ImageFormat
): ImageFormat {
  const formatOps = spec.filter((operation): operation is FormatOperation => operation.op === 'format');
  const lastTarget = formatOps.length > 0 ? formatOps[formatOps.length - 1].target : undefined;

  if (requested !== undefined && lastTarget !== undefined && requested !== lastTarget) {
    throw AppError.invalidFormat(`Requested format ${requested} conflicts with format operation target ${lastTarget}`, {
      requested,
      target: lastTarget,
    });
  }

  const format = requested ?? lastTarget ?? sourceFormat;
  if (format === 'gif' && spec.some((operation) => operation.op === 'compress')) {
    throw AppError.invalidQuality('GIF output does not support compress', { format });
  }
  return format;
}

/**
 * Applies an ordered transform spec to a source buffer. Stateless per call and
 * deterministic: the source is decoded once to raw pixels, every operation
 * consumes the raw output of the previous one, and the result is encoded once
 * with fixed encoder options and no metadata.
 */
export class TransformService {
  constructor(private readonly options: TransformServiceOptions = { defaultQuality: 80, maxInputPixels: 268402689 }) {}

  async execute(
    source: Buffer,
    spec: TransformSpec,
    outputFormat: ImageFormat,
    context: ExecutionContext = noOverlays
  ): Promise<Artifact> {
    if (outputFormat === 'gif' && spec.some((operation) => operation.op === 'compress')) {
      throw AppError.invalidQuality('GIF output does not support compress', { format: outputFormat });
    }

    let image = await this.decode(source, context);
    let quality: number | undefined;
    let pendingCompress = false;

    for (const [index, operation] of spec.entries()) {
      if (isEncodingOperation(operation)) {
        if (operation.op === 'compress') {
          quality = operation.quality;
          pendingCompress = true;
        }
        continue;
      }

      if (pendingCompress) {
        image = await this.step(index, operation, () => this.roundTrip(image, outputFormat, quality, context));
        pendingCompress = false;
      }
      image = await this.step(index, operation, () => this.apply(image, operation, index, context));
    }

    const { buffer, metadata } = await this.encode(image, outputFormat, quality, context);

    return {
      fingerprint: context.fingerprint
        ?? fingerprintService.fingerprint(fingerprintService.hashContent(source), spec, outputFormat),
      buffer,
      metadata,
      createdAt: new Date().toISOString(),
    };
  }

  async getMetadata(input: Buffer): Promise<ImageMetadata> {
    const metadata = await sharp(input, { limitInputPixels: this.options.maxInputPixels }).metadata();
    const format = toImageFormat(metadata.format);
    if (!format || !metadata.width || !metadata.height) {
      throw AppError.invalidImage('Unable to determine image format or dimensions', { format: metadata.format });
    }
    return {
      width: metadata.width,
      height: metadata.height,
      format,
      mimeType: MIME_TYPES[format],
      size: input.length,
      hasAlpha: metadata.hasAlpha === true,
    };
  }

  private async step(index: number, operation: TransformOperation, run: () => Promise<RawImage>): Promise<RawImage> {
    try {
      return await run();
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw AppError.executionError(`Operation ${index} (${operation.op}) failed: ${errorMessage(error)}`, {
        index,
        operation: operation.op,
      });
    }
  }

  private async apply(
    image: RawImage,
    operation: TransformOperation,
    index: number,
    context: ExecutionContext
  ): Promise<RawImage> {
    switch (operation.op) {
      case 'resize': {
        const exact = operation.width !== undefined && operation.height !== undefined;
        return this.toRaw(this.fromRaw(image, context).resize({
          width: operation.width,
          height: operation.height,
          fit: exact ? 'fill' : 'inside',
        }));
      }
      case 'crop':
        assertCropInBounds(operation, image, index);
        return this.toRaw(this.fromRaw(image, context).extract({
          left: operation.x,
          top: operation.y,
          width: operation.width,
          height: operation.height,
        }));
      case 'rotate':
        return this.toRaw(this.fromRaw(image, context).rotate(operation.degrees, { background: operation.background }));
      case 'flip':
        return operation.axis === 'vertical'
          ? this.toRaw(this.fromRaw(image, context).flip())
          : this.toRaw(this.fromRaw(image, context).flop());
      case 'mirror':
        return this.toRaw(this.fromRaw(image, context).flop());
      case 'grayscale':
        return this.toRaw(this.fromRaw(image, context).grayscale());
      case 'sepia': {
        const colour = image.channels < 3
          ? await this.toRaw(this.fromRaw(image, context).toColourspace('srgb'))
          : image;
        return this.toRaw(this.fromRaw(colour, context).recomb(SEPIA_MATRIX));
      }
      case 'watermark':
        return this.watermark(image, operation, context);
      case 'format':
      case 'compress':
        return image;
    }
  }

  private async watermark(image: RawImage, operation: WatermarkOperation, context: ExecutionContext): Promise<RawImage> {
    if (operation.opacity === 0) return image;

    const overlaySource = await context.loadOverlay(operation.overlay);
    const overlayMeta = await sharp(overlaySource).metadata();
    if (!overlayMeta.width || !overlayMeta.height) {
      throw AppError.executionError('Unable to read overlay dimensions', { overlay: operation.overlay });
    }

    let overlay = sharp(overlaySource).ensureAlpha();
    if (overlayMeta.width > image.width || overlayMeta.height > image.height) {
      overlay = overlay.resize({ width: image.width, height: image.height, fit: 'inside' });
    }
    let overlayBuffer = await overlay.png().toBuffer();

    if (operation.opacity < 100) {
      overlayBuffer = await sharp(overlayBuffer)
        .composite([{
          input: Buffer.from([255, 255, 255, Math.round((operation.opacity / 100) * 255)]),
          raw: { width: 1, height: 1, channels: 4 },
          tile: true,
          blend: 'dest-in',
        }])
        .png()
        .toBuffer();
    }

    return this.toRaw(this.fromRaw(image, context).composite([{
      input: overlayBuffer,
      gravity: GRAVITY[operation.position],
    }]));
  }

  /** Lossy encode then decode, so operations after a `compress` see its artifacts. */
  private async roundTrip(
    image: RawImage,
    format: ImageFormat,
    quality: number | undefined,
    context: ExecutionContext
  ): Promise<RawImage> {
    const { buffer } = await this.encode(image, format, quality, context);
    return this.decode(buffer, context);
  }

  private async decode(source: Buffer, context: ExecutionContext): Promise<RawImage> {
    try {
      const pipeline = sharp(source, { limitInputPixels: this.options.maxInputPixels, failOn: 'error' });
      return await this.toRaw(this.withTimeout(pipeline, context));
    } catch (error) {
      throw AppError.executionError(`Unable to decode source image: ${errorMessage(error)}`, { stage: 'decode' });
    }
  }

  private async encode(
    image: RawImage,
    format: ImageFormat,
    quality: number | undefined,
    context: ExecutionContext
  ): Promise<{ buffer: Buffer; metadata: ImageMetadata }> {
    const hasAlpha = image.channels === 2 || image.channels === 4;
    try {
      const pipeline = this.encoder(this.fromRaw(image, context), format, quality, hasAlpha);
      const { data, info } = await pipeline.toBuffer({ resolveWithObject: true });
      return {
        buffer: data,
        metadata: {
          width: info.width,
          height: info.height,
          format,
          mimeType: MIME_TYPES[format],
          size: data.length,
          hasAlpha: info.channels === 2 || info.channels === 4,
        },
      };
    } catch (error) {
      throw AppError.executionError(`Unable to encode ${format}: ${errorMessage(error)}`, { stage: 'encode', format });
    }
  }

  private encoder(pipeline: sharp.Sharp, format: ImageFormat, quality: number | undefined, hasAlpha: boolean): sharp.Sharp {
    const q = Math.max(1, quality ?? this.options.defaultQuality);

    switch (format) {
      case 'jpeg':
        return (hasAlpha ? pipeline.flatten({ background: '#ffffff' }) : pipeline).jpeg({ quality: q });
      case 'png':
        return quality === undefined
          ? pipeline.png({ compressionLevel: 9 })
          : pipeline.png({ compressionLevel: 9, palette: true, quality });
      case 'webp':
        return pipeline.webp({ quality: q });
      case 'avif':
        return pipeline.avif({ quality: q });
      case 'tiff':
        return quality === undefined
          ? pipeline.tiff({ compression: 'lzw' })
          : (hasAlpha ? pipeline.flatten({ background: '#ffffff' }) : pipeline).tiff({ compression: 'jpeg', quality: q });
      case 'gif':
        return pipeline.gif();
    }
  }

  private fromRaw(image: RawImage, context: ExecutionContext): sharp.Sharp {
    return this.withTimeout(
      sharp(image.data, { raw: { width: image.width, height: image.height, channels: image.channels } }),
      context
    );
  }

  private withTimeout(pipeline: sharp.Sharp, context: ExecutionContext): sharp.Sharp {
    return context.timeoutSeconds !== undefined && context.timeoutSeconds > 0
      ? pipeline.timeout({ seconds: Math.ceil(context.timeoutSeconds) })
      : pipeline;
  }

  private async toRaw(pipeline: sharp.Sharp): Promise<RawImage> {
    const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
    return { data, width: info.width, height: info.height, channels: toChannels(info.channels) };
  }
}

function isEncodingOperation(operation: TransformOperation): operation is FormatOperation | CompressOperation {
  return operation.op === 'format' || operation.op === 'compress';
}

function toChannels(channels: number): Channels {
  switch (channels) {
    case 1:
    case 2:
    case 3:
    case 4:
      return channels;
    default:
      throw AppError.executionError(`Unsupported channel count: ${channels}`);
  }
}

function toImageFormat(format: string | undefined): ImageFormat | undefined {
  switch (format) {
    case 'jpeg':
    case 'jpg':
      return 'jpeg';
    case 'png':
    case 'webp':
    case 'tiff':
    case 'gif':
      return format;
    case 'heif':
    case 'avif':
      return 'avif';
    default:
      return undefined;
  }
}

import crypto from 'crypto';
import { validateOperations, validateFormat } from '@domain/schemas';
import { ImageFormat } from '@domain/types/common';
import { ResizeOperation, TransformOperation, TransformSpec } from '@domain/types/operations';

const FINGERPRINT_VERSION = 'v1';

/**
 * Derives cache and deduplication keys from (source content hash, transform
 * spec, output format). Pure: no I/O, no clock.
 *
 * Canonical form keeps operation order. Within an operation, keys are sorted,
 * `-0` becomes `0`, rotation is reduced into [0, 360) at 6 decimal places and
 * hex colors are lower-cased and expanded to `#rrggbb` / `#rrggbbaa`.
 */
export class FingerprintService {
  /** Validates raw input and returns the canonical, frozen spec. */
  parse(input: unknown): TransformSpec {
    const operations = validateOperations(input);
    return Object.freeze(operations.map((operation) => Object.freeze(this.normalizeOperation(operation))));
  }

  canonicalize(spec: TransformSpec): string {
    return `[${spec.map((operation) => stableStringify(this.normalizeOperation(operation))).join(',')}]`;
  }

  fingerprint(sourceContentHash: string, spec: unknown, outputFormat: ImageFormat | string): string {
    const canonicalSpec = this.canonicalize(this.parse(spec));
    const format = validateFormat(outputFormat);

    return crypto
      .createHash('sha256')
      .update(`${FINGERPRINT_VERSION}\n${sourceContentHash}\n${format}\n${canonicalSpec}`)
      .digest('hex');
  }

  hashContent(buffer: Buffer): string {
    return crypto.createHash('sha256').update(buffer).digest('hex');
  }

  private normalizeOperation(operation: TransformOperation): TransformOperation {
    switch (operation.op) {
      case 'resize': {
        const resize: ResizeOperation = { op: 'resize' };
        if (operation.width !== undefined) resize.width = normalizeNumber(operation.width);
        if (operation.height !== undefined) resize.height = normalizeNumber(operation.height);
        return resize;
      }
      case 'crop':
        return {
          op: 'crop',
          x: normalizeNumber(operation.x),
          y: normalizeNumber(operation.y),
          width: normalizeNumber(operation.width),
          height: normalizeNumber(operation.height),
        };
      case 'rotate':
        return {
          op: 'rotate',
          degrees: normalizeDegrees(operation.degrees),
          background: normalizeColor(operation.background),
        };
      case 'flip':
        return { op: 'flip', axis: operation.axis };
      case 'mirror':
      case 'grayscale':
      case 'sepia':
        return { op: operation.op };
      case 'watermark':
        return {
          op: 'watermark',
          overlay: operation.overlay,
          position: operation.position,
          opacity: normalizeNumber(operation.opacity),
        };
      case 'format':
        return { op: 'format', target: operation.target };
      case 'compress':
        return { op: 'compress', quality: normalizeNumber(operation.quality) };
    }
  }
}

export function normalizeNumber(value: number): number {
  const rounded = Math.round(value * 1e6) / 1e6;
  return rounded === 0 ? 0 : rounded;
}

export function normalizeDegrees(degrees: number): number {
  const reduced = normalizeNumber(((degrees % 360) + 360) % 360);
  return reduced === 360 ? 0 : reduced;
}

export function normalizeColor(color: string): string {
  const hex = color.slice(1).toLowerCase();
  if (hex.length === 3) {
    return `#${hex.split('').map((c) => c + c).join('')}`;
  }
  return `#${hex}`;
}

export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(',')}}`;
}

export const fingerprintService = new FingerprintService();

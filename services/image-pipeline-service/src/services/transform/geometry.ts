import { AppError } from '@domain/errors';
import { CropOperation, TransformSpec } from '@domain/types/operations';

export interface Dimensions {
  width: number;
  height: number;
}

export interface PlannedGeometry extends Dimensions {
  /** False once an arbitrary-angle rotation makes the size depend on the encoder's rounding. */
  exact: boolean;
}

const MAX_OUTPUT_DIMENSION = 16384;

export function assertCropInBounds(operation: CropOperation, current: Dimensions, index: number): void {
  if (operation.x + operation.width > current.width || operation.y + operation.height > current.height) {
    throw AppError.cropOutOfBounds(
      `Crop region ${operation.width}x${operation.height}+${operation.x}+${operation.y} exceeds ${current.width}x${current.height}`,
      { index, region: { ...operation }, bounds: { ...current } }
    );
  }
}

export function rotatedBounds(current: Dimensions, degrees: number): Dimensions {
  if (degrees % 90 === 0) {
    return degrees % 180 === 0 ? { ...current } : { width: current.height, height: current.width };
  }
  const radians = (degrees * Math.PI) / 180;
  const cos = Math.abs(Math.cos(radians));
  const sin = Math.abs(Math.sin(radians));
  return {
    width: Math.ceil(current.width * cos + current.height * sin),
    height: Math.ceil(current.width * sin + current.height * cos),
  };
}

/**
 * Walks the operations against the source size so bad crops and oversized
 * outputs are rejected before anything is enqueued.
 */
export function planGeometry(source: Dimensions, spec: TransformSpec): PlannedGeometry {
  let current: PlannedGeometry = { width: source.width, height: source.height, exact: true };

  spec.forEach((operation, index) => {
    switch (operation.op) {
      case 'resize': {
        if (operation.width !== undefined && operation.height !== undefined) {
          current = { width: operation.width, height: operation.height, exact: current.exact };
        } else if (operation.width !== undefined) {
          current = {
            width: operation.width,
            height: Math.max(1, Math.round((current.height * operation.width) / current.width)),
            exact: current.exact,
          };
        } else if (operation.height !== undefined) {
          current = {
            width: Math.max(1, Math.round((current.width * operation.height) / current.height)),
            height: operation.height,
            exact: current.exact,
          };
        }
        break;
      }
      case 'crop':
        if (current.exact) {
          assertCropInBounds(operation, current, index);
        }
        current = { width: operation.width, height: operation.height, exact: current.exact };
        break;
      case 'rotate': {
        const bounds = rotatedBounds(current, operation.degrees);
        current = { ...bounds, exact: current.exact && operation.degrees % 90 === 0 };
        break;
      }
      default:
        break;
    }

    if (current.width > MAX_OUTPUT_DIMENSION || current.height > MAX_OUTPUT_DIMENSION) {
      throw AppError.invalidDimensions(
        `Operation ${index} (${operation.op}) would produce ${current.width}x${current.height}, above the ${MAX_OUTPUT_DIMENSION}px limit`,
        { index, width: current.width, height: current.height }
      );
    }
  });

  return current;
}

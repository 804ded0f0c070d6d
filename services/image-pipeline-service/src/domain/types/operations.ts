import { FlipAxis, ImageFormat, WatermarkPosition } from './common';

export interface ResizeOperation {
  op: 'resize';
  width?: number;
  height?: number;
}

export interface CropOperation {
  op: 'crop';
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface RotateOperation {
  op: 'rotate';
  /** Clockwise. Non-multiples of 90 grow the canvas and fill it with `background`. */
  degrees: number;
  background: string;
}

export interface FlipOperation {
  op: 'flip';
  axis: FlipAxis;
}

export interface MirrorOperation {
  op: 'mirror';
}

export interface GrayscaleOperation {
  op: 'grayscale';
}

export interface SepiaOperation {
  op: 'sepia';
}

export interface WatermarkOperation {
  op: 'watermark';
  /** Image id of the overlay, owned by the same user. */
  overlay: string;
  position: WatermarkPosition;
  opacity: number;
}

export interface FormatOperation {
  op: 'format';
  target: ImageFormat;
}

export interface CompressOperation {
  op: 'compress';
  quality: number;
}

export type TransformOperation =
  | ResizeOperation
  | CropOperation
  | RotateOperation
  | FlipOperation
  | MirrorOperation
  | GrayscaleOperation
  | SepiaOperation
  | WatermarkOperation
  | FormatOperation
  | CompressOperation;

/** Ordered, canonicalized operation list. Never mutated once built. */
export type TransformSpec = readonly TransformOperation[];

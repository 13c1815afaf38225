export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

export class InvalidRegionError extends InvalidInputError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRegionError';
  }
}

export class ImageLoadError extends InvalidInputError {
  readonly path: string;

  constructor(filePath: string, cause?: unknown) {
    super(`Could not load image from path: ${filePath}`);
    this.name = 'ImageLoadError';
    this.path = filePath;
    this.cause = cause;
  }
}

export class InvalidFrameError extends InvalidInputError {
  constructor(message = 'Invalid frame') {
    super(message);
    this.name = 'InvalidFrameError';
  }
}

export class CropFailureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CropFailureError';
  }
}

export class RecognitionFailureError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'RecognitionFailureError';
    this.cause = cause;
  }
}

export class EncodingFailureError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'EncodingFailureError';
    this.cause = cause;
  }
}

export class NotImplementedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotImplementedError';
  }
}

export type ScanStage =
  | 'load'
  | 'orient'
  | 'map'
  | 'enhance'
  | 'validate'
  | 'adapt'
  | 'recognize'
  | 'assemble';

export class ScanError extends Error {
  readonly stage: ScanStage;

  constructor(stage: ScanStage, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`Scan failed at ${stage}: ${message}`);
    this.name = 'ScanError';
    this.stage = stage;
    this.cause = cause;
  }
}
